import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { createReadStream } from 'fs';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CreateQrCodeDto } from './dto/create-qr-code.dto';
import { QrCodesService } from './qr-codes.service';

@Controller('qr-codes')
@UseGuards(JwtAuthGuard)
export class QrCodesController {
  constructor(private readonly qrCodesService: QrCodesService) { }

  @Post()
  create(@Body() dto: CreateQrCodeDto) {
    return this.qrCodesService.create(dto);
  }

  @Get()
  findAll() {
    return this.qrCodesService.list();
  }

  @Get(':filename')
  async findOne(@Param('filename') filename: string) {
    const file = await this.qrCodesService.findPath(filename);
    return new StreamableFile(createReadStream(file), { type: 'image/png' });
  }

  @Delete(':filename')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('filename') filename: string) {
    return this.qrCodesService.remove(filename);
  }
}
