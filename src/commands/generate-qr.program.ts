import { ConflictException } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { Command, InvalidArgumentError } from 'commander';
import { CreateQrCodeDto } from '../qr-codes/dto/create-qr-code.dto';
import { QrCodesService } from '../qr-codes/qr-codes.service';
import { CliModule } from './cli.module';

function parseSize(value: string): number {
  const size = Number(value);
  if (!Number.isInteger(size)) {
    throw new InvalidArgumentError('size must be an integer');
  }
  return size;
}

/**
 * Builds the `generate-qr` program. `log` receives the download URL of the
 * created image.
 */
export function createGenerateQrProgram(log: (line: string) => void = console.log): Command {
  const program = new Command();

  program
    .name('generate-qr')
    .description('Render a QR code PNG into the configured QR_CODE_DIR')
    .argument('<url>', 'http(s) URL to encode')
    .option('-s, --size <version>', 'minimum QR version (1-40)', parseSize, 10)
    .action(async (url: string, options: { size: number }) => {
      const dto = plainToInstance(CreateQrCodeDto, { url, size: options.size });
      const errors = await validate(dto);
      if (errors.length > 0) {
        program.error(errors.flatMap((e) => Object.values(e.constraints ?? {})).join('\n'));
      }

      const app = await NestFactory.createApplicationContext(CliModule, { logger: ['error'] });
      try {
        const created = await app.get(QrCodesService).create(dto);
        log(created.qr_code_url);
      } catch (error) {
        if (error instanceof ConflictException) {
          program.error(`QR code already exists for ${url}`);
        }
        throw error;
      } finally {
        await app.close();
      }
    });

  return program;
}
