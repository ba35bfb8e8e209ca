import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { QrCodesController } from './qr-codes.controller';
import { QR_CODE_OPTIONS, QrCodeOptions } from './qr-codes.options';
import { QrCodesService } from './qr-codes.service';

@Module({
  controllers: [QrCodesController],
  providers: [
    {
      provide: QR_CODE_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>): QrCodeOptions => ({
        ...config.get('qr', { infer: true }),
        ...config.get('server', { infer: true }),
      }),
    },
    QrCodesService,
  ],
  exports: [QrCodesService],
})
export class QrCodesModule { }
