import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { configModuleOptions } from '../config/configuration';
import { QrCodesModule } from '../qr-codes/qr-codes.module';

// HTTP-less context for command line tools
@Module({
  imports: [ConfigModule.forRoot(configModuleOptions), QrCodesModule],
})
export class CliModule { }
