import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ServeStaticModule } from '@nestjs/serve-static';
import { AuthModule } from './auth/auth.module';
import { AppConfig, configModuleOptions } from './config/configuration';
import { QrCodesModule } from './qr-codes/qr-codes.module';

@Module({
  imports: [
    ConfigModule.forRoot(configModuleOptions),

    // Same files nginx serves from the shared volume, for running without the proxy
    ServeStaticModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => {
        const { directory } = config.get('qr', { infer: true });
        const { downloadFolder } = config.get('server', { infer: true });
        return [
          {
            rootPath: directory,
            serveRoot: `/${downloadFolder}`,
            serveStaticOptions: { index: false, maxAge: '1d' },
          },
        ];
      },
    }),

    AuthModule,

    QrCodesModule,
  ],
})
export class AppModule { }
