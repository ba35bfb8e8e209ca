import { resolve } from 'path';
import { ConfigModuleOptions } from '@nestjs/config';
import { toHexColor } from '../common/colors';
import { validateEnvironment } from './env.validation';

export const DEFAULT_SECRET_KEY = 'change-me';
export const DEFAULT_ADMIN_PASSWORD = 'secret';

export interface AppConfig {
  port: number;
  qr: {
    directory: string;
    fillColor: string;
    backColor: string;
  };
  server: {
    baseUrl: string;
    downloadFolder: string;
  };
  auth: {
    adminUser: string;
    adminPassword: string;
    secret: string;
    expiresInMinutes: number;
  };
}

function colorFrom(value: string | undefined, fallback: string): string {
  const hex = toHexColor(value ?? fallback);
  if (hex === undefined) {
    throw new Error(`Unknown color: ${value}`);
  }
  return hex;
}

export function configuration(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const vars = validateEnvironment(env);

  return {
    port: vars.PORT ?? 8000,
    qr: {
      directory: resolve(vars.QR_CODE_DIR ?? './qr_codes'),
      fillColor: colorFrom(vars.FILL_COLOR, 'red'),
      backColor: colorFrom(vars.BACK_COLOR, 'white'),
    },
    server: {
      baseUrl: (vars.SERVER_BASE_URL ?? 'http://localhost:80').replace(/\/+$/, ''),
      downloadFolder: vars.SERVER_DOWNLOAD_FOLDER ?? 'downloads',
    },
    auth: {
      adminUser: vars.ADMIN_USER ?? 'admin',
      adminPassword: vars.ADMIN_PASSWORD ?? DEFAULT_ADMIN_PASSWORD,
      secret: vars.SECRET_KEY ?? DEFAULT_SECRET_KEY,
      expiresInMinutes: vars.ACCESS_TOKEN_EXPIRE_MINUTES ?? 30,
    },
  };
}

export const configModuleOptions: ConfigModuleOptions = {
  isGlobal: true,
  load: [() => configuration()],
  validate: validateEnvironment,
};
