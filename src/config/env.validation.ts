import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { IsQrColor } from '../common/colors';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  QR_CODE_DIR?: string;

  @IsOptional()
  @IsQrColor()
  FILL_COLOR?: string;

  @IsOptional()
  @IsQrColor()
  BACK_COLOR?: string;

  @IsOptional()
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true, require_tld: false })
  SERVER_BASE_URL?: string;

  @IsOptional()
  @Matches(/^[A-Za-z0-9_-]+$/, {
    message: 'SERVER_DOWNLOAD_FOLDER must be a single path segment',
  })
  SERVER_DOWNLOAD_FOLDER?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  ADMIN_USER?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  ADMIN_PASSWORD?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  SECRET_KEY?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES?: number;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated);

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return validated;
}
