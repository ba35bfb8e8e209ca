import { Injectable, Logger, OnModuleInit, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcryptjs';
import { AppConfig, DEFAULT_ADMIN_PASSWORD, DEFAULT_SECRET_KEY } from '../config/configuration';
import { TokenRequestDto } from './dto/token-request.dto';

export interface JwtPayload {
  sub: string;
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
}

@Injectable()
export class AuthService implements OnModuleInit {
  private readonly logger = new Logger(AuthService.name);
  private passwordHash = '';

  constructor(
    private readonly jwtService: JwtService,
    private readonly config: ConfigService<AppConfig, true>,
  ) { }

  async onModuleInit() {
    const auth = this.config.get('auth', { infer: true });

    if (auth.secret === DEFAULT_SECRET_KEY) {
      this.logger.warn('SECRET_KEY is not set; tokens are signed with the default key');
    }
    if (auth.adminPassword === DEFAULT_ADMIN_PASSWORD) {
      this.logger.warn('ADMIN_PASSWORD is not set; the default password is active');
    }

    this.passwordHash = await bcrypt.hash(auth.adminPassword, 10);
  }

  async issueToken({ username, password }: TokenRequestDto): Promise<AccessToken> {
    const { adminUser } = this.config.get('auth', { infer: true });

    const valid =
      this.passwordHash !== '' &&
      username === adminUser &&
      (await bcrypt.compare(password, this.passwordHash));

    if (!valid) {
      this.logger.warn(`Rejected login for "${username}"`);
      throw new UnauthorizedException('Incorrect username or password');
    }

    const payload: JwtPayload = { sub: username };
    return {
      access_token: await this.jwtService.signAsync(payload),
      token_type: 'bearer',
    };
  }
}
