import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { AppConfig } from '../config/configuration';
import { AuthService, JwtPayload } from './auth.service';

describe('AuthService', () => {
  const jwtService = new JwtService({ secret: 'test-secret', signOptions: { expiresIn: '30m' } });
  let service: AuthService;

  beforeAll(async () => {
    const config = new ConfigService<AppConfig, true>({
      auth: {
        adminUser: 'admin',
        adminPassword: 'test-password',
        secret: 'test-secret',
        expiresInMinutes: 30,
      },
    });
    service = new AuthService(jwtService, config);
    await service.onModuleInit();
  });

  it('issues a bearer token for the configured account', async () => {
    const token = await service.issueToken({ username: 'admin', password: 'test-password' });

    expect(token.token_type).toBe('bearer');
    const payload = await jwtService.verifyAsync<JwtPayload & { exp: number; iat: number }>(
      token.access_token,
    );
    expect(payload.sub).toBe('admin');
    expect(payload.exp - payload.iat).toBe(30 * 60);
  });

  it('rejects a wrong password', async () => {
    await expect(
      service.issueToken({ username: 'admin', password: 'wrong-password' }),
    ).rejects.toThrow(UnauthorizedException);
  });

  it('rejects an unknown user', async () => {
    await expect(
      service.issueToken({ username: 'someone', password: 'test-password' }),
    ).rejects.toThrow('Incorrect username or password');
  });
});
