import { Equals, IsNotEmpty, IsOptional, IsString } from 'class-validator';

// OAuth2 password grant, usually posted as application/x-www-form-urlencoded.
export class TokenRequestDto {
  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;

  @IsOptional()
  @Equals('password')
  grant_type?: string;
}
