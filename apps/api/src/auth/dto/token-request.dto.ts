import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * DTO for POST /token.
 *
 * Accepts the OAuth2 password-grant form fields; only `username` and
 * `password` are used, the rest are tolerated so standard clients work.
 */
export class TokenRequestDto {
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;

  @IsOptional()
  @IsString()
  grant_type?: string;

  @IsOptional()
  @IsString()
  scope?: string;

  @IsOptional()
  @IsString()
  client_id?: string;

  @IsOptional()
  @IsString()
  client_secret?: string;
}
