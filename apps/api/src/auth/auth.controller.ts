import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { AuthService } from './auth.service';
import { TokenRequestDto, TokenResponseDto } from './dto';
import { InvalidCredentialsException } from './exceptions';

/**
 * AuthController — token endpoint for API clients.
 *
 * Routes:
 * - POST /token → Exchange username/password for a bearer token (public)
 *
 * Accepts both `application/x-www-form-urlencoded` (OAuth2 password grant)
 * and JSON bodies.
 */
@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with `{ access_token, token_type: "bearer" }`
   * @throws 401 Unauthorized if credentials are invalid
   */
  @Post('token')
  @HttpCode(HttpStatus.OK)
  async issueToken(
    @Body() dto: TokenRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<TokenResponseDto> {
    const user = await this.authService.verifyCredentials(
      dto.username,
      dto.password,
    );

    if (!user) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      throw new InvalidCredentialsException();
    }

    return this.authService.issueAccessToken(user);
  }
}
