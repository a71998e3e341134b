import {
  Injectable,
  ExecutionContext,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Response } from 'express';

/**
 * JWT Authentication Guard — protects the admin API.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * @Post('months')
 * createMonth(@Body() dto: CreateMonthDto): Promise<MonthResponseDto> { ... }
 * ```
 *
 * Every rejection is a 401 carrying `WWW-Authenticate: Bearer`.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  /**
   * Customize error handling for JWT auth failures.
   *
   * Cases:
   * - No token provided → "Authentication token is missing"
   * - Token expired → "Authentication token has expired"
   * - Token invalid → "Invalid authentication token"
   * - Strategy threw → Forward the strategy's error message
   */
  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
    context: ExecutionContext,
  ): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw this.reject(context, err.message);
    }

    if (!user) {
      const message = this.getFailureMessage(info);
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw this.reject(context, message);
    }

    return user;
  }

  private reject(
    context: ExecutionContext,
    message: string,
  ): UnauthorizedException {
    context
      .switchToHttp()
      .getResponse<Response>()
      .setHeader('WWW-Authenticate', 'Bearer');
    return new UnauthorizedException(message);
  }

  private getFailureMessage(info: Error | undefined): string {
    if (!info) {
      return 'Authentication token is missing';
    }

    if (info.name === 'TokenExpiredError') {
      return 'Authentication token has expired';
    }

    if (info.name === 'JsonWebTokenError') {
      return 'Invalid authentication token';
    }

    if (info.message === 'No auth token') {
      return 'Authentication token is missing';
    }

    return info.message || 'Authentication failed';
  }
}
