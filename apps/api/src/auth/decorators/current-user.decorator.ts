import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { User } from '@almanac/database';
import type { AuthenticatedRequest } from '../interfaces';

/**
 * Parameter decorator that extracts the authenticated user from the request.
 *
 * Usage:
 * ```ts
 * @Delete('months/:id')
 * @UseGuards(JwtAuthGuard)
 * deleteMonth(@CurrentUser() user: User): Promise<MonthResponseDto> { ... }
 * ```
 *
 * Requires JwtAuthGuard; without it request.user is undefined.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): User => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return request.user;
  },
);
