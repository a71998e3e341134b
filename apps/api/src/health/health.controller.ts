import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { CalendarHealthIndicator } from './calendar.health';

const DATABASE_PING_TIMEOUT_MS = 3000;

/**
 * GET /health
 *
 * 200 `{ status: "ok", info: { database, calendar: { months } } }` while the
 * store answers, 503 with the failing indicator under `error` otherwise.
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
    private readonly calendar: CalendarHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () =>
        this.db.pingCheck('database', { timeout: DATABASE_PING_TIMEOUT_MS }),
      () => this.calendar.checkMonths('calendar'),
    ]);
  }
}
