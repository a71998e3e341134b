import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CalendarService } from '../calendar/calendar.service';

/**
 * Reports how many months the calendar holds. An empty calendar is still
 * "up"; only a failing query marks the indicator down.
 */
@Injectable()
export class CalendarHealthIndicator extends HealthIndicator {
  constructor(private readonly calendarService: CalendarService) {
    super();
  }

  async checkMonths(key: string): Promise<HealthIndicatorResult> {
    try {
      const months = await this.calendarService.countMonths();
      return this.getStatus(key, true, { months });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError(
        'Calendar query failed',
        this.getStatus(key, false, { message }),
      );
    }
  }
}
