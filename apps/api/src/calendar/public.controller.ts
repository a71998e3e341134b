import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { CalendarService } from './calendar.service';
import {
  ListMonthsQueryDto,
  SearchQueryDto,
  MonthResponseDto,
  EventResponseDto,
  EventDetailResponseDto,
} from './dto';
import { MonthNotFoundException } from './exceptions/calendar.exceptions';

/**
 * PublicController — read-only calendar API, no authentication.
 *
 * Routes:
 *   GET /api/months                  → paginated months (skip, limit)
 *   GET /api/months/:id              → one month with events and details
 *   GET /api/months/:id/days/:day    → events of a day, ASCII or Bengali digits
 *   GET /api/search?q=               → detail search, q of 3+ characters
 */
@Controller('api')
export class PublicController {
  constructor(private readonly calendarService: CalendarService) {}

  @Get('months')
  async listMonths(
    @Query() query: ListMonthsQueryDto,
  ): Promise<MonthResponseDto[]> {
    const months = await this.calendarService.listMonths(
      query.skip,
      query.limit,
    );
    return months.map((month) => MonthResponseDto.fromEntity(month));
  }

  /**
   * @throws 404 Not Found if the month does not exist
   */
  @Get('months/:id')
  async getMonth(
    @Param('id', ParseIntPipe) monthId: number,
  ): Promise<MonthResponseDto> {
    const month = await this.calendarService.getMonth(monthId);

    if (!month) {
      throw new MonthNotFoundException(monthId);
    }

    return MonthResponseDto.fromEntity(month);
  }

  @Get('months/:id/days/:day')
  async getEventsByDate(
    @Param('id', ParseIntPipe) monthId: number,
    @Param('day') day: string,
  ): Promise<EventResponseDto[]> {
    const events = await this.calendarService.getEventsByDate(monthId, day);
    return events.map((event) => EventResponseDto.fromEntity(event));
  }

  /**
   * @throws 400 Bad Request if q is shorter than 3 characters
   */
  @Get('search')
  async search(
    @Query() query: SearchQueryDto,
  ): Promise<EventDetailResponseDto[]> {
    const details = await this.calendarService.searchDetails(query.q);
    return details.map((detail) => EventDetailResponseDto.fromEntity(detail));
  }
}
