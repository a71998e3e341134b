import {
  Controller,
  Post,
  Put,
  Delete,
  Body,
  Param,
  ParseIntPipe,
  UseGuards,
  HttpCode,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { User } from '@almanac/database';
import { JwtAuthGuard, CurrentUser } from '../auth';
import { CalendarService } from './calendar.service';
import {
  CreateMonthDto,
  MonthNamesDto,
  CreateEventDto,
  CreateEventDetailDto,
  MonthResponseDto,
  EventResponseDto,
  EventDetailResponseDto,
} from './dto';
import {
  MonthNotFoundException,
  EventNotFoundException,
  EventDetailNotFoundException,
} from './exceptions/calendar.exceptions';

/**
 * AdminController — calendar writes.
 *
 * Routes:
 *   POST   /admin/months                  → create a month with nested events
 *   PUT    /admin/months/:id              → rename a month
 *   DELETE /admin/months/:id              → delete a month (cascade)
 *   POST   /admin/months/:id/events       → add an event with details
 *   DELETE /admin/events/:id              → delete an event (cascade)
 *   POST   /admin/events/:id/details      → add a detail to an event
 *   DELETE /admin/details/:id             → delete a detail
 *
 * All routes require a valid JWT access token (Authorization: Bearer <token>)
 * and return the affected entity; a missing id is a 404.
 */
@Controller('admin')
@UseGuards(JwtAuthGuard)
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(private readonly calendarService: CalendarService) {}

  @Post('months')
  @HttpCode(HttpStatus.CREATED)
  async createMonth(
    @Body() dto: CreateMonthDto,
    @CurrentUser() user: User,
  ): Promise<MonthResponseDto> {
    this.logger.log(
      `Create month "${dto.month_en}" requested by ${user.username}`,
    );

    const month = await this.calendarService.createMonth(
      dto.month_bn,
      dto.month_en,
      dto.events,
    );
    return MonthResponseDto.fromEntity(month);
  }

  @Put('months/:id')
  async updateMonth(
    @Param('id', ParseIntPipe) monthId: number,
    @Body() dto: MonthNamesDto,
  ): Promise<MonthResponseDto> {
    const month = await this.calendarService.updateMonth(
      monthId,
      dto.month_bn,
      dto.month_en,
    );

    if (!month) {
      throw new MonthNotFoundException(monthId);
    }

    return MonthResponseDto.fromEntity(month);
  }

  @Delete('months/:id')
  async deleteMonth(
    @Param('id', ParseIntPipe) monthId: number,
    @CurrentUser() user: User,
  ): Promise<MonthResponseDto> {
    const month = await this.calendarService.deleteMonth(monthId);

    if (!month) {
      throw new MonthNotFoundException(monthId);
    }

    this.logger.log(`Month ${monthId} deleted by ${user.username}`);

    return MonthResponseDto.fromEntity(month);
  }

  @Post('months/:id/events')
  @HttpCode(HttpStatus.CREATED)
  async createEvent(
    @Param('id', ParseIntPipe) monthId: number,
    @Body() dto: CreateEventDto,
  ): Promise<EventResponseDto> {
    const event = await this.calendarService.createEvent(
      monthId,
      dto.day,
      dto.details,
    );

    if (!event) {
      throw new MonthNotFoundException(monthId);
    }

    return EventResponseDto.fromEntity(event);
  }

  @Delete('events/:id')
  async deleteEvent(
    @Param('id', ParseIntPipe) eventId: number,
  ): Promise<EventResponseDto> {
    const event = await this.calendarService.deleteEvent(eventId);

    if (!event) {
      throw new EventNotFoundException(eventId);
    }

    return EventResponseDto.fromEntity(event);
  }

  @Post('events/:id/details')
  @HttpCode(HttpStatus.CREATED)
  async addDetail(
    @Param('id', ParseIntPipe) eventId: number,
    @Body() dto: CreateEventDetailDto,
  ): Promise<EventDetailResponseDto> {
    const detail = await this.calendarService.addDetail(eventId, dto.detail);

    if (!detail) {
      throw new EventNotFoundException(eventId);
    }

    return EventDetailResponseDto.fromEntity(detail);
  }

  @Delete('details/:id')
  async deleteDetail(
    @Param('id', ParseIntPipe) detailId: number,
  ): Promise<EventDetailResponseDto> {
    const detail = await this.calendarService.deleteDetail(detailId);

    if (!detail) {
      throw new EventDetailNotFoundException(detailId);
    }

    return EventDetailResponseDto.fromEntity(detail);
  }
}
