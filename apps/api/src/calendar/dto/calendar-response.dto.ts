import type { Month, Event, EventDetail } from '@almanac/database';

/**
 * Public shapes of the calendar entities.
 *
 * Field names are snake_case on the wire. Each DTO is built through its
 * static factory so that only the listed fields ever leave the service.
 */
export class EventDetailResponseDto {
  id: number;
  detail: string;
  event_id: number;

  private constructor(id: number, detail: string, eventId: number) {
    this.id = id;
    this.detail = detail;
    this.event_id = eventId;
  }

  static fromEntity(detail: EventDetail): EventDetailResponseDto {
    return new EventDetailResponseDto(detail.id, detail.detail, detail.eventId);
  }
}

export class EventResponseDto {
  id: number;
  day: string;
  month_id: number;
  details: EventDetailResponseDto[];

  private constructor(
    id: number,
    day: string,
    monthId: number,
    details: EventDetailResponseDto[],
  ) {
    this.id = id;
    this.day = day;
    this.month_id = monthId;
    this.details = details;
  }

  /** Requires `details` to be loaded. */
  static fromEntity(event: Event): EventResponseDto {
    return new EventResponseDto(
      event.id,
      event.day,
      event.monthId,
      event.details.map((detail) => EventDetailResponseDto.fromEntity(detail)),
    );
  }
}

export class MonthResponseDto {
  id: number;
  month_bn: string;
  month_en: string;
  events: EventResponseDto[];

  private constructor(
    id: number,
    monthBn: string,
    monthEn: string,
    events: EventResponseDto[],
  ) {
    this.id = id;
    this.month_bn = monthBn;
    this.month_en = monthEn;
    this.events = events;
  }

  /** Requires `events` and their `details` to be loaded. */
  static fromEntity(month: Month): MonthResponseDto {
    return new MonthResponseDto(
      month.id,
      month.monthBn,
      month.monthEn,
      month.events.map((event) => EventResponseDto.fromEntity(event)),
    );
  }
}
