import { NotFoundException } from '@nestjs/common';

/**
 * Thrown when a month cannot be found by ID.
 */
export class MonthNotFoundException extends NotFoundException {
  constructor(monthId: number) {
    super(`Month with ID "${monthId}" not found`);
  }
}

/**
 * Thrown when an event cannot be found by ID.
 */
export class EventNotFoundException extends NotFoundException {
  constructor(eventId: number) {
    super(`Event with ID "${eventId}" not found`);
  }
}

/**
 * Thrown when an event detail cannot be found by ID.
 */
export class EventDetailNotFoundException extends NotFoundException {
  constructor(detailId: number) {
    super(`Event detail with ID "${detailId}" not found`);
  }
}
