import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, ILike, In, Repository } from 'typeorm';
import { Month, Event, EventDetail } from '@almanac/database';
import { toBengaliDigits } from './bengali-digits';
import { DEFAULT_PAGE_SIZE } from './calendar.constants';

/** Input for one event of a nested month create */
export interface NewEvent {
  day: string;
  details: string[];
}

/**
 * CalendarService — reads and writes the Month → Event → EventDetail tree.
 *
 * Every month and event leaves this service with its children loaded and
 * ordered by id (insertion order).
 *
 * Write invariants:
 * - A nested create (month + events + details) commits all rows or none
 * - Deleting a month or event removes its children in the same transaction
 * - Writes against a missing id return null; controllers map that to 404
 *
 * Store failures are logged and rethrown, never retried or suppressed.
 */
@Injectable()
export class CalendarService {
  private readonly logger = new Logger(CalendarService.name);

  constructor(
    @InjectRepository(Month)
    private readonly monthRepository: Repository<Month>,
    @InjectRepository(Event)
    private readonly eventRepository: Repository<Event>,
    @InjectRepository(EventDetail)
    private readonly detailRepository: Repository<EventDetail>,
    private readonly dataSource: DataSource,
  ) {}

  // ── Queries ─────────────────────────────────────────────────

  async listMonths(
    skip: number = 0,
    limit: number = DEFAULT_PAGE_SIZE,
  ): Promise<Month[]> {
    this.logger.debug(`Listing months (skip=${skip}, limit=${limit})`);

    const months = await this.monthRepository.find({
      order: { id: 'ASC' },
      skip,
      take: limit,
    });

    return this.attachEvents(this.dataSource.manager, months);
  }

  async getMonth(monthId: number): Promise<Month | null> {
    return this.loadMonth(this.dataSource.manager, monthId);
  }

  countMonths(): Promise<number> {
    return this.monthRepository.count();
  }

  /**
   * Locale-aware day lookup.
   *
   * Tries `day` verbatim first. Only when nothing matches and `day` contains
   * ASCII digits is the lookup retried with those digits written in Bengali
   * ("12" → "১২"). An exact match always wins over the translated one.
   */
  async getEventsByDate(monthId: number, day: string): Promise<Event[]> {
    const exactMatches = await this.findEventsOnDay(monthId, day);

    if (exactMatches.length > 0) {
      return exactMatches;
    }

    const localizedDay = toBengaliDigits(day);

    if (localizedDay === day) {
      return [];
    }

    this.logger.debug(
      `No events on "${day}" in month ${monthId}, retrying as "${localizedDay}"`,
    );

    return this.findEventsOnDay(monthId, localizedDay);
  }

  /**
   * Case-insensitive substring search over every event detail.
   * The minimum query length is enforced by the request layer.
   */
  searchDetails(query: string): Promise<EventDetail[]> {
    return this.detailRepository.find({
      where: { detail: ILike(`%${query}%`) },
      order: { id: 'ASC' },
    });
  }

  // ── Months ──────────────────────────────────────────────────

  /**
   * Create a month together with its events and their details in one
   * transaction. Any failure rolls back every row of the tree.
   */
  async createMonth(
    monthBn: string,
    monthEn: string,
    events: NewEvent[] = [],
  ): Promise<Month> {
    const month = await this.runInTransaction(
      'create month',
      async (manager) => {
        const savedMonth = await manager.save(
          Month,
          manager.create(Month, { monthBn, monthEn }),
        );

        for (const event of events) {
          await this.insertEvent(manager, savedMonth.id, event);
        }

        const created = await this.loadMonth(manager, savedMonth.id);

        if (!created) {
          throw new Error(`Month ${savedMonth.id} vanished during creation`);
        }

        return created;
      },
    );

    this.logger.log(
      `Month ${month.id} (${month.monthEn}) created with ${month.events.length} events`,
    );

    return month;
  }

  async updateMonth(
    monthId: number,
    monthBn: string,
    monthEn: string,
  ): Promise<Month | null> {
    const month = await this.monthRepository.findOne({
      where: { id: monthId },
    });

    if (!month) {
      return null;
    }

    month.monthBn = monthBn;
    month.monthEn = monthEn;
    await this.monthRepository.save(month);

    this.logger.log(`Month ${monthId} renamed to ${monthBn} / ${monthEn}`);

    return this.getMonth(monthId);
  }

  /**
   * Delete a month with all its events and details.
   *
   * @returns the month as it was before deletion, or null if it did not exist
   */
  async deleteMonth(monthId: number): Promise<Month | null> {
    const deleted = await this.runInTransaction(
      'delete month',
      async (manager) => {
        const month = await this.loadMonth(manager, monthId);

        if (!month) {
          return null;
        }

        const eventIds = month.events.map((event) => event.id);

        if (eventIds.length > 0) {
          await manager.delete(EventDetail, { eventId: In(eventIds) });
        }
        await manager.delete(Event, { monthId });
        await manager.delete(Month, { id: monthId });

        return month;
      },
    );

    if (deleted) {
      this.logger.log(
        `Month ${monthId} deleted (cascade to ${deleted.events.length} events)`,
      );
    }

    return deleted;
  }

  // ── Events ──────────────────────────────────────────────────

  /**
   * @returns the new event with its details, or null if the month does not exist
   */
  async createEvent(
    monthId: number,
    day: string,
    details: string[] = [],
  ): Promise<Event | null> {
    const event = await this.runInTransaction(
      'create event',
      async (manager) => {
        const monthCount = await manager.count(Month, { where: { id: monthId } });

        if (monthCount === 0) {
          return null;
        }

        const eventId = await this.insertEvent(manager, monthId, {
          day,
          details,
        });

        return this.loadEvent(manager, eventId);
      },
    );

    if (event) {
      this.logger.log(`Event ${event.id} (day ${day}) added to month ${monthId}`);
    }

    return event;
  }

  /**
   * @returns the event as it was before deletion, or null if it did not exist
   */
  async deleteEvent(eventId: number): Promise<Event | null> {
    const deleted = await this.runInTransaction(
      'delete event',
      async (manager) => {
        const event = await this.loadEvent(manager, eventId);

        if (!event) {
          return null;
        }

        await manager.delete(EventDetail, { eventId });
        await manager.delete(Event, { id: eventId });

        return event;
      },
    );

    if (deleted) {
      this.logger.log(`Event ${eventId} deleted`);
    }

    return deleted;
  }

  // ── Details ─────────────────────────────────────────────────

  /**
   * @returns the new detail, or null if the event does not exist
   */
  async addDetail(eventId: number, text: string): Promise<EventDetail | null> {
    const eventCount = await this.eventRepository.count({
      where: { id: eventId },
    });

    if (eventCount === 0) {
      return null;
    }

    const detail = await this.detailRepository.save(
      this.detailRepository.create({ eventId, detail: text }),
    );

    this.logger.log(`Detail ${detail.id} added to event ${eventId}`);

    return detail;
  }

  async deleteDetail(detailId: number): Promise<EventDetail | null> {
    const detail = await this.detailRepository.findOne({
      where: { id: detailId },
    });

    if (!detail) {
      return null;
    }

    await this.detailRepository.delete({ id: detailId });

    this.logger.log(`Detail ${detailId} deleted from event ${detail.eventId}`);

    return detail;
  }

  // ── Private helpers ─────────────────────────────────────────

  private async runInTransaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.dataSource.transaction(work);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Transaction failed (${operation}): ${cause.message}`);
      throw error;
    }
  }

  private async insertEvent(
    manager: EntityManager,
    monthId: number,
    event: NewEvent,
  ): Promise<number> {
    const savedEvent = await manager.save(
      Event,
      manager.create(Event, { monthId, day: event.day }),
    );

    if (event.details.length > 0) {
      await manager.save(
        EventDetail,
        event.details.map((detail) =>
          manager.create(EventDetail, { eventId: savedEvent.id, detail }),
        ),
      );
    }

    return savedEvent.id;
  }

  private findEventsOnDay(monthId: number, day: string): Promise<Event[]> {
    return this.eventRepository.find({
      where: { monthId, day },
      relations: { details: true },
      order: { id: 'ASC', details: { id: 'ASC' } },
    });
  }

  private loadEvent(
    manager: EntityManager,
    eventId: number,
  ): Promise<Event | null> {
    return manager.findOne(Event, {
      where: { id: eventId },
      relations: { details: true },
      order: { details: { id: 'ASC' } },
    });
  }

  private async loadMonth(
    manager: EntityManager,
    monthId: number,
  ): Promise<Month | null> {
    const month = await manager.findOne(Month, { where: { id: monthId } });

    if (!month) {
      return null;
    }

    const [withEvents] = await this.attachEvents(manager, [month]);
    return withEvents;
  }

  /**
   * Load the events (and their details) of the given months in one query.
   * Pagination is applied to months beforehand, so the join stays unpaginated.
   */
  private async attachEvents(
    manager: EntityManager,
    months: Month[],
  ): Promise<Month[]> {
    if (months.length === 0) {
      return months;
    }

    const events = await manager.find(Event, {
      where: { monthId: In(months.map((month) => month.id)) },
      relations: { details: true },
      order: { id: 'ASC', details: { id: 'ASC' } },
    });

    for (const month of months) {
      month.events = events.filter((event) => event.monthId === month.id);
    }

    return months;
  }
}
