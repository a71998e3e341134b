import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import {
  EntitySubscriberInterface,
  EventSubscriber,
  InsertEvent,
  Repository,
} from 'typeorm';
import {
  ENTITIES,
  DatabaseModule,
  Month,
  Event,
  EventDetail,
} from '@almanac/database';
import { CalendarService } from './calendar.service';

const REJECTED_DETAIL = 'rejected by store';

/** Makes the store refuse one specific detail text mid-transaction */
@EventSubscriber()
class RejectingDetailSubscriber
  implements EntitySubscriberInterface<EventDetail>
{
  listenTo(): typeof EventDetail {
    return EventDetail;
  }

  beforeInsert(event: InsertEvent<EventDetail>): void {
    if (event.entity.detail === REJECTED_DETAIL) {
      throw new Error('detail insert refused');
    }
  }
}

describe('CalendarService', () => {
  let moduleRef: TestingModule;
  let service: CalendarService;
  let eventRepository: Repository<Event>;
  let detailRepository: Repository<EventDetail>;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [...ENTITIES],
          subscribers: [RejectingDetailSubscriber],
          synchronize: true,
        }),
        DatabaseModule.forFeature(),
      ],
      providers: [CalendarService],
    }).compile();

    service = moduleRef.get(CalendarService);
    eventRepository = moduleRef.get(getRepositoryToken(Event));
    detailRepository = moduleRef.get(getRepositoryToken(EventDetail));
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  function detailTexts(month: Month): string[][] {
    return month.events.map((event) =>
      event.details.map((detail) => detail.detail),
    );
  }

  describe('createMonth', () => {
    it('stores the whole tree in insertion order', async () => {
      const month = await service.createMonth('বৈশাখ', 'Boishakh', [
        { day: '১', details: ['first', 'second'] },
        { day: '২', details: [] },
        { day: '৩', details: ['third'] },
      ]);

      expect(month.monthBn).toBe('বৈশাখ');
      expect(month.monthEn).toBe('Boishakh');
      expect(month.events.map((event) => event.day)).toEqual(['১', '২', '৩']);
      expect(detailTexts(month)).toEqual([['first', 'second'], [], ['third']]);
      expect(month.events.every((event) => event.monthId === month.id)).toBe(
        true,
      );

      await expect(service.getMonth(month.id)).resolves.toEqual(month);
    });

    it('rolls back every row when a nested insert fails', async () => {
      await expect(
        service.createMonth('মাস', 'Broken', [
          { day: '1', details: ['kept?'] },
          { day: '2', details: ['fine', REJECTED_DETAIL] },
        ]),
      ).rejects.toThrow('detail insert refused');

      await expect(service.countMonths()).resolves.toBe(0);
      await expect(eventRepository.count()).resolves.toBe(0);
      await expect(detailRepository.count()).resolves.toBe(0);
    });
  });

  describe('listMonths', () => {
    it('pages months by id', async () => {
      for (const name of ['One', 'Two', 'Three', 'Four']) {
        await service.createMonth(`bn-${name}`, name);
      }

      const page = await service.listMonths(1, 2);

      expect(page.map((month) => month.monthEn)).toEqual(['Two', 'Three']);
      expect(page.every((month) => month.events.length === 0)).toBe(true);
    });

    it('attaches each month its own events', async () => {
      await service.createMonth('ক', 'A', [{ day: '1', details: ['a1'] }]);
      await service.createMonth('খ', 'B', [
        { day: '1', details: ['b1'] },
        { day: '2', details: ['b2'] },
      ]);

      const months = await service.listMonths();

      expect(months.map(detailTexts)).toEqual([[['a1']], [['b1'], ['b2']]]);
    });

    it('returns an empty list past the last month', async () => {
      await service.createMonth('ক', 'A');

      await expect(service.listMonths(5, 10)).resolves.toEqual([]);
    });
  });

  describe('getEventsByDate', () => {
    it('prefers an exact match over the Bengali spelling', async () => {
      const month = await service.createMonth('ক', 'A', [
        { day: '12', details: ['ascii'] },
        { day: '১২', details: ['bengali'] },
      ]);

      const ascii = await service.getEventsByDate(month.id, '12');
      const bengali = await service.getEventsByDate(month.id, '১২');

      expect(ascii.map((event) => event.details[0].detail)).toEqual(['ascii']);
      expect(bengali.map((event) => event.details[0].detail)).toEqual([
        'bengali',
      ]);
    });

    it('falls back to Bengali digits when nothing matches', async () => {
      const month = await service.createMonth('ক', 'A', [
        { day: '১২', details: ['holiday'] },
      ]);

      const events = await service.getEventsByDate(month.id, '12');

      expect(events).toHaveLength(1);
      expect(events[0].day).toBe('১২');
      expect(events[0].details.map((detail) => detail.detail)).toEqual([
        'holiday',
      ]);
    });

    it('only searches the requested month', async () => {
      await service.createMonth('ক', 'A', [{ day: '৫', details: ['other'] }]);
      const month = await service.createMonth('খ', 'B');

      await expect(service.getEventsByDate(month.id, '5')).resolves.toEqual(
        [],
      );
    });
  });

  describe('searchDetails', () => {
    it('matches substrings case-insensitively', async () => {
      await service.createMonth('ক', 'A', [
        { day: '1', details: ['XYZabcDEF', 'xy', 'ABC fair'] },
      ]);

      const lower = await service.searchDetails('abc');
      const upper = await service.searchDetails('ABC');

      expect(lower.map((detail) => detail.detail)).toEqual([
        'XYZabcDEF',
        'ABC fair',
      ]);
      expect(upper.map((detail) => detail.detail)).toEqual([
        'XYZabcDEF',
        'ABC fair',
      ]);
    });

    it('returns nothing when no detail contains the query', async () => {
      await service.createMonth('ক', 'A', [{ day: '1', details: ['xy'] }]);

      await expect(service.searchDetails('xyz')).resolves.toEqual([]);
    });
  });

  describe('updateMonth', () => {
    it('renames the month and keeps its events', async () => {
      const month = await service.createMonth('ক', 'Old', [
        { day: '1', details: ['kept'] },
      ]);

      const updated = await service.updateMonth(month.id, 'খ', 'New');

      expect(updated?.monthBn).toBe('খ');
      expect(updated?.monthEn).toBe('New');
      expect(updated ? detailTexts(updated) : null).toEqual([['kept']]);
    });

    it('returns null for an unknown month', async () => {
      await expect(service.updateMonth(404, 'ক', 'A')).resolves.toBeNull();
    });
  });

  describe('deleteMonth', () => {
    it('removes the month with all of its events and details', async () => {
      const doomed = await service.createMonth('ক', 'Doomed', [
        { day: '1', details: ['d1', 'd2'] },
        { day: '2', details: ['d3', 'd4'] },
      ]);
      const survivor = await service.createMonth('খ', 'Survivor', [
        { day: '1', details: ['s1'] },
      ]);

      const deleted = await service.deleteMonth(doomed.id);

      expect(deleted?.monthEn).toBe('Doomed');
      expect(deleted ? detailTexts(deleted) : null).toEqual([
        ['d1', 'd2'],
        ['d3', 'd4'],
      ]);
      await expect(service.getMonth(doomed.id)).resolves.toBeNull();
      await expect(
        eventRepository.count({ where: { monthId: doomed.id } }),
      ).resolves.toBe(0);
      await expect(detailRepository.count()).resolves.toBe(1);
      await expect(service.getMonth(survivor.id)).resolves.toEqual(survivor);
    });

    it('returns null for an unknown month', async () => {
      await expect(service.deleteMonth(404)).resolves.toBeNull();
    });
  });

  describe('events and details', () => {
    it('adds an event with details to an existing month', async () => {
      const month = await service.createMonth('ক', 'A');

      const event = await service.createEvent(month.id, '৭', ['fair', 'music']);

      expect(event?.monthId).toBe(month.id);
      expect(event?.day).toBe('৭');
      expect(event?.details.map((detail) => detail.detail)).toEqual([
        'fair',
        'music',
      ]);
    });

    it('refuses an event for an unknown month', async () => {
      await expect(service.createEvent(404, '1', ['x'])).resolves.toBeNull();
      await expect(eventRepository.count()).resolves.toBe(0);
    });

    it('deletes an event together with its details', async () => {
      const month = await service.createMonth('ক', 'A', [
        { day: '1', details: ['a', 'b'] },
        { day: '2', details: ['c'] },
      ]);

      const deleted = await service.deleteEvent(month.events[0].id);

      expect(deleted?.details.map((detail) => detail.detail)).toEqual([
        'a',
        'b',
      ]);
      await expect(detailRepository.count()).resolves.toBe(1);
      await expect(service.deleteEvent(month.events[0].id)).resolves.toBeNull();
    });

    it('appends and deletes single details', async () => {
      const month = await service.createMonth('ক', 'A', [
        { day: '1', details: ['first'] },
      ]);
      const eventId = month.events[0].id;

      const added = await service.addDetail(eventId, 'second');

      expect(added?.eventId).toBe(eventId);
      expect(added?.detail).toBe('second');

      const [event] = await service.getEventsByDate(month.id, '1');
      expect(event.details.map((detail) => detail.detail)).toEqual([
        'first',
        'second',
      ]);

      const removed = added ? await service.deleteDetail(added.id) : null;

      expect(removed?.detail).toBe('second');
      await expect(detailRepository.count()).resolves.toBe(1);
    });

    it('returns null for unknown events and details', async () => {
      await expect(service.addDetail(404, 'x')).resolves.toBeNull();
      await expect(service.deleteDetail(404)).resolves.toBeNull();
    });
  });
});
