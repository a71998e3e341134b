import { Test } from '@nestjs/testing';
import { HealthCheckError } from '@nestjs/terminus';
import { CalendarService } from '../calendar/calendar.service';
import { CalendarHealthIndicator } from './calendar.health';

describe('CalendarHealthIndicator', () => {
  const countMonths = jest.fn<Promise<number>, []>();
  let indicator: CalendarHealthIndicator;

  beforeEach(async () => {
    countMonths.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        CalendarHealthIndicator,
        { provide: CalendarService, useValue: { countMonths } },
      ],
    }).compile();

    indicator = moduleRef.get(CalendarHealthIndicator);
  });

  it('reports the number of months', async () => {
    countMonths.mockResolvedValue(12);

    await expect(indicator.checkMonths('calendar')).resolves.toEqual({
      calendar: { status: 'up', months: 12 },
    });
  });

  it('marks the calendar down when the query fails', async () => {
    countMonths.mockRejectedValue(new Error('database is locked'));

    const failure = indicator.checkMonths('calendar');

    await expect(failure).rejects.toBeInstanceOf(HealthCheckError);
    await expect(failure).rejects.toMatchObject({
      causes: { calendar: { status: 'down', message: 'database is locked' } },
    });
  });
});
