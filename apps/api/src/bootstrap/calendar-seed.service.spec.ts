import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import * as path from 'path';
import { ENTITIES } from '@almanac/database';
import { UsersService } from '../users/users.service';
import { CalendarService } from '../calendar/calendar.service';
import { BootstrapModule } from './bootstrap.module';
import { CalendarSeedService } from './calendar-seed.service';

const FIXTURES = path.join(__dirname, '..', '..', 'test', 'fixtures');

async function createModule(
  settings: Record<string, string>,
): Promise<TestingModule> {
  return Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [() => ({ BCRYPT_SALT_ROUNDS: '4', ...settings })],
      }),
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        entities: [...ENTITIES],
        synchronize: true,
      }),
      BootstrapModule,
    ],
  }).compile();
}

describe('CalendarSeedService', () => {
  let moduleRef: TestingModule | undefined;

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = undefined;
  });

  it('starts with an empty calendar when the seed file is missing', async () => {
    moduleRef = await createModule({
      ADMIN_PASSWORD: 'test-password',
      CALENDAR_SEED_PATH: path.join(FIXTURES, 'does-not-exist.json'),
    });

    await moduleRef.init();

    await expect(moduleRef.get(CalendarService).countMonths()).resolves.toBe(
      0,
    );
    await expect(
      moduleRef.get(UsersService).findByUsername('admin'),
    ).resolves.not.toBeNull();
  });

  it('loads every month of the seed file once', async () => {
    moduleRef = await createModule({
      CALENDAR_SEED_PATH: path.join(FIXTURES, 'calendar.json'),
    });
    await moduleRef.init();
    const seeder = moduleRef.get(CalendarSeedService);
    const calendar = moduleRef.get(CalendarService);

    await seeder.seedCalendar();

    const months = await calendar.listMonths();
    expect(months.map((month) => month.monthEn)).toEqual([
      'Test Month One',
      'Test Month Two',
    ]);
  });

  it('skips the admin user without a configured password', async () => {
    moduleRef = await createModule({
      ADMIN_USERNAME: 'keeper',
      CALENDAR_SEED_PATH: path.join(FIXTURES, 'does-not-exist.json'),
    });

    await moduleRef.init();

    await expect(
      moduleRef.get(UsersService).findByUsername('keeper'),
    ).resolves.toBeNull();
  });

  it('rejects a seed file with null in place of a list', async () => {
    moduleRef = await createModule({
      CALENDAR_SEED_PATH: path.join(FIXTURES, 'invalid-calendar.json'),
    });
    const seeder = moduleRef.get(CalendarSeedService);

    await expect(seeder.seedCalendar()).rejects.toThrow(
      'months.0.events: events must be an array',
    );
    await expect(moduleRef.get(CalendarService).countMonths()).resolves.toBe(
      0,
    );
  });
});
