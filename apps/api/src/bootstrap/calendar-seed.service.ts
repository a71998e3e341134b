import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { UsersService } from '../users/users.service';
import { CalendarService } from '../calendar/calendar.service';
import { CalendarSeedFileDto } from './dto/calendar-seed-file.dto';

const DEFAULT_ADMIN_USERNAME = 'admin';
const DEFAULT_SEED_PATH = 'data/calendar.json';

/** fs errors from another realm (e.g. a test sandbox) fail `instanceof Error` */
function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function formatValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const propertyPath = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${propertyPath}: ${message}`,
    );
    return [
      ...own,
      ...formatValidationErrors(error.children ?? [], propertyPath),
    ];
  });
}

/**
 * CalendarSeedService — first-run data on application bootstrap.
 *
 * 1. Creates the admin user (ADMIN_USERNAME / ADMIN_PASSWORD) if absent.
 * 2. Loads the calendar document at CALENDAR_SEED_PATH into an empty store.
 *
 * Both steps are skipped when their data already exists, so restarts are
 * no-ops. An invalid seed document aborts startup.
 */
@Injectable()
export class CalendarSeedService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CalendarSeedService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly usersService: UsersService,
    private readonly calendarService: CalendarService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.ensureAdmin();
    await this.seedCalendar();
  }

  async ensureAdmin(): Promise<void> {
    const username = this.configService.get<string>(
      'ADMIN_USERNAME',
      DEFAULT_ADMIN_USERNAME,
    );

    if (await this.usersService.findByUsername(username)) {
      return;
    }

    const password = this.configService.get<string>('ADMIN_PASSWORD');

    if (!password) {
      this.logger.warn(
        `Admin user "${username}" not found and ADMIN_PASSWORD is not set; skipping`,
      );
      return;
    }

    await this.usersService.create(username, password);
    this.logger.log(`Admin user "${username}" created`);
  }

  async seedCalendar(): Promise<void> {
    const monthCount = await this.calendarService.countMonths();

    if (monthCount > 0) {
      this.logger.debug(`Calendar already holds ${monthCount} months`);
      return;
    }

    const seedPath = path.resolve(
      process.cwd(),
      this.configService.get<string>('CALENDAR_SEED_PATH', DEFAULT_SEED_PATH),
    );

    const seed = await this.readSeedFile(seedPath);

    if (!seed) {
      return;
    }

    for (const month of seed.months) {
      await this.calendarService.createMonth(
        month.month_bn,
        month.month_en,
        month.events,
      );
    }

    this.logger.log(`Seeded ${seed.months.length} months from ${seedPath}`);
  }

  private async readSeedFile(
    seedPath: string,
  ): Promise<CalendarSeedFileDto | null> {
    let raw: string;

    try {
      raw = await readFile(seedPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Seed file ${seedPath} not found; skipping`);
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const seed = plainToInstance(CalendarSeedFileDto, parsed);
    const errors = await validate(seed);

    if (errors.length > 0) {
      throw new Error(
        `Invalid seed file ${seedPath}: ${formatValidationErrors(errors).join('; ')}`,
      );
    }

    return seed;
  }
}
