import { Module } from '@nestjs/common';
import { DatabaseModule } from '@almanac/database';
import { CalendarService } from './calendar.service';
import { PublicController } from './public.controller';
import { AdminController } from './admin.controller';

/**
 * CalendarModule — months, events and details.
 *
 * Public reads live under /api, bearer-protected writes under /admin.
 * CalendarService is exported for the dashboard and the bootstrap seeder.
 *
 * DataSource (used directly for transactions) is provided globally by
 * TypeOrmModule.forRootAsync() in AppModule.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  controllers: [PublicController, AdminController],
  providers: [CalendarService],
  exports: [CalendarService],
})
export class CalendarModule {}
