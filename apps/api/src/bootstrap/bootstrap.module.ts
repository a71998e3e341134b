import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { CalendarModule } from '../calendar/calendar.module';
import { CalendarSeedService } from './calendar-seed.service';

@Module({
  imports: [UsersModule, CalendarModule],
  providers: [CalendarSeedService],
})
export class BootstrapModule {}
