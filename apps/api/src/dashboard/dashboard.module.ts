import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CalendarModule } from '../calendar/calendar.module';
import { DashboardController } from './dashboard.controller';

/** DashboardModule — HTML pages behind the session cookie. */
@Module({
  imports: [AuthModule, CalendarModule],
  controllers: [DashboardController],
})
export class DashboardModule {}
