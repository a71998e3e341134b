import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { CalendarModule } from '../calendar/calendar.module';
import { HealthController } from './health.controller';
import { CalendarHealthIndicator } from './calendar.health';

@Module({
  imports: [TerminusModule, CalendarModule],
  controllers: [HealthController],
  providers: [CalendarHealthIndicator],
})
export class HealthModule {}
