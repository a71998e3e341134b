import { Type } from 'class-transformer';
import { IsArray, ValidateNested } from 'class-validator';
import { CreateMonthDto } from '../../calendar/dto';

/** Top-level shape of the calendar seed document */
export class CalendarSeedFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CreateMonthDto)
  months!: CreateMonthDto[];
}
