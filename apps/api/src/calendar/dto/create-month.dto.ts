import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsString,
  MaxLength,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { CreateEventDto } from './create-event.dto';
import { isPresent } from './is-present';

/**
 * DTO for PUT /admin/months/:id — both names are overwritten.
 */
export class MonthNamesDto {
  @IsString()
  @IsNotEmpty({ message: 'month_bn is required' })
  @MaxLength(255)
  month_bn!: string;

  @IsString()
  @IsNotEmpty({ message: 'month_en is required' })
  @MaxLength(255)
  month_en!: string;
}

/**
 * DTO for POST /admin/months — a month with its events and their details,
 * created in one transaction. Also the shape of each month in the seed file.
 */
export class CreateMonthDto extends MonthNamesDto {
  @ValidateIf(isPresent)
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CreateEventDto)
  events: CreateEventDto[] = [];
}
