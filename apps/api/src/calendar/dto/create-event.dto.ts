import {
  IsArray,
  IsNotEmpty,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { isPresent } from './is-present';

/**
 * DTO for POST /admin/months/:id/events and for nested events of a month.
 *
 * `day` is kept as text: "5" and "৫" are different values.
 */
export class CreateEventDto {
  @IsString()
  @IsNotEmpty({ message: 'day is required' })
  @MaxLength(64)
  day!: string;

  @ValidateIf(isPresent)
  @IsArray()
  @IsString({ each: true })
  details: string[] = [];
}
