import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../calendar.constants';

/**
 * Query string of GET /api/months. Values arrive as strings and are
 * converted by the global ValidationPipe (enableImplicitConversion).
 */
export class ListMonthsQueryDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  skip: number = 0;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  limit: number = DEFAULT_PAGE_SIZE;
}
