import { IsString, MinLength } from 'class-validator';
import { SEARCH_MIN_QUERY_LENGTH } from '../calendar.constants';

export class SearchQueryDto {
  @IsString()
  @MinLength(SEARCH_MIN_QUERY_LENGTH, {
    message: `q must be at least ${SEARCH_MIN_QUERY_LENGTH} characters long`,
  })
  q!: string;
}
