export { MonthNamesDto, CreateMonthDto } from './create-month.dto';
export { CreateEventDto } from './create-event.dto';
export { CreateEventDetailDto } from './create-event-detail.dto';
export { ListMonthsQueryDto } from './list-months-query.dto';
export { SearchQueryDto } from './search-query.dto';
export {
  MonthResponseDto,
  EventResponseDto,
  EventDetailResponseDto,
} from './calendar-response.dto';
