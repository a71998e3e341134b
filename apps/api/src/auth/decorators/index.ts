export { CurrentUser } from './current-user.decorator';
export { SessionUser } from './session-user.decorator';
