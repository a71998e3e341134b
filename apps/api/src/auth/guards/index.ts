export { JwtAuthGuard } from './jwt-auth.guard';
export { SessionCookieGuard } from './session-cookie.guard';
