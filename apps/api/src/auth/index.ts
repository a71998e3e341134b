// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Services ────────────────────────────────────────────────
export { AuthService } from './auth.service';
export { AuthGateService } from './auth-gate.service';
export { TokenService } from './token.service';

// ── Guards (for use in other feature modules) ───────────────
export { JwtAuthGuard, SessionCookieGuard } from './guards';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser, SessionUser } from './decorators';

// ── Constants ───────────────────────────────────────────────
export { SESSION_COOKIE_NAME, BEARER_PREFIX } from './auth.constants';

// ── Exceptions ──────────────────────────────────────────────
export { InvalidTokenException } from './exceptions';

// ── Interfaces (for typing in other feature modules) ────────
export type {
  TokenClaims,
  AuthenticatedRequest,
  SessionRequest,
} from './interfaces';
