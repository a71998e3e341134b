export type { TokenClaims } from './token-claims.interface';
export type {
  AuthenticatedRequest,
  SessionRequest,
} from './authenticated-request.interface';
