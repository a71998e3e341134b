/** Signing algorithm for every token issued or accepted by this service */
export const TOKEN_ALGORITHM = 'HS256' as const;

/** Lifetime of a token when the caller does not pass one (dashboard sessions) */
export const DEFAULT_TOKEN_TTL_SECONDS = 15 * 60;

/** Default lifetime of tokens issued by POST /token */
export const DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES = 30;

/** Cookie carrying the dashboard session as `Bearer <token>` */
export const SESSION_COOKIE_NAME = 'access_token';

export const BEARER_PREFIX = 'Bearer ';
