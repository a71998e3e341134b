/**
 * Claims carried by every token.
 *
 * `sub` follows the JWT standard claim for subject identifier and holds the
 * username; `iat` and `exp` are set by the signer.
 */
export interface TokenClaims {
  sub: string;
  iat?: number;
  exp?: number;
}
