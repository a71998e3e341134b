/**
 * Response shape for POST /token.
 *
 * Follows the OAuth2 token response convention, including its
 * snake_case field names.
 */
export class TokenResponseDto {
  access_token: string;
  token_type: 'bearer';

  constructor(accessToken: string) {
    this.access_token = accessToken;
    this.token_type = 'bearer';
  }
}
