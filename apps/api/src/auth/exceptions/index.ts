export { InvalidCredentialsException } from './invalid-credentials.exception';
export { InvalidTokenException } from './invalid-token.exception';
