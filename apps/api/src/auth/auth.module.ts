import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { UsersModule } from '../users/users.module';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { AuthGateService } from './auth-gate.service';
import { TokenService } from './token.service';
import { JwtStrategy } from './strategies/jwt.strategy';
import { SessionCookieGuard } from './guards';
import { readJwtSecret } from './auth.config';
import { TOKEN_ALGORITHM } from './auth.constants';

/**
 * AuthModule — encapsulates all authentication concerns.
 *
 * Provides:
 * - Token issuance and validation (TokenService)
 * - Token → User resolution shared by both transports (AuthGateService)
 * - Passport JWT strategy for the admin API's Authorization header
 * - SessionCookieGuard for the dashboard's `access_token` cookie
 * - POST /token
 *
 * The JwtStrategy is registered here but works globally via Passport:
 * any module can use @UseGuards(JwtAuthGuard) without importing AuthModule.
 * SessionCookieGuard has dependencies, so modules using it import AuthModule.
 */
@Module({
  imports: [
    UsersModule,

    // Passport with JWT as default strategy
    PassportModule.register({ defaultStrategy: 'jwt' }),

    // JWT configuration from environment variables
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        secret: readJwtSecret(configService),
        signOptions: { algorithm: TOKEN_ALGORITHM },
        verifyOptions: { algorithms: [TOKEN_ALGORITHM] },
      }),
    }),
  ],
  controllers: [AuthController],
  providers: [
    AuthService,
    AuthGateService,
    TokenService,
    JwtStrategy,
    SessionCookieGuard,
  ],
  exports: [
    AuthService,
    AuthGateService,
    TokenService,
    SessionCookieGuard,
    PassportModule,
  ],
})
export class AuthModule {}
