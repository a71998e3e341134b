import { INestApplication, ValidationPipe } from '@nestjs/common';
import cookieParser from 'cookie-parser';

/**
 * Request pipeline shared by main.ts and the end-to-end specs.
 */
export function configureApp(app: INestApplication): INestApplication {
  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // ── Cookies (dashboard session) ───────────────────────
  app.use(cookieParser());

  return app;
}
