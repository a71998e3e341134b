import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const DEFAULT_PORT = 4000;

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  configureApp(app);

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>(
    'CORS_ORIGIN',
    'http://localhost:3000',
  );
  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });

  // Closes the shared DataSource on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const configuredPort = parseInt(
    configService.get<string>('PORT', String(DEFAULT_PORT)),
    10,
  );
  const port = Number.isInteger(configuredPort) ? configuredPort : DEFAULT_PORT;
  await app.listen(port);

  logger.log(`Calendar API running on http://localhost:${port}`);
  logger.log(`Dashboard: http://localhost:${port}/dashboard`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    'Failed to start the calendar API',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
