import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { createTypeOrmOptions } from '../config/typeorm.config';
import { UsersModule } from '../users/users.module';

/**
 * Minimal application context for command-line maintenance: configuration,
 * the database connection and user management. No HTTP server, no seeding.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createTypeOrmOptions,
    }),
    UsersModule,
  ],
})
export class AdminCliModule {}
