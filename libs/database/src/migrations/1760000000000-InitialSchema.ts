import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — creates the calendar tables.
 *
 * Tables: users, months, events, event_details
 *
 * Hand-written to match the TypeORM entity definitions. The SQL is
 * PostgreSQL-specific (SERIAL keys); SQLite databases are synchronized
 * from the entities instead.
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "username"      varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_username" UNIQUE ("username")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_username" ON "users" ("username")`,
    );

    // ── Months table ───────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "months" (
        "id"       SERIAL NOT NULL,
        "month_bn" varchar(255) NOT NULL,
        "month_en" varchar(255) NOT NULL,
        CONSTRAINT "PK_months" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_months_month_bn" ON "months" ("month_bn")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_months_month_en" ON "months" ("month_en")`,
    );

    // ── Events table ───────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "events" (
        "id"       SERIAL NOT NULL,
        "month_id" integer NOT NULL,
        "day"      varchar(64) NOT NULL,
        CONSTRAINT "PK_events" PRIMARY KEY ("id"),
        CONSTRAINT "FK_events_month" FOREIGN KEY ("month_id")
          REFERENCES "months"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_events_month_id" ON "events" ("month_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_events_month_day" ON "events" ("month_id", "day")`,
    );

    // ── Event details table ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "event_details" (
        "id"       SERIAL NOT NULL,
        "event_id" integer NOT NULL,
        "detail"   text NOT NULL,
        CONSTRAINT "PK_event_details" PRIMARY KEY ("id"),
        CONSTRAINT "FK_event_details_event" FOREIGN KEY ("event_id")
          REFERENCES "events"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_event_details_event_id" ON "event_details" ("event_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // ── Drop tables (reverse order of creation) ────────────
    await queryRunner.query(`DROP TABLE IF EXISTS "event_details"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "events"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "months"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
