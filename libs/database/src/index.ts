// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Month } from './entities/month.entity';
export { Event } from './entities/event.entity';
export { EventDetail } from './entities/event-detail.entity';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule, ENTITIES } from './database.module';

// ── Configuration ───────────────────────────────────────────
export { createDataSourceOptions } from './database.config';
export type { DatabaseSettings } from './database.config';
