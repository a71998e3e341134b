import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { Month } from './month.entity';
import { EventDetail } from './event-detail.entity';

/**
 * Event entity — a calendar day within a month that carries details.
 *
 * Invariants:
 * - Every event belongs to exactly one month
 * - `day` is free text: it may hold ASCII digits ("5") or Bengali digits ("৫")
 *   and is only ever compared by string equality
 * - Deleting an event cascades to its details
 */
@Entity('events')
@Index('IDX_events_month_day', ['monthId', 'day'])
export class Event {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_events_month_id')
  @Column({ type: 'int', name: 'month_id' })
  monthId!: number;

  @Column({ type: 'varchar', length: 64 })
  day!: string;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Month, (month) => month.events, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'month_id' })
  month!: Month;

  @OneToMany(() => EventDetail, (detail) => detail.event, { cascade: false })
  details!: EventDetail[];
}
