import { Entity, PrimaryGeneratedColumn, Column, OneToMany, Index } from 'typeorm';
import { Event } from './event.entity';

/**
 * Month entity — one named month of the calendar.
 *
 * Invariants:
 * - `month_bn` holds the localized (Bengali) name, `month_en` the English one
 * - Events are ordered by id, i.e. insertion order
 * - Deleting a month cascades to all its events and their details
 */
@Entity('months')
export class Month {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_months_month_bn')
  @Column({ type: 'varchar', length: 255, name: 'month_bn' })
  monthBn!: string;

  @Index('IDX_months_month_en')
  @Column({ type: 'varchar', length: 255, name: 'month_en' })
  monthEn!: string;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Event, (event) => event.month, { cascade: false })
  events!: Event[];
}
