import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Event } from './event.entity';

/** A single line of free text attached to an event. */
@Entity('event_details')
export class EventDetail {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_event_details_event_id')
  @Column({ type: 'int', name: 'event_id' })
  eventId!: number;

  @Column({ type: 'text' })
  detail!: string;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => Event, (event) => event.details, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'event_id' })
  event!: Event;
}
