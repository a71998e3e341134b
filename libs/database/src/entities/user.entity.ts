import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * User entity — an administrator allowed to edit the calendar.
 *
 * Invariants:
 * - Username must be unique across all users
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Users are never deleted by the application
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_users_username', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;
}
