import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * User entity representing authenticated users in the system.
 * Users are created upon their first successful OTP verification.
 */
@Entity('users')
@Index('idx_users_phone', ['phone'])
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /**
   * Canonical E.164 phone number (unique identifier)
   */
  @Column({ unique: true, length: 20 })
  phone!: string;

  /**
   * Set once the user has proven control of the number with an OTP
   */
  @Column({ name: 'phone_verified', default: false })
  phoneVerified!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @Column({ name: 'last_login_at', type: 'timestamptz', nullable: true })
  lastLoginAt!: Date | null;
}
