import { Entity, PrimaryColumn, Column, Index, CreateDateColumn } from 'typeorm';

/**
 * One version of the call-minute thresholds.
 * Rows are never edited; a change inserts a new version and deactivates the old one.
 */
@Entity('attendance_configs')
export class AttendanceConfig {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Index({ unique: true })
  @Column({ name: 'version', type: 'integer' })
  version!: number;

  @Column({ name: 'full_day_minutes', type: 'integer' })
  fullDayMinutes!: number;

  @Column({ name: 'half_day_minutes', type: 'integer' })
  halfDayMinutes!: number;

  @Column({ name: 'is_active', type: 'boolean', default: false })
  isActive!: boolean;

  @Column({ name: 'created_by', type: 'varchar', length: 64 })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
