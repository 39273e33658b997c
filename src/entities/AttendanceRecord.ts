import { Entity, PrimaryColumn, Column, Index, CreateDateColumn, UpdateDateColumn } from 'typeorm';

export const ATTENDANCE_STATUSES = ['PRESENT', 'HALF_DAY', 'ABSENT'] as const;
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

export const RECORD_SOURCES = ['AUTO', 'MANUAL'] as const;
export type RecordSource = (typeof RECORD_SOURCES)[number];

@Entity('attendance_records')
@Index(['employeeId', 'date'], { unique: true })
export class AttendanceRecord {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 64 })
  employeeId!: string;

  @Index()
  @Column({ name: 'date', type: 'varchar', length: 10 })
  date!: string; // YYYY-MM-DD

  @Column({ name: 'status', type: 'varchar', length: 10 })
  status!: AttendanceStatus;

  @Column({ name: 'minutes', type: 'integer' })
  minutes!: number;

  @Column({ name: 'call_count', type: 'integer', default: 0 })
  callCount!: number;

  @Column({ name: 'source', type: 'varchar', length: 10 })
  source!: RecordSource;

  // thresholds version that produced an AUTO status
  @Column({ name: 'config_version', type: 'integer', nullable: true })
  configVersion!: number | null;

  @Column({ name: 'reason', type: 'text', nullable: true })
  reason!: string | null;

  @Column({ name: 'updated_by', type: 'varchar', length: 64, nullable: true })
  updatedBy!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
