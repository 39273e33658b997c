import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import type { AttendanceStatus, RecordSource } from './AttendanceRecord';

export type AuditAction = 'OVERRIDE' | 'RESET';

/**
 * Append-only trail of manual changes to attendance records.
 * Only the retention purge removes rows.
 */
@Entity('attendance_audit_entries')
@Index(['employeeId', 'date'])
export class AuditEntry {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Index()
  @Column({ name: 'attendance_record_id', type: 'varchar', length: 36 })
  attendanceRecordId!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 64 })
  employeeId!: string;

  @Column({ name: 'date', type: 'varchar', length: 10 })
  date!: string;

  @Column({ name: 'action', type: 'varchar', length: 10 })
  action!: AuditAction;

  // null when the override created the record
  @Column({ name: 'previous_status', type: 'varchar', length: 10, nullable: true })
  previousStatus!: AttendanceStatus | null;

  @Column({ name: 'new_status', type: 'varchar', length: 10 })
  newStatus!: AttendanceStatus;

  @Column({ name: 'previous_minutes', type: 'integer', nullable: true })
  previousMinutes!: number | null;

  @Column({ name: 'new_minutes', type: 'integer' })
  newMinutes!: number;

  @Column({ name: 'previous_source', type: 'varchar', length: 10, nullable: true })
  previousSource!: RecordSource | null;

  @Column({ name: 'new_source', type: 'varchar', length: 10 })
  newSource!: RecordSource;

  @Column({ name: 'reason', type: 'text' })
  reason!: string;

  @Column({ name: 'actor', type: 'varchar', length: 64 })
  actor!: string;

  @Index()
  @Column({ name: 'timestamp' })
  timestamp!: Date;
}
