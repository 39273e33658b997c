import { Entity, PrimaryColumn, Column, Index, CreateDateColumn, UpdateDateColumn } from 'typeorm';

@Entity('call_logs')
@Index(['employeeId', 'date', 'source'], { unique: true })
export class CallLog {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 64 })
  employeeId!: string;

  @Column({ name: 'date', type: 'varchar', length: 10 })
  date!: string; // YYYY-MM-DD

  @Column({ name: 'duration_minutes', type: 'integer' })
  durationMinutes!: number;

  @Column({ name: 'call_count', type: 'integer', default: 0 })
  callCount!: number;

  @Column({ name: 'source', type: 'varchar', length: 50, default: 'MANUAL' })
  source!: string; // MANUAL | CSV | API | dialer name

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
