import { Entity, PrimaryColumn, Column, Index, CreateDateColumn } from 'typeorm';

@Entity('employee_permissions')
@Index(['employeeId', 'codename'], { unique: true })
export class EmployeePermission {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'employee_id', type: 'varchar', length: 64 })
  employeeId!: string;

  @Column({ name: 'codename', type: 'varchar', length: 64 })
  codename!: string;

  @Column({ name: 'granted_by', type: 'varchar', length: 64 })
  grantedBy!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
