import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, DeleteDateColumn } from 'typeorm';

export type AppRole = 'employee' | 'admin';

@Entity('employees')
export class Employee {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 64 })
  id!: string;

  @Column({ name: 'name', type: 'varchar' })
  name!: string;

  @Column({ name: 'email', type: 'varchar', nullable: true })
  email!: string | null;

  @Column({ name: 'department', type: 'varchar', nullable: true })
  department!: string | null;

  // free text from the org chart, e.g. "Team Leader - Collections"
  @Column({ name: 'job_position', type: 'varchar', nullable: true })
  jobPosition!: string | null;

  @Column({ name: 'app_role', type: 'varchar', length: 16, default: 'employee' })
  appRole!: AppRole;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ name: 'password_hash', type: 'varchar', nullable: true, select: false })
  passwordHash!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @DeleteDateColumn({ name: 'deleted_at', nullable: true })
  deletedAt?: Date;
}
