import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

@Entity('holidays')
export class Holiday {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Index({ unique: true })
  @Column({ name: 'date', type: 'varchar', length: 10 })
  date!: string;

  @Column({ name: 'name', type: 'varchar' })
  name!: string;
}
