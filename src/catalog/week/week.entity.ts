import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'weeks' })
export class WeekEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  /** `week_<n>` */
  @Column('text', { name: 'week_name', unique: true })
  weekName!: string;

  @Column('integer', { name: 'week_num' })
  weekNum!: number;

  @Column('text', { name: 'display_name' })
  displayName!: string;
}
