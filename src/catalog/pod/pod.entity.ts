import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'pods' })
export class PodEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('text', { unique: true })
  name!: string;

  @Column('text', { name: 'display_name' })
  displayName!: string;
}
