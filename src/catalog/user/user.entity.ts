import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';

export type UserRole = 'trainer' | 'pod_lead' | 'calibrator' | 'admin';

@Entity({ name: 'users' })
export class UserEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('text', { name: 'github_username', unique: true })
  githubUsername!: string;

  // null until assigned by the hierarchy import or first authored PR
  @Column('text', { nullable: true })
  role!: UserRole | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
