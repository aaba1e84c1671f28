import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'check_runs' })
export class CheckRunEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('bigint', { name: 'github_id', unique: true })
  githubId!: string;

  @Index('ix_check_runs_pull_request')
  @Column('integer', { name: 'pull_request_id' })
  pullRequestId!: number;

  @Column('text')
  name!: string;

  @Column('text')
  status!: string;

  @Column('text', { nullable: true })
  conclusion!: string | null;

  @Column('timestamptz', { name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column('timestamptz', { name: 'completed_at', nullable: true })
  completedAt!: Date | null;
}

export type CheckRunValues = Omit<CheckRunEntity, 'id'>;
