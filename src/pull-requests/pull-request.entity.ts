import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import type { Complexity } from '../parsing/title-parser.js';

@Entity({ name: 'pull_requests' })
export class PullRequestEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('bigint', { name: 'github_id', unique: true })
  githubId!: string;

  @Column('integer')
  number!: number;

  @Column('text')
  title!: string;

  @Column('text')
  state!: 'open' | 'closed';

  @Column('boolean', { default: false })
  merged!: boolean;

  @Column('jsonb', { default: () => "'[]'" })
  labels!: string[];

  @Column('text', { name: 'author_login', nullable: true })
  authorLogin!: string | null;

  // GitHub timestamps
  @Index('ix_pull_requests_created_at')
  @Column('timestamptz', { name: 'created_at' })
  createdAt!: Date;

  @Column('timestamptz', { name: 'updated_at' })
  updatedAt!: Date;

  @Column('timestamptz', { name: 'closed_at', nullable: true })
  closedAt!: Date | null;

  @Column('timestamptz', { name: 'merged_at', nullable: true })
  mergedAt!: Date | null;

  // ---- parsed from the title ----
  @Column('integer', { name: 'trainer_id' })
  trainerId!: number;

  @Column('text', { name: 'trainer_name' })
  trainerName!: string;

  @Column('integer', { name: 'domain_id' })
  domainId!: number;

  @Index('ix_pull_requests_domain')
  @Column('text')
  domain!: string;

  @Column('integer', { name: 'interface_id' })
  interfaceId!: number;

  @Column('integer', { name: 'interface_num' })
  interfaceNum!: number;

  @Column('text')
  complexity!: Complexity;

  @Column('text', { name: 'task_timestamp' })
  taskTimestamp!: string;

  // ---- parsed from changed files ----
  @Column('integer', { name: 'week_id', nullable: true })
  weekId!: number | null;

  @Column('integer', { name: 'week_num', nullable: true })
  weekNum!: number | null;

  @Column('text', { name: 'week_name', nullable: true })
  weekName!: string | null;

  @Column('integer', { name: 'pod_id', nullable: true })
  podId!: number | null;

  @Column('text', { name: 'pod_name', nullable: true })
  podName!: string | null;

  // ---- nested data ----
  @Column('integer', { name: 'rework_count', default: 0 })
  reworkCount!: number;

  @Column('integer', { name: 'check_failures', default: 0 })
  checkFailures!: number;

  @Column('integer', { name: 'check_passes', default: 0 })
  checkPasses!: number;

  @Column('text', { name: 'head_sha', nullable: true })
  headSha!: string | null;

  @Column('text', { name: 'merge_commit_sha', nullable: true })
  mergeCommitSha!: string | null;

  // ---- task artifacts ----
  @Column('text', { name: 'task_instruction', nullable: true })
  taskInstruction!: string | null;

  @Column('boolean', { name: 'task_data_missing', default: false })
  taskDataMissing!: boolean;

  @Column('boolean', { name: 'result_data_missing', default: false })
  resultDataMissing!: boolean;

  @Column('integer', { name: 'total_trials', nullable: true })
  totalTrials!: number | null;

  @Column('integer', { name: 'pass_count', nullable: true })
  passCount!: number | null;

  @Column('integer', { name: 'fail_count', nullable: true })
  failCount!: number | null;

  @Column('double precision', { name: 'success_rate', nullable: true })
  successRate!: number | null;

  @Column('text', { name: 'actual_difficulty', nullable: true })
  actualDifficulty!: string | null;

  /** Set once reviews, checks and artifacts were fully recorded. */
  @Column('timestamptz', { name: 'nested_synced_at', nullable: true })
  nestedSyncedAt!: Date | null;

  @Column('timestamptz', { name: 'last_synced' })
  lastSynced!: Date;
}

export type PullRequestValues = Omit<PullRequestEntity, 'id'>;
