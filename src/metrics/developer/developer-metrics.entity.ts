import { Column, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import type { ComplexityCounts, RecentPullRequest } from '../rollup.types.js';

@Entity({ name: 'developer_metrics' })
export class DeveloperMetricsEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('integer', { name: 'user_id', unique: true })
  userId!: number;

  @Column('text', { name: 'github_username' })
  githubUsername!: string;

  @Column('integer', { name: 'total_prs', default: 0 })
  totalPrs!: number;

  @Column('integer', { name: 'open_prs', default: 0 })
  openPrs!: number;

  @Column('integer', { name: 'merged_prs', default: 0 })
  mergedPrs!: number;

  @Column('integer', { name: 'closed_prs', default: 0 })
  closedPrs!: number;

  @Column('integer', { name: 'total_rework', default: 0 })
  totalRework!: number;

  @Column('integer', { name: 'total_check_failures', default: 0 })
  totalCheckFailures!: number;

  @Column('jsonb', { name: 'recent_prs', default: () => "'[]'" })
  recentPrs!: RecentPullRequest[];

  @Column('jsonb', { name: 'domain_counts', default: () => "'{}'" })
  domainCounts!: Record<string, number>;

  @Column('jsonb', { name: 'complexity_counts', default: () => "'{}'" })
  complexityCounts!: ComplexityCounts;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
