import { Column, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import type { RecentReview } from '../rollup.types.js';

@Entity({ name: 'reviewer_metrics' })
export class ReviewerMetricsEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('integer', { name: 'user_id', unique: true })
  userId!: number;

  @Column('text', { name: 'github_username' })
  githubUsername!: string;

  @Column('integer', { name: 'total_reviews', default: 0 })
  totalReviews!: number;

  @Column('integer', { default: 0 })
  approved!: number;

  @Column('integer', { name: 'changes_requested', default: 0 })
  changesRequested!: number;

  @Column('integer', { default: 0 })
  commented!: number;

  @Column('integer', { default: 0 })
  dismissed!: number;

  @Column('jsonb', { name: 'recent_reviews', default: () => "'[]'" })
  recentReviews!: RecentReview[];

  @Column('jsonb', { name: 'domain_counts', default: () => "'{}'" })
  domainCounts!: Record<string, number>;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
