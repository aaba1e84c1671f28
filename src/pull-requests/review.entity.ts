import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

export type ReviewState = 'approved' | 'changes_requested' | 'commented' | 'dismissed';

@Entity({ name: 'reviews' })
export class ReviewEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('bigint', { name: 'github_id', unique: true })
  githubId!: string;

  @Index('ix_reviews_pull_request')
  @Column('integer', { name: 'pull_request_id' })
  pullRequestId!: number;

  @Column('integer', { name: 'reviewer_id', nullable: true })
  reviewerId!: number | null;

  @Column('text', { name: 'reviewer_login', nullable: true })
  reviewerLogin!: string | null;

  @Column('text')
  state!: ReviewState;

  @Column('timestamptz', { name: 'submitted_at', nullable: true })
  submittedAt!: Date | null;

  @Column('text', { nullable: true })
  body!: string | null;
}

export type ReviewValues = Omit<ReviewEntity, 'id'>;
