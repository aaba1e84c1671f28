import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';
import type { ComplexityCounts, ParticipantBreakdown } from '../../metrics/rollup.types.js';

@Entity({ name: 'domains' })
export class DomainEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('text', { name: 'domain_name', unique: true })
  domainName!: string;

  // ---- rollups (written by the metrics pass) ----
  @Column('integer', { name: 'total_tasks', default: 0 })
  totalTasks!: number;

  @Column('integer', { name: 'merged_tasks', default: 0 })
  mergedTasks!: number;

  @Column('integer', { name: 'total_rework', default: 0 })
  totalRework!: number;

  @Column('jsonb', { name: 'status_counts', default: () => "'{}'" })
  statusCounts!: Record<string, number>;

  @Column('jsonb', { name: 'complexity_counts', default: () => "'{}'" })
  complexityCounts!: Partial<ComplexityCounts>;

  @Column('jsonb', { name: 'detailed_metrics', nullable: true })
  detailedMetrics!: ParticipantBreakdown | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
