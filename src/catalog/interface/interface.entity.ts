import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';
import type {
  ComplexityBreakdown,
  ComplexityCounts,
  ParticipantBreakdown,
  WeeklyBucket,
} from '../../metrics/rollup.types.js';

@Entity({ name: 'interfaces' })
@Unique('uq_interface_domain_num', ['domainId', 'interfaceNum'])
export class InterfaceEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('integer', { name: 'domain_id' })
  domainId!: number;

  @Column('integer', { name: 'interface_num' })
  interfaceNum!: number;

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

  @Column('jsonb', { name: 'weekly_stats', default: () => "'[]'" })
  weeklyStats!: WeeklyBucket[];

  @Column('jsonb', { name: 'complexity_breakdown', nullable: true })
  complexityBreakdown!: ComplexityBreakdown | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
