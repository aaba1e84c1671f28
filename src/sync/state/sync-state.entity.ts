import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

export type SyncType = 'full' | 'incremental' | 'window' | 'quick';
export type SyncRunStatus = 'running' | 'success' | 'failed';

/** Single-row checkpoint read by the planner. */
@Entity({ name: 'sync_state' })
export class SyncStateEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('timestamptz', { name: 'last_sync_time', nullable: true })
  lastSyncTime!: Date | null;

  @Column('timestamptz', { name: 'last_full_sync_time', nullable: true })
  lastFullSyncTime!: Date | null;

  @Column('integer', { name: 'total_prs_synced', default: 0 })
  totalPrsSynced!: number;

  @Column('integer', { name: 'total_users_created', default: 0 })
  totalUsersCreated!: number;

  @Column('integer', { name: 'total_domains_created', default: 0 })
  totalDomainsCreated!: number;

  @Column('integer', { name: 'total_interfaces_created', default: 0 })
  totalInterfacesCreated!: number;

  @Column('integer', { name: 'last_sync_pr_count', default: 0 })
  lastSyncPrCount!: number;

  // seconds
  @Column('integer', { name: 'last_sync_duration', default: 0 })
  lastSyncDuration!: number;

  @Column('text', { name: 'sync_type', nullable: true })
  syncType!: SyncType | null;

  @Column('text', { name: 'last_sync_status', default: 'success' })
  lastSyncStatus!: SyncRunStatus;

  @Column('text', { name: 'last_error', nullable: true })
  lastError!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}

/** The persisted fields, without the surrogate id and bookkeeping timestamps. */
export type SyncStateSnapshot = Omit<SyncStateEntity, 'id' | 'createdAt' | 'updatedAt'>;
