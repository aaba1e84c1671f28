import { MigrationInterface, QueryRunner } from "typeorm";

export class InitPrSyncSchema1760000000000 implements MigrationInterface {
  name = 'InitPrSyncSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE TABLE IF NOT EXISTS users (
      id              SERIAL PRIMARY KEY,
      github_username TEXT NOT NULL UNIQUE,
      role            TEXT,
      created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS domains (
      id                SERIAL PRIMARY KEY,
      domain_name       TEXT NOT NULL UNIQUE,
      total_tasks       INTEGER NOT NULL DEFAULT 0,
      merged_tasks      INTEGER NOT NULL DEFAULT 0,
      total_rework      INTEGER NOT NULL DEFAULT 0,
      status_counts     JSONB NOT NULL DEFAULT '{}',
      complexity_counts JSONB NOT NULL DEFAULT '{}',
      detailed_metrics  JSONB,
      created_at        TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS interfaces (
      id                   SERIAL PRIMARY KEY,
      domain_id            INTEGER NOT NULL REFERENCES domains(id),
      interface_num        INTEGER NOT NULL,
      total_tasks          INTEGER NOT NULL DEFAULT 0,
      merged_tasks         INTEGER NOT NULL DEFAULT 0,
      total_rework         INTEGER NOT NULL DEFAULT 0,
      status_counts        JSONB NOT NULL DEFAULT '{}',
      complexity_counts    JSONB NOT NULL DEFAULT '{}',
      detailed_metrics     JSONB,
      weekly_stats         JSONB NOT NULL DEFAULT '[]',
      complexity_breakdown JSONB,
      created_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_interface_domain_num UNIQUE (domain_id, interface_num)
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS user_domain_assignments (
      id         SERIAL PRIMARY KEY,
      user_id    INTEGER NOT NULL REFERENCES users(id),
      domain_id  INTEGER NOT NULL REFERENCES domains(id),
      created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_user_domain UNIQUE (user_id, domain_id)
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS weeks (
      id           SERIAL PRIMARY KEY,
      week_name    TEXT NOT NULL UNIQUE,
      week_num     INTEGER NOT NULL,
      display_name TEXT NOT NULL
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS pods (
      id           SERIAL PRIMARY KEY,
      name         TEXT NOT NULL UNIQUE,
      display_name TEXT NOT NULL
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS pull_requests (
      id                  SERIAL PRIMARY KEY,
      github_id           BIGINT NOT NULL UNIQUE,
      number              INTEGER NOT NULL,
      title               TEXT NOT NULL,
      state               TEXT NOT NULL,
      merged              BOOLEAN NOT NULL DEFAULT false,
      labels              JSONB NOT NULL DEFAULT '[]',
      author_login        TEXT,
      created_at          TIMESTAMPTZ NOT NULL,
      updated_at          TIMESTAMPTZ NOT NULL,
      closed_at           TIMESTAMPTZ,
      merged_at           TIMESTAMPTZ,
      trainer_id          INTEGER NOT NULL REFERENCES users(id),
      trainer_name        TEXT NOT NULL,
      domain_id           INTEGER NOT NULL REFERENCES domains(id),
      domain              TEXT NOT NULL,
      interface_id        INTEGER NOT NULL REFERENCES interfaces(id),
      interface_num       INTEGER NOT NULL,
      complexity          TEXT NOT NULL,
      task_timestamp      TEXT NOT NULL,
      week_id             INTEGER REFERENCES weeks(id),
      week_num            INTEGER,
      week_name           TEXT,
      pod_id              INTEGER REFERENCES pods(id),
      pod_name            TEXT,
      rework_count        INTEGER NOT NULL DEFAULT 0,
      check_failures      INTEGER NOT NULL DEFAULT 0,
      check_passes        INTEGER NOT NULL DEFAULT 0,
      head_sha            TEXT,
      merge_commit_sha    TEXT,
      task_instruction    TEXT,
      task_data_missing   BOOLEAN NOT NULL DEFAULT false,
      result_data_missing BOOLEAN NOT NULL DEFAULT false,
      total_trials        INTEGER,
      pass_count          INTEGER,
      fail_count          INTEGER,
      success_rate        DOUBLE PRECISION,
      actual_difficulty   TEXT,
      nested_synced_at    TIMESTAMPTZ,
      last_synced         TIMESTAMPTZ NOT NULL
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_pull_requests_created_at ON pull_requests (created_at)');
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_pull_requests_domain ON pull_requests (domain)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS reviews (
      id              SERIAL PRIMARY KEY,
      github_id       BIGINT NOT NULL UNIQUE,
      pull_request_id INTEGER NOT NULL REFERENCES pull_requests(id) ON DELETE CASCADE,
      reviewer_id     INTEGER REFERENCES users(id),
      reviewer_login  TEXT,
      state           TEXT NOT NULL,
      submitted_at    TIMESTAMPTZ,
      body            TEXT
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_reviews_pull_request ON reviews (pull_request_id)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS check_runs (
      id              SERIAL PRIMARY KEY,
      github_id       BIGINT NOT NULL UNIQUE,
      pull_request_id INTEGER NOT NULL REFERENCES pull_requests(id) ON DELETE CASCADE,
      name            TEXT NOT NULL,
      status          TEXT NOT NULL,
      conclusion      TEXT,
      started_at      TIMESTAMPTZ,
      completed_at    TIMESTAMPTZ
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_check_runs_pull_request ON check_runs (pull_request_id)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS developer_metrics (
      id                   SERIAL PRIMARY KEY,
      user_id              INTEGER NOT NULL UNIQUE REFERENCES users(id),
      github_username      TEXT NOT NULL,
      total_prs            INTEGER NOT NULL DEFAULT 0,
      open_prs             INTEGER NOT NULL DEFAULT 0,
      merged_prs           INTEGER NOT NULL DEFAULT 0,
      closed_prs           INTEGER NOT NULL DEFAULT 0,
      total_rework         INTEGER NOT NULL DEFAULT 0,
      total_check_failures INTEGER NOT NULL DEFAULT 0,
      recent_prs           JSONB NOT NULL DEFAULT '[]',
      domain_counts        JSONB NOT NULL DEFAULT '{}',
      complexity_counts    JSONB NOT NULL DEFAULT '{}',
      updated_at           TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS reviewer_metrics (
      id                SERIAL PRIMARY KEY,
      user_id           INTEGER NOT NULL UNIQUE REFERENCES users(id),
      github_username   TEXT NOT NULL,
      total_reviews     INTEGER NOT NULL DEFAULT 0,
      approved          INTEGER NOT NULL DEFAULT 0,
      changes_requested INTEGER NOT NULL DEFAULT 0,
      commented         INTEGER NOT NULL DEFAULT 0,
      dismissed         INTEGER NOT NULL DEFAULT 0,
      recent_reviews    JSONB NOT NULL DEFAULT '[]',
      domain_counts     JSONB NOT NULL DEFAULT '{}',
      updated_at        TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS sync_state (
      id                       SERIAL PRIMARY KEY,
      last_sync_time           TIMESTAMPTZ,
      last_full_sync_time      TIMESTAMPTZ,
      total_prs_synced         INTEGER NOT NULL DEFAULT 0,
      total_users_created      INTEGER NOT NULL DEFAULT 0,
      total_domains_created    INTEGER NOT NULL DEFAULT 0,
      total_interfaces_created INTEGER NOT NULL DEFAULT 0,
      last_sync_pr_count       INTEGER NOT NULL DEFAULT 0,
      last_sync_duration       INTEGER NOT NULL DEFAULT 0,
      sync_type                TEXT,
      last_sync_status         TEXT NOT NULL DEFAULT 'success',
      last_error               TEXT,
      created_at               TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at               TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const table of [
      'sync_state',
      'reviewer_metrics',
      'developer_metrics',
      'check_runs',
      'reviews',
      'pull_requests',
      'pods',
      'weeks',
      'user_domain_assignments',
      'interfaces',
      'domains',
      'users',
    ]) {
      await queryRunner.query(`DROP TABLE IF EXISTS ${table}`);
    }
  }
}
