import type { SqlClient } from './client.js';

/**
 * Creates the job table if it does not already exist. Move these statements
 * into versioned migrations once the schema starts changing.
 */
export async function initializeSchema(db: SqlClient): Promise<{ initialized: boolean }> {
  await db.query(`
    create table if not exists clipmill_jobs (
      id text primary key,
      kind text not null,
      status text not null,
      inputs jsonb not null,
      params jsonb not null,
      output_filename text null,
      download_url text null,
      size_bytes bigint null,
      sha256 text null,
      error_code text null,
      error_message text null,
      created_at timestamptz not null,
      started_at timestamptz null,
      completed_at timestamptz null
    );
  `);
  await db.query(`
    create index if not exists idx_clipmill_jobs_status_created
      on clipmill_jobs (status, created_at);
  `);

  return { initialized: true };
}
