import { randomUUID } from 'crypto';
import {
  InvalidJobTransitionError,
  JOB_STATUSES,
  isTerminal,
  sourcesOf,
  type JobKind,
  type JobOutput,
  type JobParams,
  type JobRecord,
  type JobStatus,
} from 'clipmill';
import type { SqlClient } from '../db/client.js';
import { jobNotFound, type CreateJobInput, type JobStats, type JobStore } from './jobStore.js';

export type JobRow = {
  id: string;
  kind: string;
  status: string;
  inputs: string[];
  params: JobParams;
  output_filename: string | null;
  download_url: string | null;
  size_bytes: number | string | null;
  sha256: string | null;
  error_code: string | null;
  error_message: string | null;
  created_at: Date | string;
  started_at: Date | string | null;
  completed_at: Date | string | null;
};

function toInt(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toIso(value: Date | string | null): string | undefined {
  if (value === null) return undefined;
  return new Date(value).toISOString();
}

function toStatus(value: string): JobStatus {
  const status = JOB_STATUSES.find((candidate) => candidate === value);
  if (!status) throw new Error(`Unknown job status in database: ${value}`);
  return status;
}

function toKind(value: string): JobKind {
  if (value === 'merge' || value === 'convert') return value;
  throw new Error(`Unknown job kind in database: ${value}`);
}

export class PostgresJobStore implements JobStore {
  readonly name = 'postgres';

  constructor(private readonly db: SqlClient) {}

  private toRecord(row: JobRow): JobRecord {
    const sizeBytes = toInt(row.size_bytes);
    const record: JobRecord = {
      id: row.id,
      kind: toKind(row.kind),
      status: toStatus(row.status),
      inputs: row.inputs,
      params: row.params,
      created_at: toIso(row.created_at) ?? new Date(0).toISOString(),
      started_at: toIso(row.started_at),
      completed_at: toIso(row.completed_at),
    };

    if (row.output_filename && row.download_url && sizeBytes !== undefined && row.sha256) {
      record.output = {
        filename: row.output_filename,
        download_url: row.download_url,
        size_bytes: sizeBytes,
        sha256: row.sha256,
      };
    }
    if (row.error_code && row.error_message) {
      record.error = { code: row.error_code, message: row.error_message };
    }
    return record;
  }

  async create(input: CreateJobInput): Promise<JobRecord> {
    const rows = await this.db.query<JobRow>(
      `
        insert into clipmill_jobs (id, kind, status, inputs, params, created_at)
        values ($1, $2, 'pending', $3::jsonb, $4::jsonb, $5)
        returning *
      `,
      [randomUUID(), input.kind, JSON.stringify(input.inputs), JSON.stringify(input.params), new Date().toISOString()],
    );
    const row = rows[0];
    if (!row) throw new Error('Job insert returned no row');
    return this.toRecord(row);
  }

  async get(id: string): Promise<JobRecord | undefined> {
    const rows = await this.db.query<JobRow>(
      `
        select *
        from clipmill_jobs
        where id = $1
        limit 1
      `,
      [id],
    );
    return rows[0] ? this.toRecord(rows[0]) : undefined;
  }

  async setRunning(id: string): Promise<JobRecord> {
    return this.transition(
      id,
      'running',
      `
        update clipmill_jobs
        set status = 'running', started_at = $3
        where id = $1 and status = any($2::text[])
        returning *
      `,
      [new Date().toISOString()],
    );
  }

  async setDone(id: string, output: JobOutput): Promise<JobRecord> {
    return this.transition(
      id,
      'done',
      `
        update clipmill_jobs
        set
          status = 'done',
          completed_at = $3,
          output_filename = $4,
          download_url = $5,
          size_bytes = $6,
          sha256 = $7,
          error_code = null,
          error_message = null
        where id = $1 and status = any($2::text[])
        returning *
      `,
      [new Date().toISOString(), output.filename, output.download_url, output.size_bytes, output.sha256],
    );
  }

  async setFailed(id: string, code: string, message: string): Promise<JobRecord> {
    return this.transition(
      id,
      'failed',
      `
        update clipmill_jobs
        set
          status = 'failed',
          completed_at = $3,
          error_code = $4,
          error_message = $5
        where id = $1 and status = any($2::text[])
        returning *
      `,
      [new Date().toISOString(), code, message],
    );
  }

  async stats(): Promise<JobStats> {
    const [row] = await this.db.query<{
      total: string;
      pending: string;
      running: string;
      done: string;
      failed: string;
    }>(`
      select
        count(*)::text as total,
        count(*) filter (where status = 'pending')::text as pending,
        count(*) filter (where status = 'running')::text as running,
        count(*) filter (where status = 'done')::text as done,
        count(*) filter (where status = 'failed')::text as failed
      from clipmill_jobs
    `);

    return {
      total: Number.parseInt(row?.total || '0', 10),
      pending: Number.parseInt(row?.pending || '0', 10),
      running: Number.parseInt(row?.running || '0', 10),
      done: Number.parseInt(row?.done || '0', 10),
      failed: Number.parseInt(row?.failed || '0', 10),
    };
  }

  async pruneBefore(cutoff: Date): Promise<number> {
    const rows = await this.db.query<{ id: string }>(
      `
        delete from clipmill_jobs
        where status = any($1::text[]) and completed_at < $2
        returning id
      `,
      [JOB_STATUSES.filter(isTerminal), cutoff.toISOString()],
    );
    return rows.length;
  }

  /** Guarded update: applies only while the job is in a legal source status. */
  private async transition(id: string, to: JobStatus, sql: string, values: unknown[]): Promise<JobRecord> {
    const rows = await this.db.query<JobRow>(sql, [id, sourcesOf(to), ...values]);
    const row = rows[0];
    if (row) return this.toRecord(row);

    const current = await this.get(id);
    if (!current) throw jobNotFound(id);
    throw new InvalidJobTransitionError(current.status, to);
  }
}
