import { randomUUID } from 'crypto';
import {
  assertTransition,
  isTerminal,
  NotFoundError,
  type JobKind,
  type JobOutput,
  type JobParams,
  type JobRecord,
  type JobStatus,
} from 'clipmill';

export interface CreateJobInput {
  kind: JobKind;
  inputs: string[];
  params: JobParams;
}

export type JobStats = Record<JobStatus | 'total', number>;

export interface JobStore {
  readonly name: string;
  create(input: CreateJobInput): Promise<JobRecord>;
  get(id: string): Promise<JobRecord | undefined>;
  setRunning(id: string): Promise<JobRecord>;
  setDone(id: string, output: JobOutput): Promise<JobRecord>;
  setFailed(id: string, code: string, message: string): Promise<JobRecord>;
  stats(): Promise<JobStats>;
  /** Drops finished jobs completed before `cutoff`; returns how many were removed. */
  pruneBefore(cutoff: Date): Promise<number>;
}

export function jobNotFound(id: string): NotFoundError {
  return new NotFoundError(`No job found for id ${id}`, 'JOB_NOT_FOUND');
}

/** Process-local store; records vanish on restart. */
export class MemoryJobStore implements JobStore {
  readonly name = 'memory';
  private readonly jobs = new Map<string, JobRecord>();

  async create(input: CreateJobInput): Promise<JobRecord> {
    const record: JobRecord = {
      id: randomUUID(),
      kind: input.kind,
      status: 'pending',
      inputs: [...input.inputs],
      params: input.params,
      created_at: new Date().toISOString(),
    };
    this.jobs.set(record.id, record);
    return { ...record };
  }

  async get(id: string): Promise<JobRecord | undefined> {
    const record = this.jobs.get(id);
    return record ? { ...record } : undefined;
  }

  async setRunning(id: string): Promise<JobRecord> {
    return this.transition(id, 'running', { started_at: new Date().toISOString() });
  }

  async setDone(id: string, output: JobOutput): Promise<JobRecord> {
    return this.transition(id, 'done', { completed_at: new Date().toISOString(), output });
  }

  async setFailed(id: string, code: string, message: string): Promise<JobRecord> {
    return this.transition(id, 'failed', {
      completed_at: new Date().toISOString(),
      error: { code, message },
    });
  }

  async stats(): Promise<JobStats> {
    const stats: JobStats = { total: 0, pending: 0, running: 0, done: 0, failed: 0 };
    for (const record of this.jobs.values()) {
      stats.total += 1;
      stats[record.status] += 1;
    }
    return stats;
  }

  async pruneBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.jobs) {
      if (!isTerminal(record.status) || !record.completed_at) continue;
      if (Date.parse(record.completed_at) < cutoff.getTime()) {
        this.jobs.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  private transition(id: string, to: JobStatus, patch: Partial<JobRecord>): JobRecord {
    const current = this.jobs.get(id);
    if (!current) throw jobNotFound(id);
    assertTransition(current.status, to);

    const next: JobRecord = { ...current, ...patch, status: to };
    this.jobs.set(id, next);
    return { ...next };
  }
}
