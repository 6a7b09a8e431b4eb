import { InvalidJobTransitionError } from './errors.js';
import type { JobStatus } from './types.js';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'done', 'failed'];

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['done', 'failed'],
  done: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidJobTransitionError(from, to);
  }
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Statuses a job may be in when moving to `to`, for guarded updates. */
export function sourcesOf(to: JobStatus): JobStatus[] {
  return JOB_STATUSES.filter((from) => TRANSITIONS[from].includes(to));
}
