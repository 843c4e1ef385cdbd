export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'processing', 'completed', 'failed'];

/**
 * Allowed transitions for jobs and job items. Terminal states are absorbing;
 * the purge flag is orthogonal and lives outside this table.
 */
export const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** States a row may be in for an update to `to` to apply; used as the guard of every status write. */
export function sourcesFor(to: JobStatus): JobStatus[] {
  return JOB_STATUSES.filter(from => canTransition(from, to));
}
