import { randomUUID } from 'node:crypto';
import type { JobError } from './errors.js';
import type { Logger } from './logger.js';
import type { DownloadRequest } from './validate.js';

/**
 * Job states during lifecycle
 */
export type JobState = 'queued' | 'running' | 'merging' | 'completed' | 'failed' | 'cancelled';

export const JOB_STATES: readonly JobState[] = ['queued', 'running', 'merging', 'completed', 'failed', 'cancelled'];

export type TerminalJobState = Extract<JobState, 'completed' | 'failed' | 'cancelled'>;

export interface JobResult {
  path: string;
  filename: string;
  size: number;
}

/**
 * Canonical job record. Callers only ever receive copies.
 */
export interface JobRecord {
  id: string;
  request: DownloadRequest;
  state: JobState;
  progress: number;
  result?: JobResult;
  error?: JobError;
  createdAt: number;
  updatedAt: number;
  cancelRequested: boolean;
  attempts: number;
}

export type JobMutation =
  | { type: 'start' }
  | { type: 'merging' }
  | { type: 'progress'; progress: number }
  | { type: 'attempt' }
  | { type: 'complete'; result: JobResult }
  | { type: 'fail'; error: JobError }
  | { type: 'cancel' };

export type CancelOutcome = 'ok' | 'not_found' | 'already_terminal';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ['running', 'cancelled'],
  running: ['merging', 'completed', 'failed', 'cancelled'],
  merging: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const TARGET: Partial<Record<JobMutation['type'], JobState>> = {
  start: 'running',
  merging: 'merging',
  complete: 'completed',
  fail: 'failed',
  cancel: 'cancelled',
};

export function isTerminal(state: JobState): state is TerminalJobState {
  return TRANSITIONS[state].length === 0;
}

export type JobRegistryOptions = {
  log: Logger;
  now?: () => number;
  newId?: () => string;
};

/**
 * Job Registry - authoritative store of job records
 *
 * Every mutation is applied synchronously to a single record, so each one is
 * atomic with respect to other requests and unrelated jobs never contend.
 * Terminal states are final: the first terminal transition wins and any later
 * one is rejected.
 */
export class JobRegistry {
  private jobs = new Map<string, JobRecord>();
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(options: JobRegistryOptions) {
    this.log = options.log;
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? randomUUID;
  }

  create(request: DownloadRequest): JobRecord {
    const ts = this.now();
    const job: JobRecord = {
      id: this.newId(),
      request: structuredClone(request),
      state: 'queued',
      progress: 0,
      createdAt: ts,
      updatedAt: ts,
      cancelRequested: false,
      attempts: 0,
    };
    this.jobs.set(job.id, job);
    this.log.info('job_created', { id: job.id, url: request.url, merge: request.merge });
    return structuredClone(job);
  }

  get(id: string): JobRecord | undefined {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : undefined;
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  isCancelRequested(id: string): boolean {
    return this.jobs.get(id)?.cancelRequested ?? false;
  }

  /**
   * Flag a job for cancellation. The executing worker observes the flag; the
   * state itself only changes through `update`.
   */
  requestCancel(id: string): CancelOutcome {
    const job = this.jobs.get(id);
    if (!job) return 'not_found';
    if (isTerminal(job.state)) return 'already_terminal';
    if (!job.cancelRequested) {
      job.cancelRequested = true;
      job.updatedAt = this.now();
      this.log.info('job_cancel_requested', { id, state: job.state });
    }
    return 'ok';
  }

  /**
   * Apply a worker mutation. Returns false when the job is unknown or the
   * mutation is not legal from the current state.
   */
  update(id: string, mutation: JobMutation): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;

    const target = TARGET[mutation.type];
    if (target) {
      if (!TRANSITIONS[job.state].includes(target)) {
        this.log.debug('job_transition_rejected', { id, from: job.state, to: target });
        return false;
      }
    } else if (job.state !== 'running' && job.state !== 'merging') {
      return false;
    }

    switch (mutation.type) {
      case 'progress': {
        const value = Math.max(0, Math.min(100, mutation.progress));
        if (!(value > job.progress)) return false;
        job.progress = value;
        break;
      }
      case 'attempt':
        job.attempts += 1;
        break;
      case 'complete':
        job.result = { ...mutation.result };
        job.progress = 100;
        break;
      case 'fail':
        job.error = { ...mutation.error };
        break;
      case 'start':
      case 'merging':
      case 'cancel':
        break;
    }

    const from = job.state;
    if (target) job.state = target;
    job.updatedAt = this.now();

    if (target && isTerminal(target)) {
      const level = target === 'failed' ? 'warn' : 'info';
      this.log[level]('job_finished', { id, state: target, from, error: job.error });
    } else if (target) {
      this.log.debug('job_transition', { id, from, to: target });
    }
    return true;
  }

  list(): JobRecord[] {
    return Array.from(this.jobs.values(), (job) => structuredClone(job));
  }

  /** Remove terminal jobs not touched for `olderThanMs`. Non-terminal jobs are never evicted. */
  evictTerminal(olderThanMs: number): number {
    const cutoff = this.now() - olderThanMs;
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.state) && job.updatedAt <= cutoff) {
        this.jobs.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) this.log.info('jobs_evicted', { count: removed });
    return removed;
  }

  stats(): Record<JobState, number> & { total: number } {
    const counts: Record<JobState, number> = {
      queued: 0,
      running: 0,
      merging: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const job of this.jobs.values()) counts[job.state] += 1;
    return { ...counts, total: this.jobs.size };
  }
}
