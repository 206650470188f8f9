import type { Artifact, ConversionResult, NotebookJobStatus } from '../types/job.js';
import { isTerminalStatus } from '../types/job.js';

export interface JobTrackerOptions {
  /** Attempts per block, first delivery included, before the block fails for good. */
  maxAttempts: number;
}

/** Read-only copy of one job's bookkeeping. */
export interface JobTrackerEntry {
  readonly jobId: string;
  readonly status: NotebookJobStatus;
  readonly deadline: number;
  /** Correlation ids in block order. */
  readonly correlationIds: readonly string[];
  readonly outstanding: ReadonlySet<string>;
  readonly completed: ReadonlyMap<string, Artifact>;
  readonly failed: ReadonlyMap<string, string>;
  readonly retries: ReadonlyMap<string, number>;
}

export type IgnoreReason = 'terminal' | 'resolved' | 'stale';

export type RecordOutcome =
  | { type: 'unknown'; correlationId: string; terminal: false }
  | { type: 'ignored'; jobId: string; correlationId: string; reason: IgnoreReason; terminal: false }
  | { type: 'retry'; jobId: string; correlationId: string; attempt: number; terminal: false }
  | { type: 'resolved'; jobId: string; correlationId: string; result: ConversionResult['status']; terminal: boolean };

export interface JobTrackerStats {
  tracked: number;
  pending: number;
  inFlight: number;
  terminal: number;
  outstandingBlocks: number;
}

export const DEADLINE_EXCEEDED = 'deadline exceeded';

interface MutableEntry {
  jobId: string;
  status: NotebookJobStatus;
  deadline: number;
  correlationIds: string[];
  outstanding: Set<string>;
  completed: Map<string, Artifact>;
  failed: Map<string, string>;
  retries: Map<string, number>;
  attempts: Map<string, number>;
}

/**
 * In-memory table of outstanding notebook jobs keyed by job id.
 *
 * Every method runs to completion synchronously, so on Node's event loop
 * the response handler and the deadline sweep can never interleave inside a
 * mutation. Callers must not hold results across an await and assume they
 * are still current.
 *
 * A job becomes terminal exactly once: `recordResult`, `fail` and `sweep`
 * only report `terminal` for the call that performed the transition.
 */
export class JobTracker {
  private entries = new Map<string, MutableEntry>();
  private owners = new Map<string, string>();

  constructor(private readonly options: JobTrackerOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /**
   * Starts tracking a job. With no correlation ids the job is immediately
   * Completed. Throws when the job id or any correlation id is already tracked.
   */
  register(jobId: string, correlationIds: readonly string[], deadline: number | Date): NotebookJobStatus {
    if (this.entries.has(jobId)) {
      throw new Error(`job ${jobId} is already tracked`);
    }
    const unique = new Set(correlationIds);
    if (unique.size !== correlationIds.length) {
      throw new Error(`job ${jobId} has duplicate correlation ids`);
    }
    for (const id of correlationIds) {
      if (this.owners.has(id)) throw new Error(`correlation id ${id} is already tracked`);
    }

    const entry: MutableEntry = {
      jobId,
      status: 'pending',
      deadline: typeof deadline === 'number' ? deadline : deadline.getTime(),
      correlationIds: [...correlationIds],
      outstanding: unique,
      completed: new Map(),
      failed: new Map(),
      retries: new Map(),
      attempts: new Map(correlationIds.map((id) => [id, 1])),
    };
    this.entries.set(jobId, entry);
    for (const id of correlationIds) {
      this.owners.set(id, jobId);
    }

    this.settle(entry);
    return entry.status;
  }

  /** Pending → InFlight, once the first request is on the bus. */
  markInFlight(jobId: string): void {
    const entry = this.entries.get(jobId);
    if (entry && entry.status === 'pending') {
      entry.status = 'in_flight';
    }
  }

  /** Attempt number the next request for this correlation id should carry. */
  currentAttempt(correlationId: string): number {
    const jobId = this.owners.get(correlationId);
    const entry = jobId ? this.entries.get(jobId) : undefined;
    return entry?.attempts.get(correlationId) ?? 1;
  }

  /**
   * Applies one conversion response. `attempt`, when the response carries it,
   * lets a late Failure from a superseded attempt be told apart from a
   * Failure of the attempt in flight.
   */
  recordResult(correlationId: string, result: ConversionResult, attempt?: number): RecordOutcome {
    const jobId = this.owners.get(correlationId);
    const entry = jobId ? this.entries.get(jobId) : undefined;
    if (!jobId || !entry) {
      return { type: 'unknown', correlationId, terminal: false };
    }
    if (isTerminalStatus(entry.status)) {
      return { type: 'ignored', jobId, correlationId, reason: 'terminal', terminal: false };
    }
    if (!entry.outstanding.has(correlationId)) {
      return { type: 'ignored', jobId, correlationId, reason: 'resolved', terminal: false };
    }

    if (result.status === 'success') {
      entry.outstanding.delete(correlationId);
      entry.completed.set(correlationId, result.artifact);
      return { type: 'resolved', jobId, correlationId, result: 'success', terminal: this.settle(entry) };
    }

    const current = entry.attempts.get(correlationId) ?? 1;
    if (attempt !== undefined && attempt < current) {
      return { type: 'ignored', jobId, correlationId, reason: 'stale', terminal: false };
    }

    const failures = (entry.retries.get(correlationId) ?? 0) + 1;
    entry.retries.set(correlationId, failures);

    if (failures < this.options.maxAttempts) {
      entry.attempts.set(correlationId, current + 1);
      return { type: 'retry', jobId, correlationId, attempt: current + 1, terminal: false };
    }

    entry.outstanding.delete(correlationId);
    entry.failed.set(correlationId, result.error);
    return { type: 'resolved', jobId, correlationId, result: 'failure', terminal: this.settle(entry) };
  }

  /**
   * Fails every unresolved block of a job at once, e.g. when its requests
   * cannot be published. The job ends Failed. Returns true if this call made
   * the job terminal.
   */
  fail(jobId: string, reason: string): boolean {
    const entry = this.entries.get(jobId);
    if (!entry || isTerminalStatus(entry.status)) return false;

    for (const id of entry.outstanding) {
      entry.failed.set(id, reason);
    }
    entry.outstanding.clear();
    entry.status = 'failed';
    return true;
  }

  isTerminal(jobId: string): boolean {
    const entry = this.entries.get(jobId);
    return entry ? isTerminalStatus(entry.status) : false;
  }

  /** Ends every job whose deadline is at or before `now`. Returns the ids of jobs made terminal. */
  sweep(now: number = Date.now()): string[] {
    const expired: string[] = [];
    for (const entry of this.entries.values()) {
      if (isTerminalStatus(entry.status) || entry.deadline > now) continue;

      for (const id of entry.outstanding) {
        entry.failed.set(id, DEADLINE_EXCEEDED);
      }
      entry.outstanding.clear();
      this.settle(entry);
      expired.push(entry.jobId);
    }
    return expired;
  }

  get(jobId: string): JobTrackerEntry | undefined {
    const entry = this.entries.get(jobId);
    if (!entry) return undefined;
    return {
      jobId: entry.jobId,
      status: entry.status,
      deadline: entry.deadline,
      correlationIds: [...entry.correlationIds],
      outstanding: new Set(entry.outstanding),
      completed: new Map(entry.completed),
      failed: new Map(entry.failed),
      retries: new Map(entry.retries),
    };
  }

  /** Forgets a job; later responses for its correlation ids count as unknown. */
  remove(jobId: string): boolean {
    const entry = this.entries.get(jobId);
    if (!entry) return false;
    for (const id of entry.correlationIds) {
      this.owners.delete(id);
    }
    return this.entries.delete(jobId);
  }

  stats(): JobTrackerStats {
    const stats: JobTrackerStats = { tracked: 0, pending: 0, inFlight: 0, terminal: 0, outstandingBlocks: 0 };
    for (const entry of this.entries.values()) {
      stats.tracked++;
      stats.outstandingBlocks += entry.outstanding.size;
      if (entry.status === 'pending') stats.pending++;
      else if (entry.status === 'in_flight') stats.inFlight++;
      else stats.terminal++;
    }
    return stats;
  }

  private settle(entry: MutableEntry): boolean {
    if (entry.outstanding.size > 0 || isTerminalStatus(entry.status)) return false;

    if (entry.failed.size === 0) entry.status = 'completed';
    else if (entry.completed.size > 0) entry.status = 'partially_failed';
    else entry.status = 'failed';
    return true;
  }
}
