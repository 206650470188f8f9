import { ulid } from 'ulid';
import type { Logger } from '../logger.js';
import type { BusClient, BusMessage, Subscription } from '../bus/base.js';
import { decodeJson, encodeJson } from '../bus/codec.js';
import { errorMessage } from '../errors.js';
import type { KernelExecutor } from '../kernel/base.js';
import { executeNotebook } from '../kernel/execute.js';
import type { ConversionRequest, ProcessNotebookRequest } from '../schemas/conversion.js';
import { ConversionResponseSchema, ProcessNotebookRequestSchema } from '../schemas/conversion.js';
import type { Topology } from '../topology/index.js';
import type { JobTracker, RecordOutcome } from '../tracker/index.js';
import type {
  BlockFailure,
  ConversionResult,
  DiagramBlock,
  NotebookJob,
  NotebookJobStatus,
  NotebookResult,
  OutputFormat,
  TerminalStatus,
} from '../types/job.js';
import { isTerminalStatus } from '../types/job.js';
import type { Notebook } from '../types/notebook.js';
import { extractBlocks } from './extract.js';
import { spliceNotebook } from './splice.js';

export interface DispatcherConfig {
  deadlineMs: number;
  sweepIntervalMs: number;
  outputFormat: OutputFormat;
  /** Finished results kept for status lookups. */
  resultHistory?: number;
}

export interface DispatcherDeps {
  bus: BusClient;
  tracker: JobTracker;
  topology: Topology;
  logger: Logger;
  kernel?: KernelExecutor;
  now?: () => number;
  newId?: () => string;
}

export interface DispatcherStats {
  submitted: number;
  duplicates: number;
  requestsPublished: number;
  retriesPublished: number;
  responses: number;
  unknownResponses: number;
  ignoredResponses: number;
  malformedMessages: number;
  finalized: Record<TerminalStatus, number>;
}

export interface SubmitResult {
  jobId: string;
  status: NotebookJobStatus;
  duplicate: boolean;
}

export interface JobView {
  jobId: string;
  status: NotebookJobStatus;
  createdAt: string;
  deadline: string;
  blocks: number;
  outstanding: number;
  requestsPublished: number;
  result?: NotebookResult;
}

interface FinishedJob {
  result: NotebookResult;
  blocks: number;
  deadline: string;
}

interface ActiveJob extends NotebookJob {
  requestsPublished: number;
  /** Set once the job is finalized; the job stays listed until its result is out. */
  settled?: TerminalStatus;
}

/**
 * Turns notebooks into conversion requests and folds the responses back in.
 *
 * All per-job state lives in the tracker; this class only keeps what is
 * needed to rebuild requests and the output notebook. A job is finalized by
 * whichever path (response, publish failure, sweep) made the tracker report
 * it terminal, and by nothing else. Kernel execution and the result publish
 * run beside the consumption loops, never inside them.
 */
export class NotebookDispatcher {
  private readonly jobs = new Map<string, ActiveJob>();
  private readonly finished = new Map<string, FinishedJob>();
  private readonly subscriptions: Subscription[] = [];
  private readonly finalizing = new Set<Promise<void>>();
  private aborter = new AbortController();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly newId: () => string;
  private readonly historyLimit: number;
  private running = false;
  private sweepTimer?: NodeJS.Timeout;
  private stats: DispatcherStats = {
    submitted: 0,
    duplicates: 0,
    requestsPublished: 0,
    retriesPublished: 0,
    responses: 0,
    unknownResponses: 0,
    ignoredResponses: 0,
    malformedMessages: 0,
    finalized: { completed: 0, partially_failed: 0, failed: 0 },
  };

  constructor(
    private readonly deps: DispatcherDeps,
    private readonly config: DispatcherConfig,
  ) {
    this.logger = deps.logger.child({ component: 'dispatcher' });
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? ulid;
    this.historyLimit = config.resultHistory ?? 1000;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.aborter = new AbortController();

    const { jobs, responses } = this.deps.topology.dispatcher;
    this.subscriptions.push(
      await this.deps.bus.consume(jobs, (message) => this.handleJobMessage(message)),
      await this.deps.bus.consume(responses, (message) => this.handleResponse(message)),
    );
    this.scheduleSweep();
    this.logger.info({ jobs: jobs.durable, responses: responses.durable }, 'dispatcher started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
    }
    const subscriptions = this.subscriptions.splice(0);
    await Promise.all(subscriptions.map((subscription) => subscription.stop()));
    // Running kernel executions give up; their jobs go out unexecuted.
    this.aborter.abort();
    await this.idle();
    this.logger.info({ active: this.jobs.size }, 'dispatcher stopped');
  }

  /** Resolves once no finalized job is still waiting on the kernel or the result publish. */
  async idle(): Promise<void> {
    while (this.finalizing.size > 0) {
      await Promise.all([...this.finalizing]);
    }
  }

  getStats(): DispatcherStats & { active: number } {
    return { ...this.stats, finalized: { ...this.stats.finalized }, active: this.jobs.size };
  }

  /**
   * Extracts the diagram blocks of a notebook, registers them and publishes
   * one request per block. A job id that is already known is not submitted
   * again.
   */
  async submit(request: ProcessNotebookRequest): Promise<SubmitResult> {
    const jobId = request.jobId ?? this.newId();

    if (this.finished.has(jobId) || this.jobs.has(jobId)) {
      this.stats.duplicates++;
      this.logger.info({ jobId }, 'duplicate job submission ignored');
      return { jobId, status: this.statusOf(jobId), duplicate: true };
    }

    const createdAt = this.now();
    const notebook: Notebook = request.notebook;
    const blocks = extractBlocks(notebook, this.newId);
    const job: ActiveJob = {
      id: jobId,
      notebook,
      blocks,
      replyTo: request.replyTo ?? this.deps.topology.dispatcher.resultSubject,
      outputFormat: request.outputFormat ?? this.config.outputFormat,
      execute: request.execute,
      createdAt: new Date(createdAt),
      deadline: new Date(createdAt + (request.deadlineMs ?? this.config.deadlineMs)),
      requestsPublished: 0,
    };

    if (job.execute && !this.deps.kernel) {
      this.logger.warn({ jobId }, 'execution requested but no kernel is configured, cells will not run');
    }

    this.deps.tracker.register(jobId, blocks.map((block) => block.correlationId), job.deadline);
    this.jobs.set(jobId, job);
    this.stats.submitted++;
    this.logger.info({ jobId, blocks: blocks.length, deadline: job.deadline.toISOString() }, 'job registered');

    if (blocks.length === 0) {
      this.finalize(jobId);
      return { jobId, status: this.statusOf(jobId), duplicate: false };
    }

    for (const block of blocks) {
      // A sweep may have ended the job while an earlier publish was awaited.
      if (this.deps.tracker.isTerminal(jobId) || job.settled) break;

      const published = await this.publishRequest(job, block, 1);
      if (!published) break;
      this.deps.tracker.markInFlight(jobId);
    }

    return { jobId, status: this.statusOf(jobId), duplicate: false };
  }

  /** Applies one conversion response from the bus. Always settles the message. */
  async handleResponse(message: BusMessage): Promise<void> {
    const decoded = decodeJson(ConversionResponseSchema, message.data);
    if (!decoded.ok) {
      this.stats.malformedMessages++;
      this.logger.warn({ subject: message.subject, error: decoded.error }, 'discarding malformed conversion response');
      message.term('malformed');
      return;
    }

    const response = decoded.value;
    this.stats.responses++;
    const result: ConversionResult =
      response.status === 'success'
        ? { status: 'success', artifact: { data: response.artifact, mimeType: response.mimeType } }
        : { status: 'failure', error: response.error };

    const outcome = this.deps.tracker.recordResult(response.correlationId, result, response.attempt);
    await this.applyOutcome(outcome);
    message.ack();
  }

  /** Accepts a process-notebook request from the bus. */
  async handleJobMessage(message: BusMessage): Promise<void> {
    const decoded = decodeJson(ProcessNotebookRequestSchema, message.data);
    if (!decoded.ok) {
      this.stats.malformedMessages++;
      this.logger.warn({ subject: message.subject, error: decoded.error }, 'discarding malformed notebook request');
      message.term('malformed');
      return;
    }

    await this.submit(decoded.value);
    message.ack();
  }

  /** Ends every job past its deadline. Returns the ids of the jobs it finalized. */
  async sweep(now: number = this.now()): Promise<string[]> {
    const expired = this.deps.tracker.sweep(now);
    for (const jobId of expired) {
      this.logger.warn({ jobId, outstanding: this.jobs.get(jobId)?.blocks.length }, 'job deadline exceeded');
      this.finalize(jobId);
    }
    return expired;
  }

  getJob(jobId: string): JobView | undefined {
    const finished = this.finished.get(jobId);
    if (finished) {
      const { result } = finished;
      return {
        jobId,
        status: result.status,
        createdAt: result.createdAt,
        deadline: finished.deadline,
        blocks: finished.blocks,
        outstanding: 0,
        requestsPublished: result.requestsPublished,
        result,
      };
    }

    const job = this.jobs.get(jobId);
    if (!job) return undefined;
    const entry = this.deps.tracker.get(jobId);
    return {
      jobId,
      status: job.settled ?? entry?.status ?? 'pending',
      createdAt: job.createdAt.toISOString(),
      deadline: job.deadline.toISOString(),
      blocks: job.blocks.length,
      outstanding: entry?.outstanding.size ?? 0,
      requestsPublished: job.requestsPublished,
    };
  }

  private async applyOutcome(outcome: RecordOutcome): Promise<void> {
    switch (outcome.type) {
      case 'unknown':
        this.stats.unknownResponses++;
        this.logger.info({ correlationId: outcome.correlationId }, 'response for unknown correlation id discarded');
        return;

      case 'ignored':
        this.stats.ignoredResponses++;
        this.logger.debug({ jobId: outcome.jobId, correlationId: outcome.correlationId, reason: outcome.reason }, 'response ignored');
        return;

      case 'retry': {
        const job = this.jobs.get(outcome.jobId);
        const block = job?.blocks.find((b) => b.correlationId === outcome.correlationId);
        if (!job || !block) return;

        this.logger.info({ jobId: job.id, correlationId: block.correlationId, attempt: outcome.attempt }, 'conversion failed, retrying');
        if (await this.publishRequest(job, block, outcome.attempt)) {
          this.stats.retriesPublished++;
        }
        return;
      }

      case 'resolved':
        this.logger.debug({ jobId: outcome.jobId, correlationId: outcome.correlationId, result: outcome.result }, 'block resolved');
        if (outcome.terminal) {
          this.finalize(outcome.jobId);
        }
        return;
    }
  }

  /**
   * Publishes one conversion request. On a transport failure the whole job is
   * failed and finalized, and false is returned.
   */
  private async publishRequest(job: ActiveJob, block: DiagramBlock, attempt: number): Promise<boolean> {
    const route = this.deps.topology.converters[block.kind];
    const request: ConversionRequest = {
      correlationId: block.correlationId,
      kind: block.kind,
      payload: block.payload,
      encoding: 'utf-8',
      attempt,
      outputFormat: job.outputFormat,
      replyTo: route.responseSubject,
    };

    try {
      await this.deps.bus.publish(route.requestSubject, encodeJson(request), { msgId: `${block.correlationId}:${attempt}` });
    } catch (error) {
      this.logger.error({ jobId: job.id, correlationId: block.correlationId, err: errorMessage(error) }, 'could not publish conversion request');
      if (this.deps.tracker.fail(job.id, `transport error: ${errorMessage(error)}`)) {
        this.finalize(job.id);
      }
      return false;
    }

    job.requestsPublished++;
    this.stats.requestsPublished++;
    this.logger.debug({ jobId: job.id, correlationId: block.correlationId, kind: block.kind, attempt }, 'conversion request published');
    return true;
  }

  /**
   * Freezes the outcome of a terminal job and hands the rest (kernel run,
   * result publish) to a tracked background task. Runs at most once per job.
   */
  private finalize(jobId: string): void {
    const job = this.jobs.get(jobId);
    const entry = this.deps.tracker.get(jobId);
    if (!job || !entry || job.settled) return;

    const status = entry.status;
    if (!isTerminalStatus(status)) return;
    job.settled = status;

    const failures: BlockFailure[] = job.blocks.flatMap((block) => {
      const reason = entry.failed.get(block.correlationId);
      return reason === undefined
        ? []
        : [{ blockIndex: block.blockIndex, kind: block.kind, correlationId: block.correlationId, reason }];
    });
    const notebook = status === 'failed' ? null : spliceNotebook(job.notebook, job.blocks, entry);
    this.deps.tracker.remove(jobId);

    const task: Promise<void> = this.complete(job, status, notebook, failures)
      .catch((error: unknown) => {
        this.logger.error({ jobId, err: errorMessage(error) }, 'could not complete job');
      })
      .finally(() => {
        this.finalizing.delete(task);
      });
    this.finalizing.add(task);
  }

  private async complete(job: ActiveJob, status: TerminalStatus, spliced: Notebook | null, failures: BlockFailure[]): Promise<void> {
    let notebook = spliced;
    if (notebook && job.execute && this.deps.kernel) {
      notebook = await this.execute(job, notebook, this.deps.kernel);
    }

    const jobId = job.id;
    const result: NotebookResult = {
      jobId,
      status,
      notebook,
      failures,
      createdAt: job.createdAt.toISOString(),
      finishedAt: new Date(this.now()).toISOString(),
      requestsPublished: job.requestsPublished,
    };

    this.remember({ result, blocks: job.blocks.length, deadline: job.deadline.toISOString() });
    this.jobs.delete(jobId);
    this.stats.finalized[status]++;

    this.logger.info(
      { jobId, status, blocks: job.blocks.length, failures: failures.length, requestsPublished: job.requestsPublished },
      'job finalized',
    );

    try {
      await this.deps.bus.publish(job.replyTo, encodeJson(result), { msgId: `result:${jobId}` });
    } catch (error) {
      this.logger.error({ jobId, replyTo: job.replyTo, err: errorMessage(error) }, 'could not publish notebook result');
    }
  }

  private async execute(job: ActiveJob, notebook: Notebook, kernel: KernelExecutor): Promise<Notebook> {
    try {
      const summary = await executeNotebook(notebook, kernel, { logger: this.logger, signal: this.aborter.signal });
      this.logger.info({ jobId: job.id, executed: summary.executed, errors: summary.errors }, 'notebook executed');
      return summary.notebook;
    } catch (error) {
      this.logger.warn({ jobId: job.id, err: errorMessage(error) }, 'notebook execution failed, emitting unexecuted notebook');
      return notebook;
    }
  }

  private remember(finished: FinishedJob): void {
    this.finished.set(finished.result.jobId, finished);
    while (this.finished.size > this.historyLimit) {
      const oldest = this.finished.keys().next();
      if (oldest.done) break;
      this.finished.delete(oldest.value);
    }
  }

  private statusOf(jobId: string): NotebookJobStatus {
    return (
      this.finished.get(jobId)?.result.status ?? this.jobs.get(jobId)?.settled ?? this.deps.tracker.get(jobId)?.status ?? 'pending'
    );
  }

  private scheduleSweep(): void {
    if (!this.running) return;

    this.sweepTimer = setTimeout(() => {
      this.sweep()
        .catch((error: unknown) => {
          this.logger.error({ err: errorMessage(error) }, 'deadline sweep failed');
        })
        .finally(() => {
          this.scheduleSweep();
        });
    }, this.config.sweepIntervalMs);
  }
}
