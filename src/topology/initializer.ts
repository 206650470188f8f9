import type { Logger } from '../logger.js';
import { TopologyError, errorMessage } from '../errors.js';
import { sleep } from '../bus/retry.js';
import type { ConsumerDefinition, StreamDefinition, Topology } from './index.js';

/** Administrative operations on the broker that provisioning needs. */
export interface TopologyAdmin {
  streamNames(): Promise<string[]>;
  addStream(stream: StreamDefinition): Promise<void>;
  updateStream(stream: StreamDefinition): Promise<void>;
  deleteStream(name: string): Promise<boolean>;
  consumerNames(stream: string): Promise<string[]>;
  addConsumer(consumer: ConsumerDefinition): Promise<void>;
  updateConsumer(consumer: ConsumerDefinition): Promise<void>;
}

export interface InitializerOptions {
  /** Delete and recreate every stream, dropping queued messages. */
  recreate: boolean;
  attempts?: number;
  /** Pause before retry `n` is `n * pauseMs`. */
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type ProvisionAction = 'created' | 'updated' | 'recreated';

export interface ProvisionReport {
  streams: Record<string, ProvisionAction>;
  consumers: Record<string, ProvisionAction>;
}

/**
 * One-shot provisioning of streams and durable consumers. Safe to rerun:
 * existing entities are updated in place. Any entity that still fails after
 * its retries aborts the whole run.
 */
export class TopologyInitializer {
  private readonly attempts: number;
  private readonly pauseMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly admin: TopologyAdmin,
    private readonly logger: Logger,
    private readonly options: InitializerOptions,
  ) {
    this.attempts = options.attempts ?? 5;
    this.pauseMs = options.pauseMs ?? 1000;
    this.wait = options.sleep ?? sleep;
  }

  async run(topology: Topology): Promise<ProvisionReport> {
    const report: ProvisionReport = { streams: {}, consumers: {} };

    for (const stream of topology.streams) {
      report.streams[stream.name] = await this.attempt(`stream ${stream.name}`, () => this.provisionStream(stream));
    }

    for (const consumer of topology.consumers) {
      const key = `${consumer.stream}/${consumer.durable}`;
      report.consumers[key] = await this.attempt(`consumer ${key}`, () => this.provisionConsumer(consumer));
    }

    this.logger.info({ report }, 'topology provisioned');
    return report;
  }

  private async provisionStream(stream: StreamDefinition): Promise<ProvisionAction> {
    const exists = (await this.admin.streamNames()).includes(stream.name);

    if (exists && this.options.recreate) {
      this.logger.info({ stream: stream.name }, 'deleting stream before recreating it');
      await this.admin.deleteStream(stream.name);
      await this.admin.addStream(stream);
      return 'recreated';
    }
    if (exists) {
      await this.admin.updateStream(stream);
      this.logger.debug({ stream: stream.name }, 'stream updated');
      return 'updated';
    }
    await this.admin.addStream(stream);
    this.logger.info({ stream: stream.name, subjects: stream.subjects }, 'stream created');
    return 'created';
  }

  private async provisionConsumer(consumer: ConsumerDefinition): Promise<ProvisionAction> {
    const exists = (await this.admin.consumerNames(consumer.stream)).includes(consumer.durable);
    if (exists) {
      await this.admin.updateConsumer(consumer);
      return 'updated';
    }
    await this.admin.addConsumer(consumer);
    this.logger.info({ stream: consumer.stream, durable: consumer.durable }, 'consumer created');
    return 'created';
  }

  private async attempt<T>(what: string, operation: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let i = 1; i <= this.attempts; i++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        this.logger.warn({ what, attempt: i, err: errorMessage(error) }, 'provisioning failed');
        if (i < this.attempts) await this.wait(i * this.pauseMs);
      }
    }
    throw new TopologyError(`could not provision ${what} after ${this.attempts} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }
}
