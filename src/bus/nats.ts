import { connect } from 'nats';
import type { ConsumerMessages, JetStreamClient, JsMsg, NatsConnection } from 'nats';
import type { Logger } from '../logger.js';
import { TransportError, errorMessage } from '../errors.js';
import { withRetry } from './retry.js';
import type { BusClient, BusMessage, ConsumerRoute, MessageHandler, PublishOptions, Subscription } from './base.js';

export interface NatsBusOptions {
  url: string;
  name: string;
  logger: Logger;
  /** Retries for a publish before it surfaces as a TransportError. */
  publishRetries: number;
  connectRetries?: number;
}

export async function connectNats(options: Pick<NatsBusOptions, 'url' | 'name' | 'logger' | 'connectRetries'>): Promise<NatsConnection> {
  const { url, name, logger } = options;
  try {
    return await withRetry(
      async () => {
        logger.debug({ url }, 'connecting to NATS');
        return connect({ servers: url, name, maxReconnectAttempts: -1, reconnectTimeWait: 2000 });
      },
      {
        retries: options.connectRetries ?? 5,
        baseDelayMs: 1000,
        maxDelayMs: 16_000,
        onRetry: (error, attempt, delayMs) =>
          logger.warn({ url, attempt, delayMs, err: errorMessage(error) }, 'NATS connect failed, retrying'),
      },
    );
  } catch (error) {
    throw new TransportError(`could not connect to NATS at ${url}: ${errorMessage(error)}`, { cause: error });
  }
}

/** JetStream-backed bus. Streams and durable consumers must already exist. */
export class NatsBusClient implements BusClient {
  readonly kind = 'nats' as const;
  private readonly js: JetStreamClient;

  constructor(
    private readonly nc: NatsConnection,
    private readonly options: NatsBusOptions,
  ) {
    this.js = nc.jetstream();
    this.watchStatus().catch((error) =>
      this.options.logger.error({ err: errorMessage(error) }, 'NATS status watcher stopped'),
    );
  }

  static async connect(options: NatsBusOptions): Promise<NatsBusClient> {
    const nc = await connectNats(options);
    options.logger.info({ url: options.url, server: nc.getServer() }, 'connected to NATS');
    return new NatsBusClient(nc, options);
  }

  async publish(subject: string, data: Uint8Array, options: PublishOptions = {}): Promise<void> {
    const { logger, publishRetries } = this.options;
    try {
      await withRetry(
        () => this.js.publish(subject, data, options.msgId ? { msgID: options.msgId } : undefined),
        {
          retries: publishRetries,
          onRetry: (error, attempt, delayMs) =>
            logger.warn({ subject, attempt, delayMs, err: errorMessage(error) }, 'publish failed, retrying'),
        },
      );
    } catch (error) {
      throw new TransportError(`publish to ${subject} failed after ${publishRetries + 1} attempts: ${errorMessage(error)}`, { cause: error });
    }
  }

  async consume(route: ConsumerRoute, handler: MessageHandler): Promise<Subscription> {
    const messages = await this.openConsumer(route);
    const logger = this.options.logger.child({ stream: route.stream, durable: route.durable });
    logger.info('consumption loop started');

    const done = (async () => {
      for await (const msg of messages) {
        try {
          await handler(toBusMessage(msg));
        } catch (error) {
          logger.error({ err: errorMessage(error), subject: msg.subject }, 'handler threw, requesting redelivery');
          msg.nak();
        }
      }
      logger.info('consumption loop ended');
    })();

    return {
      done,
      stop: async () => {
        messages.stop();
        await done;
      },
    };
  }

  private async openConsumer(route: ConsumerRoute): Promise<ConsumerMessages> {
    try {
      const consumer = await this.js.consumers.get(route.stream, route.durable);
      return await consumer.consume({ max_messages: 1 });
    } catch (error) {
      throw new TransportError(
        `consumer ${route.durable} on stream ${route.stream} is not available: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  isConnected(): boolean {
    return !this.nc.isClosed();
  }

  async close(): Promise<void> {
    if (this.nc.isClosed()) return;
    await this.nc.drain();
  }

  private async watchStatus(): Promise<void> {
    for await (const status of this.nc.status()) {
      this.options.logger.info({ type: status.type, data: String(status.data) }, 'NATS connection status');
    }
  }
}

function toBusMessage(msg: JsMsg): BusMessage {
  return {
    subject: msg.subject,
    data: msg.data,
    deliveryCount: msg.info.redeliveryCount,
    ack: () => msg.ack(),
    nak: (delayMs?: number) => msg.nak(delayMs),
    term: (reason?: string) => msg.term(reason),
  };
}
