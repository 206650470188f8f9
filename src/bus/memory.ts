import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { TransportError } from '../errors.js';
import type { BusClient, BusMessage, ConsumerRoute, MessageHandler, PublishOptions, Subscription } from './base.js';

interface Envelope {
  subject: string;
  data: Uint8Array;
  deliveryCount: number;
}

type Settlement = 'ack' | 'nak' | 'term';

interface ConsumerSlot {
  durable: string;
  handler: MessageHandler;
  busy: boolean;
  stopped: boolean;
}

interface SubjectQueue {
  pending: Envelope[];
  slots: ConsumerSlot[];
  next: number;
}

export interface PublishedMessage {
  subject: string;
  data: Uint8Array;
}

export interface InMemoryBusOptions {
  /** Deliveries per message before it is dropped as dead. Default 5. */
  maxDeliver?: number;
  logger?: Logger;
}

/**
 * Work-queue bus held in process memory. Each subject behaves like a
 * work-queue stream: a message goes to exactly one idle consumer, consumers
 * on the same subject share the load, and unconsumed messages wait.
 */
export class InMemoryBus implements BusClient {
  readonly kind = 'memory' as const;
  readonly published: PublishedMessage[] = [];
  readonly deadLetters: Envelope[] = [];

  private queues = new Map<string, SubjectQueue>();
  private inflight = new Set<Promise<void>>();
  private closed = false;
  private failures = 0;
  private readonly maxDeliver: number;
  private readonly logger: Logger;

  constructor(options: InMemoryBusOptions = {}) {
    this.maxDeliver = options.maxDeliver ?? 5;
    this.logger = options.logger ?? silentLogger();
  }

  async publish(subject: string, data: Uint8Array, _options?: PublishOptions): Promise<void> {
    if (this.closed) {
      throw new TransportError(`bus closed, cannot publish to ${subject}`);
    }
    if (this.failures > 0) {
      this.failures--;
      throw new TransportError(`simulated publish failure on ${subject}`);
    }

    this.published.push({ subject, data });
    const queue = this.queueFor(subject);
    queue.pending.push({ subject, data, deliveryCount: 1 });
    this.pump(queue);
  }

  async consume(route: ConsumerRoute, handler: MessageHandler): Promise<Subscription> {
    if (this.closed) {
      throw new TransportError(`bus closed, cannot consume ${route.durable}`);
    }

    const slot: ConsumerSlot = { durable: route.durable, handler, busy: false, stopped: false };
    const queues = route.subjects.map((subject) => this.queueFor(subject));
    for (const queue of queues) {
      queue.slots.push(slot);
    }

    let resolveDone: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      resolveDone = resolve;
    });

    for (const queue of queues) {
      this.pump(queue);
    }

    return {
      done,
      stop: async () => {
        slot.stopped = true;
        for (const queue of queues) {
          queue.slots = queue.slots.filter((s) => s !== slot);
        }
        while (slot.busy) {
          await this.idle();
        }
        resolveDone();
      },
    };
  }

  isConnected(): boolean {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.idle();
  }

  /** Makes the next `count` publishes fail with a TransportError. */
  failNextPublishes(count: number): void {
    this.failures = count;
  }

  /** Resolves once no delivery is running and nothing deliverable is pending. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /** Published payloads on one subject, parsed as JSON. */
  messagesOn(subject: string): unknown[] {
    const decoder = new TextDecoder();
    return this.published
      .filter((message) => message.subject === subject)
      .map((message): unknown => JSON.parse(decoder.decode(message.data)));
  }

  pendingCount(subject: string): number {
    return this.queues.get(subject)?.pending.length ?? 0;
  }

  private queueFor(subject: string): SubjectQueue {
    let queue = this.queues.get(subject);
    if (!queue) {
      queue = { pending: [], slots: [], next: 0 };
      this.queues.set(subject, queue);
    }
    return queue;
  }

  private pump(queue: SubjectQueue): void {
    while (queue.pending.length > 0) {
      const slot = this.nextIdleSlot(queue);
      if (!slot) return;

      const envelope = queue.pending.shift();
      if (!envelope) return;

      slot.busy = true;
      const delivery: Promise<void> = this.deliver(queue, slot, envelope).finally(() => {
        this.inflight.delete(delivery);
        slot.busy = false;
        // A slot consuming several subjects may have work waiting elsewhere.
        for (const other of this.queues.values()) {
          if (other.slots.includes(slot)) this.pump(other);
        }
      });
      this.inflight.add(delivery);
    }
  }

  private nextIdleSlot(queue: SubjectQueue): ConsumerSlot | undefined {
    const count = queue.slots.length;
    for (let i = 0; i < count; i++) {
      const slot = queue.slots[(queue.next + i) % count];
      if (slot && !slot.busy && !slot.stopped) {
        queue.next = (queue.next + i + 1) % count;
        return slot;
      }
    }
    return undefined;
  }

  private async deliver(queue: SubjectQueue, slot: ConsumerSlot, envelope: Envelope): Promise<void> {
    // Hand over on a later tick so publish() returns before the handler runs.
    await Promise.resolve();

    const state: { settled: Settlement | null } = { settled: null };
    const settle = (outcome: Settlement) => {
      state.settled ??= outcome;
    };
    const message: BusMessage = {
      subject: envelope.subject,
      data: envelope.data,
      deliveryCount: envelope.deliveryCount,
      ack: () => settle('ack'),
      nak: () => settle('nak'),
      term: () => settle('term'),
    };

    try {
      await slot.handler(message);
    } catch (error) {
      this.logger.error({ err: error, subject: envelope.subject, durable: slot.durable }, 'handler threw, message will be redelivered');
      settle('nak');
    }

    if (state.settled === 'ack' || state.settled === 'term') return;

    if (envelope.deliveryCount >= this.maxDeliver) {
      this.logger.warn({ subject: envelope.subject, deliveries: envelope.deliveryCount }, 'message exceeded max deliveries');
      this.deadLetters.push(envelope);
      return;
    }
    queue.pending.push({ ...envelope, deliveryCount: envelope.deliveryCount + 1 });
  }
}
