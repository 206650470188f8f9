/** Where a consumption loop reads from: a durable consumer on a stream, filtered to some subjects. */
export interface ConsumerRoute {
  stream: string;
  durable: string;
  subjects: string[];
}

export interface BusMessage {
  readonly subject: string;
  readonly data: Uint8Array;
  /** 1 on first delivery, incremented on every redelivery. */
  readonly deliveryCount: number;
  ack(): void;
  /** Ask for redelivery, optionally after a delay. */
  nak(delayMs?: number): void;
  /** Never redeliver this message. */
  term(reason?: string): void;
}

export type MessageHandler = (message: BusMessage) => Promise<void>;

export interface Subscription {
  /** Stops pulling new messages and waits for the message in hand to finish. */
  stop(): Promise<void>;
  /** Settles when the loop has ended. */
  readonly done: Promise<void>;
}

export interface PublishOptions {
  /** Deduplication id for the transport, when it supports one. */
  msgId?: string;
}

export interface BusClient {
  readonly kind: 'nats' | 'memory';
  publish(subject: string, data: Uint8Array, options?: PublishOptions): Promise<void>;
  /**
   * Runs one consumption loop for the route. Messages are handed to `handler`
   * one at a time; the next is not pulled until the handler settles.
   */
  consume(route: ConsumerRoute, handler: MessageHandler): Promise<Subscription>;
  isConnected(): boolean;
  close(): Promise<void>;
}
