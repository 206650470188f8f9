import { AckPolicy, DeliverPolicy, RetentionPolicy, StorageType, nanos } from 'nats';
import type { JetStreamManager, NatsConnection } from 'nats';
import type { ConsumerDefinition, StreamDefinition } from './index.js';
import type { TopologyAdmin } from './initializer.js';

const RETENTION: Record<StreamDefinition['retention'], RetentionPolicy> = {
  workqueue: RetentionPolicy.Workqueue,
  limits: RetentionPolicy.Limits,
  interest: RetentionPolicy.Interest,
};

export class NatsTopologyAdmin implements TopologyAdmin {
  private constructor(private readonly jsm: JetStreamManager) {}

  static async create(nc: NatsConnection): Promise<NatsTopologyAdmin> {
    return new NatsTopologyAdmin(await nc.jetstreamManager());
  }

  async streamNames(): Promise<string[]> {
    const names: string[] = [];
    for await (const name of this.jsm.streams.names()) {
      names.push(name);
    }
    return names;
  }

  async addStream(stream: StreamDefinition): Promise<void> {
    await this.jsm.streams.add({
      name: stream.name,
      subjects: stream.subjects,
      retention: RETENTION[stream.retention],
      storage: StorageType.File,
      max_age: stream.maxAgeMs ? nanos(stream.maxAgeMs) : 0,
    });
  }

  async updateStream(stream: StreamDefinition): Promise<void> {
    // Retention cannot change on an existing stream; recreate for that.
    await this.jsm.streams.update(stream.name, {
      subjects: stream.subjects,
      max_age: stream.maxAgeMs ? nanos(stream.maxAgeMs) : 0,
    });
  }

  async deleteStream(name: string): Promise<boolean> {
    return this.jsm.streams.delete(name);
  }

  async consumerNames(stream: string): Promise<string[]> {
    const names: string[] = [];
    for await (const info of this.jsm.consumers.list(stream)) {
      names.push(info.name);
    }
    return names;
  }

  async addConsumer(consumer: ConsumerDefinition): Promise<void> {
    await this.jsm.consumers.add(consumer.stream, {
      durable_name: consumer.durable,
      ack_policy: AckPolicy.Explicit,
      deliver_policy: DeliverPolicy.All,
      ack_wait: nanos(consumer.ackWaitMs),
      max_deliver: consumer.maxDeliver,
      ...(consumer.filterSubject ? { filter_subject: consumer.filterSubject } : {}),
    });
  }

  async updateConsumer(consumer: ConsumerDefinition): Promise<void> {
    await this.jsm.consumers.update(consumer.stream, consumer.durable, {
      ack_wait: nanos(consumer.ackWaitMs),
      max_deliver: consumer.maxDeliver,
    });
  }
}
