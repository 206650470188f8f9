import type { ConsumerDefinition, StreamDefinition } from './index.js';
import type { TopologyAdmin } from './initializer.js';

/** Broker-free admin used with the in-memory bus and in tests. */
export class InMemoryTopologyAdmin implements TopologyAdmin {
  readonly streams = new Map<string, StreamDefinition>();
  readonly consumers = new Map<string, ConsumerDefinition[]>();

  async streamNames(): Promise<string[]> {
    return [...this.streams.keys()];
  }

  async addStream(stream: StreamDefinition): Promise<void> {
    if (this.streams.has(stream.name)) {
      throw new Error(`stream name already in use: ${stream.name}`);
    }
    this.streams.set(stream.name, { ...stream });
  }

  async updateStream(stream: StreamDefinition): Promise<void> {
    const existing = this.streams.get(stream.name);
    if (!existing) throw new Error(`stream not found: ${stream.name}`);
    this.streams.set(stream.name, { ...existing, subjects: stream.subjects, maxAgeMs: stream.maxAgeMs });
  }

  async deleteStream(name: string): Promise<boolean> {
    this.consumers.delete(name);
    return this.streams.delete(name);
  }

  async consumerNames(stream: string): Promise<string[]> {
    if (!this.streams.has(stream)) throw new Error(`stream not found: ${stream}`);
    return (this.consumers.get(stream) ?? []).map((c) => c.durable);
  }

  async addConsumer(consumer: ConsumerDefinition): Promise<void> {
    if (!this.streams.has(consumer.stream)) throw new Error(`stream not found: ${consumer.stream}`);
    const list = this.consumers.get(consumer.stream) ?? [];
    list.push({ ...consumer });
    this.consumers.set(consumer.stream, list);
  }

  async updateConsumer(consumer: ConsumerDefinition): Promise<void> {
    const list = this.consumers.get(consumer.stream) ?? [];
    const index = list.findIndex((c) => c.durable === consumer.durable);
    if (index < 0) throw new Error(`consumer not found: ${consumer.durable}`);
    list[index] = { ...consumer };
  }
}
