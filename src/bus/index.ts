import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { BusClient } from './base.js';
import { InMemoryBus } from './memory.js';
import { NatsBusClient } from './nats.js';

export * from './base.js';
export * from './codec.js';
export * from './memory.js';
export * from './nats.js';

export async function createBusClient(config: AppConfig, name: string, logger: Logger): Promise<BusClient> {
  switch (config.BUS_KIND) {
    case 'memory':
      return new InMemoryBus({ logger });

    case 'nats':
      return NatsBusClient.connect({
        url: config.NATS_URL,
        name,
        logger,
        publishRetries: config.PUBLISH_MAX_RETRIES,
      });

    default:
      throw new Error(`Unknown bus kind: ${String(config.BUS_KIND)}`);
  }
}
