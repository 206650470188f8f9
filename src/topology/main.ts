import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { connectNats } from '../bus/nats.js';
import { loadTopology } from './index.js';
import { TopologyInitializer } from './initializer.js';
import { NatsTopologyAdmin } from './admin-nats.js';

// Exit code gates every dependent service: 0 means the topology exists.
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('topology', config.LOG_LEVEL);

  const topology = await loadTopology(config.TOPOLOGY_FILE);
  logger.info({ file: config.TOPOLOGY_FILE, streams: topology.streams.length, consumers: topology.consumers.length }, 'topology loaded');

  if (config.BUS_KIND === 'memory') {
    logger.info('in-memory bus needs no provisioning');
    return;
  }

  const nc = await connectNats({ url: config.NATS_URL, name: 'topology-init', logger });
  try {
    const admin = await NatsTopologyAdmin.create(nc);
    const initializer = new TopologyInitializer(admin, logger, { recreate: config.TOPOLOGY_RECREATE });
    await initializer.run(topology);
  } finally {
    await nc.close();
    logger.info('NATS connection closed');
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error('Topology initialization failed:', error);
    process.exit(1);
  },
);
