import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createBusClient } from '../bus/index.js';
import { createRenderEngines } from '../converters/index.js';
import { loadTopology } from '../topology/index.js';
import { ConverterWorker } from './index.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const kind = config.CONVERTER_KIND;
  if (!kind) {
    throw new Error('CONVERTER_KIND must be set to drawio or plantuml');
  }

  const logger = createLogger(`${kind}-converter`, config.LOG_LEVEL);
  const topology = await loadTopology(config.TOPOLOGY_FILE);
  const engine = createRenderEngines(config, logger).get(kind);
  if (!engine) {
    throw new Error(`no render engine for ${kind}`);
  }

  const bus = await createBusClient(config, `${kind}-converter`, logger);
  const worker = new ConverterWorker(engine, bus, topology.converters[kind], logger, {
    renderTimeoutMs: config.RENDER_TIMEOUT_MS,
  });
  await worker.start();

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      worker
        .stop()
        .then(() => bus.close())
        .then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          },
        );
    });
  }
}

start().catch((error: unknown) => {
  console.error('Failed to start converter worker:', error);
  process.exit(1);
});
