import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createBusClient } from './bus/index.js';
import { NotebookDispatcher } from './dispatcher/index.js';
import { HttpKernelExecutor } from './kernel/http.js';
import { loadTopology } from './topology/index.js';
import { JobTracker } from './tracker/index.js';
import { createServer } from './server.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('notebook-dispatcher', config.LOG_LEVEL);

  const topology = await loadTopology(config.TOPOLOGY_FILE);
  const bus = await createBusClient(config, 'notebook-dispatcher', logger.child({ component: 'bus' }));
  const tracker = new JobTracker({ maxAttempts: config.JOB_MAX_ATTEMPTS });
  const kernel = config.KERNEL_URL ? new HttpKernelExecutor({ baseUrl: config.KERNEL_URL }) : undefined;

  const dispatcher = new NotebookDispatcher(
    { bus, tracker, topology, logger, kernel },
    {
      deadlineMs: config.JOB_DEADLINE_MS,
      sweepIntervalMs: config.SWEEP_INTERVAL_MS,
      outputFormat: config.DIAGRAM_OUTPUT_FORMAT,
    },
  );

  const app = await createServer({ dispatcher, tracker, bus, config, logger });
  app.addHook('onClose', async () => {
    await dispatcher.stop();
    await bus.close();
  });

  await dispatcher.start();
  await app.listen({ port: config.PORT, host: config.HOST });
  app.log.info({ port: config.PORT, bus: bus.kind, kernel: Boolean(kernel) }, 'Notebook dispatcher started');

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }
}

start().catch((error: unknown) => {
  console.error('Failed to start notebook dispatcher:', error);
  process.exit(1);
});
