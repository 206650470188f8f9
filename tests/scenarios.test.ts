import { describe, it, expect, afterEach } from 'vitest';
import { NotebookDispatcher } from '../src/dispatcher/index.js';
import { ConverterWorker } from '../src/worker/index.js';
import { InMemoryBus } from '../src/bus/memory.js';
import { encodeJson } from '../src/bus/codec.js';
import { JobTracker } from '../src/tracker/index.js';
import { ConversionRequestSchema } from '../src/schemas/conversion.js';
import { silentLogger } from '../src/logger.js';
import type { DiagramKind } from '../src/types/job.js';
import type { Notebook } from '../src/types/notebook.js';
import { FakeEngine, b64, codeCell, diagramCell, loadTestTopology, markdownCell, notebook } from './support/fixtures.js';

const START = Date.parse('2026-03-01T12:00:00.000Z');
const RESULTS = 'notebook.process.result';

interface Harness {
  bus: InMemoryBus;
  tracker: JobTracker;
  dispatcher: NotebookDispatcher;
  engines: Record<DiagramKind, FakeEngine>;
  requests(): Array<{ correlationId: string; kind: string; attempt: number }>;
  results(): unknown[];
  stop(): Promise<void>;
}

let active: Harness | undefined;

async function harness(options: { workers: DiagramKind[]; deadlineMs?: number; maxAttempts?: number }): Promise<Harness> {
  const topology = await loadTestTopology();
  const bus = new InMemoryBus();
  const tracker = new JobTracker({ maxAttempts: options.maxAttempts ?? 3 });
  const dispatcher = new NotebookDispatcher(
    { bus, tracker, topology, logger: silentLogger(), now: () => START },
    { deadlineMs: options.deadlineMs ?? 120_000, sweepIntervalMs: 60_000, outputFormat: 'png' },
  );
  const engines: Record<DiagramKind, FakeEngine> = { drawio: new FakeEngine('drawio'), plantuml: new FakeEngine('plantuml') };
  const workers = options.workers.map(
    (kind) => new ConverterWorker(engines[kind], bus, topology.converters[kind], silentLogger(), { renderTimeoutMs: 1000 }),
  );

  await dispatcher.start();
  for (const worker of workers) {
    await worker.start();
  }

  const decoder = new TextDecoder();
  const h: Harness = {
    bus,
    tracker,
    dispatcher,
    engines,
    requests: () =>
      bus.published
        .filter((m) => m.subject === 'convert.drawio.request' || m.subject === 'convert.plantuml.request')
        .map((m) => {
          const parsed = ConversionRequestSchema.parse(JSON.parse(decoder.decode(m.data)));
          return { correlationId: parsed.correlationId, kind: parsed.kind, attempt: parsed.attempt };
        }),
    results: () => bus.messagesOn(RESULTS),
    stop: async () => {
      await dispatcher.stop();
      for (const worker of workers) {
        await worker.stop();
      }
      await bus.close();
    },
  };
  active = h;
  return h;
}

async function run(h: Harness, jobId: string, nb: Notebook): Promise<void> {
  await h.dispatcher.submit({ jobId, notebook: nb, execute: false });
  await h.bus.idle();
}

afterEach(async () => {
  await active?.stop();
  active = undefined;
});

describe('notebook conversion end to end', () => {
  it('should publish one request per block, each with its own correlation id', async () => {
    const h = await harness({ workers: ['drawio', 'plantuml'] });
    await run(h, 'job-n', notebook([
      diagramCell('drawio', 'a'),
      diagramCell('drawio', 'b'),
      markdownCell('between'),
      diagramCell('plantuml', '@startuml\n@enduml'),
      diagramCell('drawio', 'c'),
    ]));

    const requests = h.requests();
    expect(requests).toHaveLength(4);
    expect(new Set(requests.map((r) => r.correlationId)).size).toBe(4);
    expect(h.dispatcher.getJob('job-n')?.status).toBe('completed');
  });

  it('should publish exactly one result per job', async () => {
    const h = await harness({ workers: ['drawio'] });
    await run(h, 'job-once', notebook([diagramCell('drawio', 'a')]));

    expect(await h.dispatcher.sweep(START + 999_999)).toEqual([]);
    expect(h.results()).toHaveLength(1);
    expect(h.dispatcher.getStats().finalized).toEqual({ completed: 1, partially_failed: 0, failed: 0 });
  });

  it('should return a notebook without diagrams unchanged', async () => {
    const h = await harness({ workers: ['drawio', 'plantuml'] });
    const input = notebook([markdownCell('# Notes'), codeCell('print("hi")')]);
    await run(h, 'job-zero', input);

    expect(h.requests()).toEqual([]);
    expect(h.results()).toMatchObject([{ jobId: 'job-zero', status: 'completed', notebook: input, failures: [] }]);
  });

  it('should retry a flaky block until it converts', async () => {
    const h = await harness({ workers: ['drawio', 'plantuml'] });
    await run(h, 'job-retry', notebook([
      diagramCell('drawio', 'first'),
      diagramCell('plantuml', '@startuml\nFAIL x2\n@enduml'),
      diagramCell('drawio', 'third'),
    ]));

    const requests = h.requests();
    expect(requests).toHaveLength(5);
    expect(requests.filter((r) => r.kind === 'plantuml').map((r) => r.attempt)).toEqual([1, 2, 3]);

    const result = h.dispatcher.getJob('job-retry')?.result;
    expect(result?.status).toBe('completed');
    expect(result?.failures).toEqual([]);
    expect(result?.notebook?.cells.map((c) => c.source)).toEqual([
      '![drawio diagram](attachment:diagram-0.png)',
      '![plantuml diagram](attachment:diagram-1.png)',
      '![drawio diagram](attachment:diagram-2.png)',
    ]);
    expect(result?.notebook?.cells[1]?.attachments).toEqual({
      'diagram-1.png': { 'image/png': b64('plantuml:@startuml\nFAIL x2\n@enduml') },
    });
  });

  it('should stop retrying a block at the attempt limit', async () => {
    const h = await harness({ workers: ['drawio', 'plantuml'], maxAttempts: 3 });
    await run(h, 'job-bound', notebook([diagramCell('drawio', 'ok'), diagramCell('plantuml', 'FAIL x99')]));

    expect(h.requests().filter((r) => r.kind === 'plantuml')).toHaveLength(3);
    expect(h.engines.plantuml.calls).toHaveLength(3);

    const result = h.dispatcher.getJob('job-bound')?.result;
    expect(result?.status).toBe('partially_failed');
    expect(result?.failures).toMatchObject([{ blockIndex: 1, kind: 'plantuml', reason: 'plantuml render failed: attempt 3 rejected' }]);
  });

  it('should fail the whole job when no block converts', async () => {
    const h = await harness({ workers: ['plantuml'], maxAttempts: 1 });
    await run(h, 'job-none', notebook([diagramCell('plantuml', 'FAIL x9')]));

    expect(h.results()).toMatchObject([{ jobId: 'job-none', status: 'failed', notebook: null }]);
  });

  it('should put artifacts back at their positions whatever order responses arrive in', async () => {
    const h = await harness({ workers: [] });
    const input = notebook([
      diagramCell('drawio', 'zero'),
      markdownCell('one'),
      diagramCell('plantuml', 'two'),
      diagramCell('drawio', 'three'),
    ]);
    await run(h, 'job-order', input);

    const requests = h.requests();
    for (const request of [...requests].reverse()) {
      await h.bus.publish(`convert.${request.kind}.response`, encodeJson({
        correlationId: request.correlationId,
        kind: request.kind,
        attempt: 1,
        status: 'success',
        artifact: b64(request.correlationId),
        mimeType: 'image/png',
      }));
      await h.bus.idle();
    }

    const cells = h.dispatcher.getJob('job-order')?.result?.notebook?.cells ?? [];
    expect(cells.map((c) => c.source)).toEqual([
      '![drawio diagram](attachment:diagram-0.png)',
      'one',
      '![plantuml diagram](attachment:diagram-2.png)',
      '![drawio diagram](attachment:diagram-3.png)',
    ]);
    expect(cells[0]?.attachments?.['diagram-0.png']).toEqual({ 'image/png': b64(requests[0]?.correlationId ?? '') });
    expect(cells[3]?.attachments?.['diagram-3.png']).toEqual({ 'image/png': b64(requests[2]?.correlationId ?? '') });
  });

  it('should apply a duplicated response only once', async () => {
    const h = await harness({ workers: [] });
    await run(h, 'job-dup', notebook([diagramCell('drawio', 'a'), diagramCell('drawio', 'b')]));
    const [first, second] = h.requests();

    const reply = (correlationId: string, artifact: string) =>
      encodeJson({ correlationId, kind: 'drawio', attempt: 1, status: 'success', artifact, mimeType: 'image/png' });

    await h.bus.publish('convert.drawio.response', reply(first?.correlationId ?? '', b64('original')));
    await h.bus.publish('convert.drawio.response', reply(first?.correlationId ?? '', b64('duplicate')));
    await h.bus.idle();
    expect(h.dispatcher.getJob('job-dup')?.outstanding).toBe(1);

    await h.bus.publish('convert.drawio.response', reply(second?.correlationId ?? '', b64('second')));
    await h.bus.publish('convert.drawio.response', reply(second?.correlationId ?? '', b64('second again')));
    await h.bus.idle();

    expect(h.results()).toHaveLength(1);
    const cells = h.dispatcher.getJob('job-dup')?.result?.notebook?.cells;
    expect(cells?.[0]?.attachments).toEqual({ 'diagram-0.png': { 'image/png': b64('original') } });
    expect(h.dispatcher.getStats()).toMatchObject({ responses: 4, ignoredResponses: 1, unknownResponses: 1 });
  });

  it('should end a job at its deadline with placeholders for missing diagrams', async () => {
    const h = await harness({ workers: ['drawio'], deadlineMs: 5_000 });
    await run(h, 'job-late', notebook([diagramCell('drawio', 'fast'), diagramCell('plantuml', '@startuml\n@enduml')]));

    expect(h.dispatcher.getJob('job-late')?.status).toBe('in_flight');
    expect(await h.dispatcher.sweep(START + 5_000)).toEqual(['job-late']);

    const result = h.dispatcher.getJob('job-late')?.result;
    expect(result?.status).toBe('partially_failed');
    expect(result?.failures).toMatchObject([{ blockIndex: 1, kind: 'plantuml', reason: 'deadline exceeded' }]);
    expect(result?.notebook?.cells[1]?.source).toBe('> **Diagram conversion failed** (plantuml): deadline exceeded');
    expect(h.bus.pendingCount('convert.plantuml.request')).toBe(1);
  });
});
