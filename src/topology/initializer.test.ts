import { describe, it, expect, beforeEach } from 'vitest';
import { TopologyInitializer } from './initializer.js';
import { InMemoryTopologyAdmin } from './admin-memory.js';
import type { Topology } from './index.js';
import { TopologyError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { loadTestTopology } from '../../tests/support/fixtures.js';

class FlakyAdmin extends InMemoryTopologyAdmin {
  constructor(private failures: number) {
    super();
  }

  override async streamNames(): Promise<string[]> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('broker unavailable');
    }
    return super.streamNames();
  }
}

describe('TopologyInitializer', () => {
  let topology: Topology;
  let slept: number[];
  const sleep = async (ms: number) => {
    slept.push(ms);
  };

  beforeEach(async () => {
    topology = await loadTestTopology();
    slept = [];
  });

  it('should create every stream and consumer on a fresh broker', async () => {
    const admin = new InMemoryTopologyAdmin();
    const report = await new TopologyInitializer(admin, silentLogger(), { recreate: false, sleep }).run(topology);

    expect(Object.values(report.streams)).toEqual(['created', 'created', 'created', 'created', 'created']);
    expect(report.consumers).toEqual({
      'DRAWIO_REQUESTS/drawio-converter': 'created',
      'PLANTUML_REQUESTS/plantuml-converter': 'created',
      'CONVERSION_RESPONSES/notebook-dispatcher-responses': 'created',
      'NOTEBOOK_REQUESTS/notebook-dispatcher': 'created',
    });
    expect(admin.streams.get('CONVERSION_RESPONSES')?.subjects).toEqual(['convert.drawio.response', 'convert.plantuml.response']);
  });

  it('should update existing entities when run again', async () => {
    const admin = new InMemoryTopologyAdmin();
    const initializer = new TopologyInitializer(admin, silentLogger(), { recreate: false, sleep });
    await initializer.run(topology);
    const report = await initializer.run(topology);

    expect(new Set(Object.values(report.streams))).toEqual(new Set(['updated']));
    expect(new Set(Object.values(report.consumers))).toEqual(new Set(['updated']));
    expect(admin.consumers.get('DRAWIO_REQUESTS')).toHaveLength(1);
  });

  it('should recreate streams when asked to', async () => {
    const admin = new InMemoryTopologyAdmin();
    await new TopologyInitializer(admin, silentLogger(), { recreate: false, sleep }).run(topology);
    const report = await new TopologyInitializer(admin, silentLogger(), { recreate: true, sleep }).run(topology);

    expect(report.streams['NOTEBOOK_RESULTS']).toBe('recreated');
    expect(report.consumers['NOTEBOOK_REQUESTS/notebook-dispatcher']).toBe('created');
  });

  it('should retry a transient failure with a growing pause', async () => {
    const admin = new FlakyAdmin(2);
    const report = await new TopologyInitializer(admin, silentLogger(), { recreate: false, sleep, pauseMs: 100 }).run(topology);

    expect(report.streams['DRAWIO_REQUESTS']).toBe('created');
    expect(slept).toEqual([100, 200]);
  });

  it('should abort once an entity keeps failing', async () => {
    const admin = new FlakyAdmin(Number.POSITIVE_INFINITY);
    const run = new TopologyInitializer(admin, silentLogger(), { recreate: false, sleep }).run(topology);

    await expect(run).rejects.toBeInstanceOf(TopologyError);
    await expect(run).rejects.toThrow('could not provision stream DRAWIO_REQUESTS after 5 attempts: broker unavailable');
    expect(slept).toEqual([1000, 2000, 3000, 4000]);
    expect(admin.streams.size).toBe(0);
  });
});
