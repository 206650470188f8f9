import { readFile } from 'node:fs/promises';
import { describe, it, expect } from 'vitest';
import { loadTopology, parseTopology, subjectMatches } from './index.js';
import { TopologyError } from '../errors.js';
import { TOPOLOGY_FILE } from '../../tests/support/fixtures.js';

describe('subjectMatches', () => {
  it('should match literal and single-token wildcards', () => {
    expect(subjectMatches('convert.drawio.request', 'convert.drawio.request')).toBe(true);
    expect(subjectMatches('convert.*.request', 'convert.plantuml.request')).toBe(true);
    expect(subjectMatches('convert.*', 'convert.drawio.request')).toBe(false);
    expect(subjectMatches('convert.drawio', 'convert.drawio.request')).toBe(false);
  });

  it('should require at least one token after a trailing >', () => {
    expect(subjectMatches('notebook.process.result.>', 'notebook.process.result.client-7')).toBe(true);
    expect(subjectMatches('notebook.>', 'notebook.process.result')).toBe(true);
    expect(subjectMatches('notebook.process.result.>', 'notebook.process.result')).toBe(false);
  });
});

describe('loadTopology', () => {
  it('should resolve routes from the shipped topology file', async () => {
    const topology = await loadTopology(TOPOLOGY_FILE);

    expect(topology.streams.map((s) => s.name)).toEqual([
      'DRAWIO_REQUESTS',
      'PLANTUML_REQUESTS',
      'CONVERSION_RESPONSES',
      'NOTEBOOK_REQUESTS',
      'NOTEBOOK_RESULTS',
    ]);
    expect(topology.converters.drawio).toEqual({
      kind: 'drawio',
      consumer: { stream: 'DRAWIO_REQUESTS', durable: 'drawio-converter', subjects: ['convert.drawio.request'] },
      requestSubject: 'convert.drawio.request',
      responseSubject: 'convert.drawio.response',
    });
    expect(topology.dispatcher.jobsSubject).toBe('notebook.process.request');
    expect(topology.dispatcher.responses.subjects).toEqual(['convert.drawio.response', 'convert.plantuml.response']);
    expect(topology.dispatcher.resultSubject).toBe('notebook.process.result');
  });

  it('should apply consumer defaults', async () => {
    const topology = await loadTopology(TOPOLOGY_FILE);
    expect(topology.streams[0]?.retention).toBe('workqueue');
    expect(topology.consumers.find((c) => c.durable === 'notebook-dispatcher')).toMatchObject({ ackWaitMs: 30_000, maxDeliver: 10 });
  });

  it('should report a missing file', async () => {
    await expect(loadTopology('/nonexistent/topology.yaml')).rejects.toThrow('cannot read topology file /nonexistent/topology.yaml');
  });
});

describe('parseTopology', () => {
  const shipped = () => readFile(TOPOLOGY_FILE, 'utf8');

  it('should reject invalid YAML', () => {
    expect(() => parseTopology('streams: [')).toThrow(TopologyError);
    expect(() => parseTopology('streams: [')).toThrow(/^topology is not valid YAML/);
  });

  it('should list schema problems with their paths', () => {
    expect(() => parseTopology('streams: []\nconsumers: []\n')).toThrow(
      'invalid topology: streams: Array must contain at least 1 element(s)',
    );
  });

  it('should reject a consumer on an unknown stream', async () => {
    const text = (await shipped()).replace('stream: PLANTUML_REQUESTS', 'stream: PLANTUML_REQ');
    expect(() => parseTopology(text)).toThrow('consumer plantuml-converter refers to unknown stream PLANTUML_REQ');
  });

  it('should reject responses the dispatcher would never receive', async () => {
    const text = (await shipped()).replace('responseSubject: convert.plantuml.response', 'responseSubject: convert.plantuml.reply');
    expect(() => parseTopology(text)).toThrow(
      'plantuml responses on convert.plantuml.reply never reach consumer notebook-dispatcher-responses',
    );
  });

  it('should reject a result subject no stream carries', async () => {
    const text = (await shipped()).replace('resultSubject: notebook.process.result', 'resultSubject: notebook.done');
    expect(() => parseTopology(text)).toThrow('no stream carries result subject notebook.done');
  });
});
