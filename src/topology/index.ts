import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ConsumerRoute } from '../bus/base.js';
import { TopologyError, errorMessage } from '../errors.js';
import type { DiagramKind } from '../types/job.js';

const NameSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'only letters, digits, "_" and "-"');

const StreamSchema = z.object({
  name: NameSchema,
  subjects: z.array(z.string().min(1)).min(1),
  retention: z.enum(['workqueue', 'limits', 'interest']).default('workqueue'),
  maxAgeMs: z.number().int().positive().optional(),
});

const ConsumerSchema = z.object({
  stream: NameSchema,
  durable: NameSchema,
  filterSubject: z.string().min(1).optional(),
  ackWaitMs: z.number().int().positive().default(30_000),
  maxDeliver: z.number().int().min(1).default(5),
});

const ConverterRouteSchema = z.object({
  consumer: NameSchema,
  requestSubject: z.string().min(1),
  responseSubject: z.string().min(1),
});

const TopologySchema = z.object({
  streams: z.array(StreamSchema).min(1),
  consumers: z.array(ConsumerSchema),
  routes: z.object({
    converters: z.object({
      drawio: ConverterRouteSchema,
      plantuml: ConverterRouteSchema,
    }),
    dispatcher: z.object({
      jobsConsumer: NameSchema,
      responsesConsumer: NameSchema,
      resultSubject: z.string().min(1),
    }),
  }),
});

export type StreamDefinition = z.infer<typeof StreamSchema>;
export type ConsumerDefinition = z.infer<typeof ConsumerSchema>;
type TopologyDocument = z.infer<typeof TopologySchema>;

export interface ConverterRoute {
  kind: DiagramKind;
  consumer: ConsumerRoute;
  requestSubject: string;
  responseSubject: string;
}

export interface DispatcherRoutes {
  jobs: ConsumerRoute;
  responses: ConsumerRoute;
  /** Subject clients publish process-notebook requests to. */
  jobsSubject: string;
  resultSubject: string;
}

export interface Topology {
  streams: StreamDefinition[];
  consumers: ConsumerDefinition[];
  converters: Record<DiagramKind, ConverterRoute>;
  dispatcher: DispatcherRoutes;
}

/** NATS subject matching: `*` matches one token, a trailing `>` matches one or more. */
export function subjectMatches(pattern: string, subject: string): boolean {
  const p = pattern.split('.');
  const s = subject.split('.');
  for (let i = 0; i < p.length; i++) {
    if (p[i] === '>') return s.length > i;
    if (i >= s.length) return false;
    if (p[i] !== '*' && p[i] !== s[i]) return false;
  }
  return p.length === s.length;
}

export function parseTopology(text: string): Topology {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new TopologyError(`topology is not valid YAML: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = TopologySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new TopologyError(`invalid topology: ${issues.join('; ')}`);
  }
  return resolve(parsed.data);
}

export async function loadTopology(file: string): Promise<Topology> {
  const fullPath = path.resolve(file);
  let text: string;
  try {
    text = await readFile(fullPath, 'utf8');
  } catch (error) {
    throw new TopologyError(`cannot read topology file ${fullPath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseTopology(text);
}

function resolve(doc: TopologyDocument): Topology {
  const streams = new Map<string, StreamDefinition>();
  for (const stream of doc.streams) {
    if (streams.has(stream.name)) throw new TopologyError(`duplicate stream ${stream.name}`);
    streams.set(stream.name, stream);
  }

  const consumers = new Map<string, ConsumerRoute>();
  for (const consumer of doc.consumers) {
    const stream = streams.get(consumer.stream);
    if (!stream) {
      throw new TopologyError(`consumer ${consumer.durable} refers to unknown stream ${consumer.stream}`);
    }
    if (consumers.has(consumer.durable)) throw new TopologyError(`duplicate consumer ${consumer.durable}`);
    if (consumer.filterSubject && !stream.subjects.some((s) => subjectMatches(s, consumer.filterSubject ?? ''))) {
      throw new TopologyError(`consumer ${consumer.durable} filters on ${consumer.filterSubject}, which stream ${stream.name} does not carry`);
    }
    consumers.set(consumer.durable, {
      stream: stream.name,
      durable: consumer.durable,
      subjects: consumer.filterSubject ? [consumer.filterSubject] : stream.subjects,
    });
  }

  const consumerRoute = (durable: string): ConsumerRoute => {
    const route = consumers.get(durable);
    if (!route) throw new TopologyError(`route refers to unknown consumer ${durable}`);
    return route;
  };

  const covered = (route: ConsumerRoute, subject: string) => route.subjects.some((s) => subjectMatches(s, subject));
  const carried = (subject: string) => doc.streams.some((stream) => stream.subjects.some((s) => subjectMatches(s, subject)));

  const dispatcherDoc = doc.routes.dispatcher;
  const jobs = consumerRoute(dispatcherDoc.jobsConsumer);
  const responses = consumerRoute(dispatcherDoc.responsesConsumer);
  const jobsSubject = jobs.subjects[0];
  if (!jobsSubject || jobsSubject.includes('*') || jobsSubject.includes('>')) {
    throw new TopologyError(`consumer ${jobs.durable} must have a literal first subject to receive notebook jobs`);
  }
  if (!carried(dispatcherDoc.resultSubject)) {
    throw new TopologyError(`no stream carries result subject ${dispatcherDoc.resultSubject}`);
  }

  const converterRoute = (kind: DiagramKind): ConverterRoute => {
    const def = doc.routes.converters[kind];
    const consumer = consumerRoute(def.consumer);
    if (!covered(consumer, def.requestSubject)) {
      throw new TopologyError(`${kind} requests on ${def.requestSubject} never reach consumer ${consumer.durable}`);
    }
    if (!covered(responses, def.responseSubject)) {
      throw new TopologyError(`${kind} responses on ${def.responseSubject} never reach consumer ${responses.durable}`);
    }
    return { kind, consumer, requestSubject: def.requestSubject, responseSubject: def.responseSubject };
  };

  return {
    streams: doc.streams,
    consumers: doc.consumers,
    converters: {
      drawio: converterRoute('drawio'),
      plantuml: converterRoute('plantuml'),
    },
    dispatcher: {
      jobs,
      responses,
      jobsSubject,
      resultSubject: dispatcherDoc.resultSubject,
    },
  };
}
