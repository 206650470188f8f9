import { z } from 'zod';
import { DiagramKindSchema, OutputFormatSchema } from './schemas/conversion.js';

const flag = z.enum(['0', '1', 'true', 'false']).default('0').transform((v) => v === '1' || v === 'true');

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

export const ConfigSchema = z.object({
  BUS_KIND: z.enum(['nats', 'memory']).default('nats'),
  NATS_URL: z.string().min(1).default('nats://localhost:4222'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TOPOLOGY_FILE: z.string().min(1).default('config/topology.yaml'),
  TOPOLOGY_RECREATE: flag,
  PUBLISH_MAX_RETRIES: int(5),
  JOB_MAX_ATTEMPTS: int(3, 1),
  JOB_DEADLINE_MS: int(120_000, 1),
  SWEEP_INTERVAL_MS: int(1000, 10),
  DIAGRAM_OUTPUT_FORMAT: OutputFormatSchema.default('png'),
  PORT: int(4600),
  HOST: z.string().default('0.0.0.0'),
  DISPATCHER_API_KEY: z.string().min(1).optional(),
  KERNEL_URL: z.string().url().optional(),
  CONVERTER_KIND: DiagramKindSchema.optional(),
  RENDER_TIMEOUT_MS: int(60_000, 1),
  DRAWIO_COMMAND: z.string().min(1).default('drawio'),
  JAVA_COMMAND: z.string().min(1).default('java'),
  PLANTUML_JAR: z.string().min(1).default('/app/plantuml.jar'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Empty strings count as unset so `FOO=` in an env file falls back to the default. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}
