import { z } from 'zod';
import { DIAGRAM_KINDS } from '../types/job.js';
import { NotebookSchema } from './notebook.js';

export const DiagramKindSchema = z.enum(DIAGRAM_KINDS);

export const OutputFormatSchema = z.enum(['png', 'svg']);

export const ConversionRequestSchema = z.object({
  correlationId: z.string().min(1),
  kind: DiagramKindSchema,
  payload: z.string(),
  encoding: z.enum(['utf-8', 'base64']).default('utf-8'),
  attempt: z.number().int().min(1).default(1),
  outputFormat: OutputFormatSchema.default('png'),
  replyTo: z.string().min(1).optional(),
});

const ResponseBaseSchema = z.object({
  correlationId: z.string().min(1),
  kind: DiagramKindSchema.optional(),
  attempt: z.number().int().min(1).optional(),
});

export const ConversionResponseSchema = z.discriminatedUnion('status', [
  ResponseBaseSchema.extend({
    status: z.literal('success'),
    artifact: z.string().min(1),
    mimeType: z.string().min(1),
  }),
  ResponseBaseSchema.extend({
    status: z.literal('failure'),
    error: z.string().min(1),
  }),
]);

export const ProcessNotebookRequestSchema = z.object({
  jobId: z.string().min(1).max(128).optional(),
  notebook: NotebookSchema,
  replyTo: z.string().min(1).optional(),
  outputFormat: OutputFormatSchema.optional(),
  execute: z.boolean().default(false),
  deadlineMs: z.number().int().positive().max(3_600_000).optional(),
});

export const JobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export const JobDetailsQuerySchema = z.object({
  includeNotebook: z.enum(['0', '1']).default('1'),
});

export type ConversionRequest = z.infer<typeof ConversionRequestSchema>;
export type ConversionResponse = z.infer<typeof ConversionResponseSchema>;
export type ProcessNotebookRequest = z.infer<typeof ProcessNotebookRequestSchema>;
