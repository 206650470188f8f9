import { z } from 'zod';

const MultilineStringSchema = z.union([z.string(), z.array(z.string())]);

export const CellSchema = z.object({
  id: z.string().min(1).optional(),
  cell_type: z.enum(['code', 'markdown', 'raw']),
  source: MultilineStringSchema,
  metadata: z.record(z.unknown()).default({}),
  outputs: z.array(z.object({ output_type: z.string() }).passthrough()).optional(),
  execution_count: z.number().int().nullable().optional(),
  attachments: z.record(z.record(MultilineStringSchema)).optional(),
}).passthrough();

export const NotebookSchema = z.object({
  cells: z.array(CellSchema),
  metadata: z.record(z.unknown()).default({}),
  nbformat: z.number().int().min(4),
  nbformat_minor: z.number().int().min(0),
}).passthrough();
