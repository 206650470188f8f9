export type CellType = 'code' | 'markdown' | 'raw';

/** Multiline text as nbformat stores it: one string, or a list of lines that keep their newlines. */
export type MultilineString = string | string[];

export type CellMetadata = Record<string, unknown>;

/** Mime bundle keyed by mime type; values are base64 for binary types. */
export type MimeBundle = Record<string, MultilineString>;

export interface CellOutput {
  output_type: string;
  [key: string]: unknown;
}

export interface Cell {
  id?: string;
  cell_type: CellType;
  source: MultilineString;
  metadata: CellMetadata;
  outputs?: CellOutput[];
  execution_count?: number | null;
  attachments?: Record<string, MimeBundle>;
  [key: string]: unknown;
}

export interface Notebook {
  cells: Cell[];
  metadata: Record<string, unknown>;
  nbformat: number;
  nbformat_minor: number;
  [key: string]: unknown;
}

export function sourceText(source: MultilineString): string {
  return Array.isArray(source) ? source.join('') : source;
}
