import type { Notebook } from './notebook.js';

export const DIAGRAM_KINDS = ['drawio', 'plantuml'] as const;

export type DiagramKind = (typeof DIAGRAM_KINDS)[number];

export function isDiagramKind(value: string): value is DiagramKind {
  return DIAGRAM_KINDS.some((kind) => kind === value);
}

export type OutputFormat = 'png' | 'svg';

export type NotebookJobStatus = 'pending' | 'in_flight' | 'partially_failed' | 'completed' | 'failed';

export type TerminalStatus = Extract<NotebookJobStatus, 'partially_failed' | 'completed' | 'failed'>;

export function isTerminalStatus(status: NotebookJobStatus): status is TerminalStatus {
  return status === 'completed' || status === 'partially_failed' || status === 'failed';
}

export interface DiagramBlock {
  readonly blockIndex: number;
  readonly kind: DiagramKind;
  readonly payload: string;
  readonly correlationId: string;
}

export interface Artifact {
  /** base64 image bytes */
  data: string;
  mimeType: string;
}

export type ConversionResult =
  | { status: 'success'; artifact: Artifact }
  | { status: 'failure'; error: string };

export interface NotebookJob {
  id: string;
  notebook: Notebook;
  blocks: readonly DiagramBlock[];
  replyTo: string;
  outputFormat: OutputFormat;
  execute: boolean;
  createdAt: Date;
  deadline: Date;
}

export interface BlockFailure {
  blockIndex: number;
  kind: DiagramKind;
  correlationId: string;
  reason: string;
}

export interface NotebookResult {
  jobId: string;
  status: TerminalStatus;
  notebook: Notebook | null;
  failures: BlockFailure[];
  createdAt: string;
  finishedAt: string;
  requestsPublished: number;
}
