import type { Logger } from '../logger.js';
import type { BusClient, BusMessage, Subscription } from '../bus/base.js';
import { decodeJson, encodeJson } from '../bus/codec.js';
import { RenderError, errorMessage } from '../errors.js';
import type { RenderEngine } from '../converters/base.js';
import type { ConversionRequest, ConversionResponse } from '../schemas/conversion.js';
import { ConversionRequestSchema } from '../schemas/conversion.js';
import type { ConverterRoute } from '../topology/index.js';

export interface WorkerConfig {
  renderTimeoutMs: number;
  /** Delay before the bus redelivers a request whose response could not be published. */
  redeliveryDelayMs?: number;
}

export interface WorkerStats {
  running: number;
  processed: number;
  succeeded: number;
  failed: number;
  malformed: number;
}

const STDERR_IN_ERROR = 500;

/** Best effort: a correlation id from a request that failed validation. */
export function recoverCorrelationId(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('correlationId' in raw)) return undefined;
  const { correlationId } = raw;
  return typeof correlationId === 'string' && correlationId.length > 0 ? correlationId : undefined;
}

function recoverReplyTo(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('replyTo' in raw)) return undefined;
  const { replyTo } = raw;
  return typeof replyTo === 'string' && replyTo.length > 0 ? replyTo : undefined;
}

export function describeRenderFailure(error: unknown): string {
  if (error instanceof RenderError && error.stderr?.trim()) {
    const stderr = error.stderr.trim();
    const tail = stderr.length > STDERR_IN_ERROR ? `...${stderr.slice(-STDERR_IN_ERROR)}` : stderr;
    return `${error.message}: ${tail}`;
  }
  return errorMessage(error);
}

/**
 * Consumes conversion requests for one diagram kind, one at a time, and
 * publishes exactly one response per request it can attribute. The request
 * is acknowledged only once its response is on the bus.
 */
export class ConverterWorker {
  private subscription?: Subscription;
  private stats: WorkerStats = {
    running: 0,
    processed: 0,
    succeeded: 0,
    failed: 0,
    malformed: 0,
  };
  private readonly logger: Logger;

  constructor(
    private readonly engine: RenderEngine,
    private readonly bus: BusClient,
    private readonly route: ConverterRoute,
    logger: Logger,
    private readonly config: WorkerConfig,
  ) {
    this.logger = logger.child({ component: `worker:${engine.kind}` });
  }

  async start(): Promise<void> {
    if (this.subscription) return;

    this.subscription = await this.bus.consume(this.route.consumer, (message) => this.handleMessage(message));
    this.logger.info({ durable: this.route.consumer.durable, subjects: this.route.consumer.subjects }, 'converter worker started');
  }

  async stop(): Promise<void> {
    const subscription = this.subscription;
    if (!subscription) return;

    this.subscription = undefined;
    await subscription.stop();
    this.logger.info({ processed: this.stats.processed }, 'converter worker stopped');
  }

  getStats(): WorkerStats {
    return { ...this.stats };
  }

  async handleMessage(message: BusMessage): Promise<void> {
    const decoded = decodeJson(ConversionRequestSchema, message.data);
    if (!decoded.ok) {
      const correlationId = recoverCorrelationId(decoded.raw);
      this.stats.malformed++;
      if (!correlationId) {
        this.logger.warn({ subject: message.subject, error: decoded.error }, 'discarding unattributable request');
        message.term('malformed');
        return;
      }
      this.logger.warn({ correlationId, error: decoded.error }, 'malformed request, replying with failure');
      await this.respond(
        message,
        { correlationId, kind: this.engine.kind, status: 'failure', error: `malformed request: ${decoded.error}` },
        recoverReplyTo(decoded.raw) ?? this.route.responseSubject,
      );
      return;
    }

    const request = decoded.value;
    const response = await this.convert(request);
    await this.respond(message, response, request.replyTo ?? this.route.responseSubject);
  }

  private async convert(request: ConversionRequest): Promise<ConversionResponse> {
    const base = { correlationId: request.correlationId, kind: request.kind, attempt: request.attempt };
    if (request.kind !== this.engine.kind) {
      this.stats.failed++;
      return { ...base, status: 'failure', error: `${this.engine.kind} worker cannot render ${request.kind} diagrams` };
    }

    const source = request.encoding === 'base64' ? Buffer.from(request.payload, 'base64').toString('utf8') : request.payload;
    const started = Date.now();
    this.stats.running++;

    try {
      const image = await this.engine.render({
        source,
        outputFormat: request.outputFormat,
        signal: AbortSignal.timeout(this.config.renderTimeoutMs),
      });
      this.stats.succeeded++;
      this.logger.info(
        { correlationId: request.correlationId, attempt: request.attempt, bytes: image.data.length, ms: Date.now() - started },
        'diagram rendered',
      );
      return { ...base, status: 'success', artifact: image.data.toString('base64'), mimeType: image.mimeType };
    } catch (error) {
      this.stats.failed++;
      const reason = describeRenderFailure(error);
      this.logger.warn({ correlationId: request.correlationId, attempt: request.attempt, err: reason }, 'render failed');
      return { ...base, status: 'failure', error: reason };
    } finally {
      this.stats.running--;
      this.stats.processed++;
    }
  }

  private async respond(message: BusMessage, response: ConversionResponse, subject: string): Promise<void> {
    try {
      await this.bus.publish(subject, encodeJson(response), {
        msgId: `${response.correlationId}:${response.attempt ?? 0}:${response.status}`,
      });
    } catch (error) {
      this.logger.error({ correlationId: response.correlationId, err: errorMessage(error) }, 'could not publish response, request will be redelivered');
      message.nak(this.config.redeliveryDelayMs ?? 1000);
      return;
    }
    message.ack();
  }
}
