import type { Logger } from 'pino';
import { internalLogger, localLogger } from '../utils/logger.js';
import { isInterrupt } from '../lib/errors.js';
import { processMailer, type MailSender } from '../services/mailer.js';
import { AlertRateLimiter } from './rateLimiter.js';
import { buildBody, buildSubject, extractTag, formatRecord, renderRequest, renderSession } from './formatter.js';
import { requestDetailsProvider, sessionProvider } from './context.js';
import { parseLogLine } from './logRecord.js';
import type { AlertConfig, ContextProvider, Enrichment, LogRecord, LogSink, RequestDetails, SessionData } from './types.js';

export const DEFAULT_OBSCURED_FIELDS: readonly string[] = ['password'];

export interface AlertHandlerOptions extends AlertConfig {
  sender?: MailSender;
  obscuredFields?: Iterable<string>;
  requestProvider?: ContextProvider<RequestDetails>;
  sessionProvider?: ContextProvider<SessionData>;
  format?: (record: LogRecord) => string;
  /** Seconds since the epoch. */
  clock?: () => number;
  localLogger?: Logger;
  onError?: (err: unknown, record?: LogRecord) => void;
  /** Called with an interrupt raised by a send started through `write`. Defaults to rethrowing it outside the logging call. */
  onInterrupt?: (err: unknown) => void;
}

function rethrowLater(err: unknown) {
  process.nextTick(() => {
    throw err;
  });
}

function reportHandlerError(err: unknown, record?: LogRecord) {
  internalLogger.error({ err, record: record?.message }, 'Alert handler failed to emit log record');
}

/**
 * Sends an email for each log record it receives, at most `maxSendsPerMinute`
 * per sliding minute. Records over the limit are written to the local log instead.
 *
 * Usable directly as a LogSink, or as a pino destination stream (see `write`).
 * Nothing thrown while formatting or sending reaches the caller; it goes to
 * `onError`. Interrupts (AbortError) are the exception.
 */
export class AlertHandler implements LogSink {
  readonly from: string;
  readonly to: readonly string[];
  readonly subject: string;
  readonly obscuredFields: ReadonlySet<string>;

  private readonly rateLimiter: AlertRateLimiter;
  private readonly sender: MailSender;
  private readonly requestProvider: ContextProvider<RequestDetails>;
  private readonly sessionProvider: ContextProvider<SessionData>;
  private readonly format: (record: LogRecord) => string;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly onError: (err: unknown, record?: LogRecord) => void;
  private readonly onInterrupt: (err: unknown) => void;
  private readonly pending = new Set<Promise<void>>();
  // Kept until flush() collects them, even after their task has settled
  private readonly interrupts: unknown[] = [];

  constructor(options: AlertHandlerOptions) {
    this.from = options.from;
    this.to = typeof options.to === 'string' ? [options.to] : [...options.to];
    this.subject = options.subject;
    this.obscuredFields = new Set([...(options.obscuredFields ?? DEFAULT_OBSCURED_FIELDS)].map(f => f.toLowerCase()));
    this.rateLimiter = new AlertRateLimiter(options.maxSendsPerMinute ?? 15);
    this.sender = options.sender ?? processMailer;
    this.requestProvider = options.requestProvider ?? requestDetailsProvider;
    this.sessionProvider = options.sessionProvider ?? sessionProvider;
    this.format = options.format ?? formatRecord;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.log = (options.localLogger ?? localLogger).child({ module: 'alert-handler' });
    this.onError = options.onError ?? reportHandlerError;
    this.onInterrupt = options.onInterrupt ?? rethrowLater;
  }

  get maxSendsPerMinute(): number {
    return this.rateLimiter.maxSendsPerMinute;
  }

  async handle(record: LogRecord): Promise<void> {
    try {
      // Everything up to the send runs synchronously, inside the caller's request context
      const permitted = this.rateLimiter.recordIfAllowed(this.clock());
      const body = buildBody(this.format(record), this.enrichments());
      const subject = buildSubject(this.subject, extractTag(record.rawMessage));

      if (permitted) {
        await this.sender.send({ recipients: [...this.to], subject, body, html: false, from: this.from });
      } else {
        this.log.warn('!! Not sending alert email as too many emails have been sent in the past minute !!');
        this.log.warn(body);
      }
    } catch (err) {
      if (isInterrupt(err)) throw err;
      this.onError(err, record);
    }
  }

  /** pino destination entry point: one JSON line per call. */
  write(line: string): void {
    let record: LogRecord;
    try {
      record = parseLogLine(line);
    } catch (err) {
      this.onError(err);
      return;
    }
    const task = this.handle(record);
    this.pending.add(task);
    void task.then(
      () => {
        this.pending.delete(task);
      },
      (err: unknown) => {
        // handle() only rejects with an interrupt
        this.pending.delete(task);
        this.interrupts.push(err);
        this.onInterrupt(err);
      }
    );
  }

  /**
   * Waits for every send started through `write`. Rejects with the first
   * interrupt raised since the previous flush, whether or not its send was
   * still in flight.
   */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
    const interrupts = this.interrupts.splice(0);
    if (interrupts.length) {
      throw interrupts[0];
    }
  }

  private enrichments(): Enrichment[] {
    const result: Enrichment[] = [];
    this.tryEnrich(result, 'Request', () => {
      const details = this.requestProvider.tryGet();
      return details && renderRequest(details, this.obscuredFields);
    });
    this.tryEnrich(result, 'Session', () => {
      const session = this.sessionProvider.tryGet();
      return session && renderSession(session);
    });
    return result;
  }

  private tryEnrich(into: Enrichment[], label: string, render: () => string | undefined) {
    try {
      const content = render();
      if (content !== undefined) into.push({ label, content });
    } catch (err) {
      if (isInterrupt(err)) throw err;
      this.log.debug({ err }, `Could not add ${label.toLowerCase()} details to alert email`);
    }
  }
}
