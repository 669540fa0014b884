export interface LogRecord {
  level: string;
  /** The message before any formatting, used for tag extraction. */
  rawMessage: string;
  message: string;
  time: Date;
  module?: string;
  functionName?: string;
  location?: string;
  error?: {
    type?: string;
    message?: string;
    stack?: string;
  };
}

export interface LogSink {
  handle(record: LogRecord): Promise<void>;
}

/** A capability that may or may not be available at the time of the call. */
export interface ContextProvider<T> {
  tryGet(): T | undefined;
}

export interface RequestDetails {
  url: string;
  method: string;
  endpoint: string;
  form: Record<string, unknown>;
}

export type SessionData = Record<string, unknown>;

export interface Enrichment {
  label: string;
  content: string;
}

export interface AlertConfig {
  from: string;
  to: string | string[];
  subject: string;
  maxSendsPerMinute?: number;
}
