import type { Enrichment, LogRecord, RequestDetails, SessionData } from './types.js';

export const MASK = '******';

const tagRegex = /^(Exception caught: )?\(([^)]+)\)/;
const FORM_INDENT = ' '.repeat(10);

export function formatRecord(record: LogRecord): string {
  const lines = [
    '',
    `Message type:       ${record.level}`,
    `Location:           ${record.location ?? '-'}`,
    `Module:             ${record.module ?? '-'}`,
    `Function:           ${record.functionName ?? '-'}`,
    `Time:               ${Number.isNaN(record.time.getTime()) ? '-' : record.time.toISOString()}`,
    '',
    'Message:',
    '',
    record.message
  ];
  let text = lines.join('\n') + '\n';
  if (record.error?.stack) {
    text += `\n${record.error.stack}\n`;
  }
  return text;
}

/** `"(Health Check) ..."` or `"Exception caught: (Health Check) ..."` gives `"Health Check"`. */
export function extractTag(rawMessage: string): string | undefined {
  const match = tagRegex.exec(rawMessage);
  return match ? match[2] : undefined;
}

export function buildSubject(prefix: string, tag: string | undefined): string {
  return tag === undefined ? prefix : `${prefix} (${tag})`;
}

export function buildBody(formatted: string, enrichments: Enrichment[]): string {
  return enrichments.reduce((msg, { label, content }) => `${msg}\n${label}:\n\n${content}\n`, formatted);
}

export function obscureForm(form: Record<string, unknown>, obscuredFields: ReadonlySet<string>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(form)) {
    if (obscuredFields.has(key.toLowerCase())) {
      result[key] = MASK;
    } else if (Array.isArray(value) && value.length === 1) {
      result[key] = value[0];
    } else {
      result[key] = value;
    }
  }
  return result;
}

export function renderRequest(details: RequestDetails, obscuredFields: ReadonlySet<string>): string {
  const form = JSON.stringify(obscureForm(details.form, obscuredFields), null, 2).replace(/\n/g, `\n${FORM_INDENT}`);
  return [
    `url:      ${details.url}`,
    `method:   ${details.method}`,
    `endpoint: ${details.endpoint}`,
    `form:     ${form}`
  ].join('\n');
}

function sessionReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  return value;
}

// Dates already serialise as ISO-8601 through Date#toJSON
export function renderSession(data: SessionData): string {
  return JSON.stringify(data, sessionReplacer, 2);
}
