import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { AlertHandler, type AlertHandlerOptions } from '../alertHandler.js';
import { formatRecord } from '../formatter.js';
import { runWithRequest } from '../context.js';
import { DeliveryError } from '../../lib/errors.js';
import type { OutgoingMail, SentMail } from '../../services/mailer.js';
import type { LogRecord } from '../types.js';

function captureLogger() {
  const lines: Array<{ level: number; msg: string; module?: string }> = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => { lines.push(JSON.parse(line)); } });
  return { logger, lines };
}

function makeRecord(message: string): LogRecord {
  return { level: 'ERROR', rawMessage: message, message, time: new Date('2024-03-01T12:00:00.000Z'), module: 'billing' };
}

describe('AlertHandler', () => {
  const send = vi.fn<(mail: OutgoingMail) => Promise<SentMail>>();
  const onError = vi.fn<(err: unknown, record?: LogRecord) => void>();
  let local: ReturnType<typeof captureLogger>;
  let now: number;

  function createHandler(overrides: Partial<AlertHandlerOptions> = {}) {
    return new AlertHandler({
      from: 'Alerts <alerts@example.com>',
      to: 'ops@example.com',
      subject: 'App error',
      sender: { send },
      requestProvider: { tryGet: () => undefined },
      sessionProvider: { tryGet: () => undefined },
      clock: () => now,
      localLogger: local.logger,
      onError,
      ...overrides
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    send.mockResolvedValue({ messageId: '<1@test>', recipients: ['ops@example.com'], subject: 'App error' });
    local = captureLogger();
    now = 1000;
  });

  it('normalises a single recipient into a list', () => {
    const handler = createHandler();
    expect(handler.to).toEqual(['ops@example.com']);
    expect(handler.maxSendsPerMinute).toBe(15);
  });

  it('sends the formatted record with the tag in the subject', async () => {
    const record = makeRecord('(DB timeout) query took too long');
    await createHandler().handle(record);

    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith({
      recipients: ['ops@example.com'],
      subject: 'App error (DB timeout)',
      body: formatRecord(record),
      html: false,
      from: 'Alerts <alerts@example.com>'
    });
    expect(onError).not.toHaveBeenCalled();
  });

  it('logs locally instead of sending once the limit is reached', async () => {
    const handler = createHandler({ to: ['a@example.com', 'b@example.com'], maxSendsPerMinute: 2 });
    const record = makeRecord('Disk full');

    await handler.handle(record);
    now += 1;
    await handler.handle(record);
    now += 1;
    await handler.handle(record);

    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[0][0].recipients).toEqual(['a@example.com', 'b@example.com']);
    const warnings = local.lines.filter(l => l.level === 40);
    expect(warnings.map(l => l.msg)).toEqual([
      '!! Not sending alert email as too many emails have been sent in the past minute !!',
      formatRecord(record)
    ]);
    expect(warnings[0].module).toBe('alert-handler');
  });

  it('sends again once the window has moved on', async () => {
    const handler = createHandler({ maxSendsPerMinute: 1 });
    await handler.handle(makeRecord('first'));
    now += 30;
    await handler.handle(makeRecord('second'));
    now += 30;
    await handler.handle(makeRecord('third'));

    expect(send.mock.calls.map(([mail]) => mail.body.includes('third'))).toEqual([false, true]);
  });

  it('reports a formatting failure once and does not throw', async () => {
    const failure = new Error('bad format');
    const record = makeRecord('anything');
    const handler = createHandler({ format: () => { throw failure; } });

    await expect(handler.handle(record)).resolves.toBeUndefined();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure, record);
    expect(send).not.toHaveBeenCalled();
  });

  it('reports a delivery failure', async () => {
    const failure = new DeliveryError('connection refused', 'CONNECTION');
    send.mockRejectedValueOnce(failure);

    await createHandler().handle(makeRecord('x'));
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe(failure);
  });

  it('lets an interrupt through unchanged', async () => {
    const abort = new Error('stopped');
    abort.name = 'AbortError';
    send.mockRejectedValueOnce(abort);

    await expect(createHandler().handle(makeRecord('x'))).rejects.toBe(abort);
    expect(onError).not.toHaveBeenCalled();
  });

  it('appends request and session details', async () => {
    const handler = createHandler({
      requestProvider: {
        tryGet: () => ({ url: 'http://api.test/login', method: 'POST', endpoint: '/login', form: { user: ['ann'], Password: ['test-secret'] } })
      },
      sessionProvider: { tryGet: () => ({ userId: 7 }) }
    });
    const record = makeRecord('Login failed');
    await handler.handle(record);

    const body = send.mock.calls[0][0].body;
    expect(body).toBe(
      formatRecord(record) +
      '\nRequest:\n\n' +
      'url:      http://api.test/login\n' +
      'method:   POST\n' +
      'endpoint: /login\n' +
      'form:     {\n' +
      '            "user": "ann",\n' +
      '            "Password": "******"\n' +
      '          }\n' +
      '\nSession:\n\n{\n  "userId": 7\n}\n'
    );
    expect(body).not.toContain('test-secret');
  });

  it('honours a custom obscured field list', async () => {
    const handler = createHandler({
      obscuredFields: ['CardNumber'],
      requestProvider: { tryGet: () => ({ url: 'u', method: 'POST', endpoint: '-', form: { cardnumber: '4111', password: 'test-secret' } }) }
    });
    await handler.handle(makeRecord('x'));

    const body = send.mock.calls[0][0].body;
    expect(body).toContain('"cardnumber": "******"');
    expect(body).toContain('"password": "test-secret"');
  });

  it('still sends when a context provider throws', async () => {
    const handler = createHandler({
      requestProvider: { tryGet: () => { throw new Error('no request'); } },
      sessionProvider: { tryGet: () => ({ theme: 'dark' }) }
    });
    await handler.handle(makeRecord('x'));

    const body = send.mock.calls[0][0].body;
    expect(body).not.toContain('\nRequest:\n');
    expect(body).toContain('\nSession:\n\n{\n  "theme": "dark"\n}\n');
    expect(onError).not.toHaveBeenCalled();
    expect(local.lines.find(l => l.level === 20)?.msg).toBe('Could not add request details to alert email');
  });

  it('reads the ambient request with the default providers', async () => {
    const handler = createHandler({ requestProvider: undefined, sessionProvider: undefined });
    const req = {
      protocol: 'http',
      method: 'GET',
      baseUrl: '',
      originalUrl: '/reports/9',
      headers: { host: 'localhost:3000' },
      route: { path: '/reports/:id' }
    };

    await runWithRequest(req, () => handler.handle(makeRecord('inside')));
    await handler.handle(makeRecord('outside'));

    const [inside, outside] = send.mock.calls.map(([mail]) => mail.body);
    expect(inside).toContain('url:      http://localhost:3000/reports/9\nmethod:   GET\nendpoint: /reports/:id\nform:     {}\n');
    expect(inside).not.toContain('\nSession:\n');
    expect(outside).toBe(formatRecord(makeRecord('outside')));
  });

  describe('write', () => {
    it('handles a pino line and waits for it on flush', async () => {
      const handler = createHandler();
      handler.write(JSON.stringify({ level: 50, time: 0, msg: 'Exception caught: (Cron) job died' }) + '\n');
      await handler.flush();

      expect(send).toHaveBeenCalledTimes(1);
      expect(send.mock.calls[0][0].subject).toBe('App error (Cron)');
    });

    it('reports a line it cannot parse', () => {
      createHandler().write('garbage');
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(SyntaxError);
      expect(onError.mock.calls[0][1]).toBeUndefined();
      expect(send).not.toHaveBeenCalled();
    });

    it('surfaces an interrupt through flush', async () => {
      const abort = new Error('stopped');
      abort.name = 'AbortError';
      send.mockRejectedValueOnce(abort);
      const onInterrupt = vi.fn<(err: unknown) => void>();
      const handler = createHandler({ onInterrupt });

      handler.write(JSON.stringify({ level: 50, time: 0, msg: 'x' }));
      await expect(handler.flush()).rejects.toBe(abort);
      expect(onInterrupt).toHaveBeenCalledWith(abort);
    });

    it('keeps an interrupt for flush after its send has settled', async () => {
      const abort = new Error('stopped');
      abort.name = 'AbortError';
      send.mockRejectedValueOnce(abort);
      const onInterrupt = vi.fn<(err: unknown) => void>();
      const handler = createHandler({ onInterrupt });

      handler.write(JSON.stringify({ level: 50, time: 0, msg: 'x' }));
      await new Promise(resolve => setTimeout(resolve, 10));

      expect(onInterrupt).toHaveBeenCalledTimes(1);
      expect(onInterrupt).toHaveBeenCalledWith(abort);
      expect(onError).not.toHaveBeenCalled();
      await expect(handler.flush()).rejects.toBe(abort);
      await expect(handler.flush()).resolves.toBeUndefined();
    });

    it('rethrows an interrupt outside the logging call by default', async () => {
      const abort = new Error('stopped');
      abort.name = 'AbortError';
      send.mockRejectedValueOnce(abort);
      const nextTick = vi.spyOn(process, 'nextTick').mockImplementationOnce(() => undefined);
      const handler = createHandler();

      try {
        handler.write(JSON.stringify({ level: 50, time: 0, msg: 'x' }));
        await expect(handler.flush()).rejects.toBe(abort);

        expect(nextTick).toHaveBeenCalled();
        const [callback] = nextTick.mock.calls[0];
        expect(() => callback()).toThrow(abort);
      } finally {
        nextTick.mockRestore();
      }
    });
  });
});
