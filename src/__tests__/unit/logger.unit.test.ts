/**
 * Unit Tests — Logger Redaction
 *
 * The production options are reused with the transport removed, writing into
 * an in-memory stream so each emitted line can be parsed back.
 */
import { loggerOptions } from '@core/logger';
import pino from 'pino';

function captureLogger() {
  const lines: string[] = [];
  const log = pino(
    { ...loggerOptions, level: 'info', transport: undefined },
    {
      write(line: string) {
        lines.push(line);
      },
    },
  );
  return { log, lines };
}

const headers = {
  accept: 'application/json',
  authorization: 'Bearer test-secret',
  cookie: 'sid=test-session',
};

describe('logger', () => {
  it('should redact the Authorization and Cookie request headers', () => {
    const { log, lines } = captureLogger();

    log.info({ req: { method: 'GET', url: '/api/v1/health', headers } }, 'request completed');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).req.headers).toEqual({
      accept: 'application/json',
      authorization: '[Redacted]',
      cookie: '[Redacted]',
    });
  });

  it('should redact in request-scoped child loggers too', () => {
    const { log, lines } = captureLogger();

    log.child({ reqId: 'req-1' }).info({ req: { headers } }, 'request completed');

    const entry = JSON.parse(lines[0]);
    expect(entry.reqId).toBe('req-1');
    expect(entry.req.headers.authorization).toBe('[Redacted]');
    expect(entry.req.headers.cookie).toBe('[Redacted]');
  });
});
