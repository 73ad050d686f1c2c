import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, formatLog } from '../src/utils/logger';

describe('formatLog', () => {
  it('prefixes the UTC timestamp, level and source', () => {
    const now = new Date('2026-03-07T09:05:03.120Z');
    expect(formatLog('warn', 'queue', 'worker stalled', now)).toBe(
      '[2026-03-07 09:05:03] [WARN] [queue] worker stalled',
    );
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('appends the error message on a new line', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('server').error('failed to start', 'port taken');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/\[ERROR\] \[server\] failed to start\nport taken$/);
  });

  it('drops debug lines in production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    createLogger('resolver').debug('noise');

    expect(spy).not.toHaveBeenCalled();
  });
});
