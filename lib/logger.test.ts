import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger, logger, MAX_LOG_HISTORY } from './logger';

describe('logger', () => {
  beforeEach(() => {
    logger.clearHistory();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with level and scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('roster-store').warn('Validation failed', { missing: ['name'] });
    expect(warn).toHaveBeenCalledWith('[WARN] [roster-store] Validation failed', { missing: ['name'] });
  });

  it('skips console output below the minimum level but keeps history', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const log = createLogger('quiet');
    log.setLevel('warn');
    log.info('hidden');

    expect(info).not.toHaveBeenCalled();
    expect(logger.getHistory().map((e) => [e.level, e.scope, e.message])).toEqual([['info', 'quiet', 'hidden']]);
  });

  it('records errors with name, message and stack', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('ingest').error('Failed', new TypeError('bad cell'));

    const [entry] = logger.getHistory('error');
    expect(entry.data).toEqual({ name: 'TypeError', message: 'bad cell', stack: expect.any(String) });
  });

  it('caps the shared history', () => {
    const log = createLogger('flood');
    log.setLevel('error');
    for (let i = 0; i < MAX_LOG_HISTORY + 5; i++) log.debug(`entry ${i}`);

    const history = logger.getHistory();
    expect(history).toHaveLength(MAX_LOG_HISTORY);
    expect(history[0].message).toBe('entry 5');
  });
});
