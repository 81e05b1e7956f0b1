import { PassThrough } from 'node:stream';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { getConfig, loadConfig, resetConfig, setConfig } from './config';
import { ListError, ListErrorCode } from './errors';
import { List } from './list';
import { createLogger, getLogger } from './logger';

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should default to range checks on and silent logging', () => {
    expect(loadConfig({})).toEqual({ rangeChecks: true, logLevel: 'silent' });
  });

  it('should read overrides from the environment', () => {
    expect(loadConfig({ SLOTLIST_RANGE_CHECKS: 'false', SLOTLIST_LOG_LEVEL: 'DEBUG' })).toEqual({
      rangeChecks: false,
      logLevel: 'debug',
    });
  });

  it('should reject malformed values', () => {
    expect(() => loadConfig({ SLOTLIST_RANGE_CHECKS: 'maybe' })).toThrowError(
      'Invalid SLOTLIST_RANGE_CHECKS "maybe": expected a boolean'
    );
    expect(() => loadConfig({ SLOTLIST_LOG_LEVEL: 'trace' })).toThrowError(/Invalid SLOTLIST_LOG_LEVEL "trace"/);
  });

  it('should apply the process default to new lists only', () => {
    const checked = new List([1]);
    setConfig({ rangeChecks: false });
    expect(getConfig().rangeChecks).toBe(false);

    const unchecked = new List([1]);
    expect(unchecked.get(5)).toBeUndefined();
    expect(() => checked.get(5)).toThrowError(ListError);
  });

  it('should let a list override the process default', () => {
    setConfig({ rangeChecks: false });
    const list = new List([1], { rangeChecks: true });
    expect(() => list.get(1)).toThrowError('Index 1 out of bounds for length 1');
  });

  it('should carry an unchecked list through the range operations it calls', () => {
    const list = new List([1, 2], { rangeChecks: false });
    expect(() => list.move(0, 5)).not.toThrow();
    expect(list.get(0)).toBe(2);
  });
});

describe('logger', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should write JSON lines with the module name and context', async () => {
    const stream = new PassThrough();
    const lines: string[] = [];
    stream.on('data', (chunk: Buffer) => {
      lines.push(...chunk.toString().split('\n').filter(line => line.length > 0));
    });

    const logger = createLogger({ level: 'debug', module: 'test', stream });
    logger.debug('Capacity changed', { from: 0, to: 4, count: 0 });

    await vi.waitFor(() => expect(lines.length).toBe(1));
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'debug',
      message: 'Capacity changed',
      module: 'test',
      from: 0,
      to: 4,
      count: 0,
    });
  });

  it('should attach error details', async () => {
    const stream = new PassThrough();
    const lines: string[] = [];
    stream.on('data', (chunk: Buffer) => {
      lines.push(...chunk.toString().split('\n').filter(line => line.length > 0));
    });

    const logger = createLogger({ level: 'warn', module: 'test', stream });
    const error = new ListError({ code: ListErrorCode.DUPLICATE_ITEM, index: 2 });
    logger.info('dropped');
    logger.warn('Add rejected', { index: 2 }, error);

    await vi.waitFor(() => expect(lines.length).toBe(1));
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'warn',
      message: 'Add rejected',
      index: 2,
      error: ListErrorCode.DUPLICATE_ITEM,
    });
  });

  it('should rebuild the shared logger when the level changes', () => {
    const quiet = getLogger('config-test');
    expect(getLogger('config-test')).toBe(quiet);
    setConfig({ logLevel: 'warn' });
    expect(getLogger('config-test')).not.toBe(quiet);
  });
});
