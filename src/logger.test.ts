import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from './logger.ts';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));
    logger.debug('mod', 'quiet');
    logger.info('mod', 'quiet');
    logger.warn('mod', 'loud');
    logger.error('mod', 'louder');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \| warn \| mod \| loud$/);
    expect(lines[1]).toMatch(/ \| error \| mod \| louder$/);
  });

  it('writes to console.log by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('info').info('cli', 'hello');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toMatch(/ \| info \| cli \| hello$/);
  });
});
