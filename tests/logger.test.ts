import { describe, expect, it } from 'vitest';

import { Logger } from '../src/utils/logger.js';

function capture(level: 'debug' | 'info' | 'warn', json = false) {
  const lines: string[] = [];
  const logger = new Logger({ level, json, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('Logger', () => {
  it('drops records below the level', () => {
    const { logger, lines } = capture('warn');
    logger.info('hidden');
    logger.warn('shown');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ warn shown$/);
  });

  it('merges child bindings into JSON records', () => {
    const { logger, lines } = capture('debug', true);
    logger.child({ taskId: 't-20261019-001' }).debug('tick', { elapsedMs: 10 });

    const record = JSON.parse(lines[0]);
    expect(record).toMatchObject({ level: 'debug', message: 'tick', taskId: 't-20261019-001', elapsedMs: 10 });
  });

  it('appends fields as JSON in text mode', () => {
    const { logger, lines } = capture('info');
    logger.info('finished', { state: 'succeeded' });
    expect(lines[0]).toMatch(/ info finished \{"state":"succeeded"\}$/);
  });
});
