import { describe, expect, it } from 'vitest';

import { ProgressChannel } from '../src/core/task/channel.js';
import type { ProgressEvent } from '../src/core/task/types.js';
import { createNullLogger, Logger } from '../src/utils/logger.js';

describe('ProgressChannel', () => {
  it('stamps events with strictly increasing timestamps', async () => {
    const seen: ProgressEvent[] = [];
    const channel = new ProgressChannel('t-1', (e) => void seen.push(e), createNullLogger(), () => 5_000);

    channel.emit({ message: 'a', elapsedMs: 0, state: 'running' });
    channel.emit({ message: 'b', elapsedMs: 0, state: 'running' });
    channel.emit({ message: 'c', elapsedMs: 0, state: 'running' });
    await channel.drained();

    expect(seen.map((e) => [e.message, e.timestamp, e.taskId])).toEqual([
      ['a', 5_000, 't-1'],
      ['b', 5_001, 't-1'],
      ['c', 5_002, 't-1']
    ]);
  });

  it('does not wait for a slow sink', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const seen: string[] = [];
    const channel = new ProgressChannel('t-2', async (e) => {
      await gate;
      seen.push(e.message);
    }, createNullLogger());

    channel.emit({ message: 'first', elapsedMs: 0, state: 'running' });
    channel.emit({ message: 'second', elapsedMs: 0, state: 'running' });
    expect(seen).toEqual([]);

    release();
    await channel.drained();
    expect(seen).toEqual(['first', 'second']);
  });

  it('logs sink errors and keeps delivering', async () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', write: (l) => lines.push(l) });
    const seen: string[] = [];
    const channel = new ProgressChannel('t-3', (e) => {
      if (e.message === 'boom') throw new Error('sink broke');
      seen.push(e.message);
    }, logger);

    channel.emit({ message: 'boom', elapsedMs: 0, state: 'running' });
    channel.emit({ message: 'after', elapsedMs: 0, state: 'running' });
    await channel.drained();

    expect(seen).toEqual(['after']);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('progress sink failed');
    expect(lines[0]).toContain('"error":"sink broke"');
  });

  it('can be iterated until closed', async () => {
    const channel = new ProgressChannel('t-4', undefined, createNullLogger());
    channel.emit({ message: 'one', elapsedMs: 0, state: 'running' });
    channel.emit({ message: 'two', elapsedMs: 10, percent: 50, state: 'running' });
    channel.close();
    channel.emit({ message: 'ignored', elapsedMs: 20, state: 'running' });

    const messages: string[] = [];
    for await (const e of channel) messages.push(e.message);
    expect(messages).toEqual(['one', 'two']);
  });
});
