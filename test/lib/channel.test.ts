import { describe, it, expect } from 'vitest';
import { SerialChannel } from '../../src/lib/channel.js';
import { sleep } from '../../src/lib/retry.js';
import { createMockLogger } from '../helpers.js';

describe('SerialChannel', () => {
  it('handles messages one at a time in post order', async () => {
    const log: string[] = [];
    const channel = new SerialChannel<{ id: string; delayMs: number }>(async (message) => {
      log.push(`start ${message.id}`);
      await sleep(message.delayMs);
      log.push(`end ${message.id}`);
    }, createMockLogger());

    await Promise.all([
      channel.post({ id: 'a', delayMs: 10 }),
      channel.post({ id: 'b', delayMs: 0 }),
      channel.post({ id: 'c', delayMs: 1 })
    ]);

    expect(log).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps going after a failed message', async () => {
    const logger = createMockLogger();
    const handled: number[] = [];
    const channel = new SerialChannel<number>(async (value) => {
      if (value === 1) {
        throw new Error('bad message');
      }
      handled.push(value);
    }, logger);

    await expect(channel.post(1)).rejects.toThrow('bad message');
    await channel.post(2);

    expect(handled).toEqual([2]);
    expect(logger.error).toHaveBeenCalledWith('Channel handler failed', { error: 'bad message' });
  });

  it('counts pending messages until drained', async () => {
    const channel = new SerialChannel<number>(async () => sleep(1), createMockLogger());
    void channel.post(1);
    void channel.post(2);
    expect(channel.pending).toBe(2);
    await channel.drain();
    expect(channel.pending).toBe(0);
  });
});
