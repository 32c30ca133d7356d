// Tests for the provider → outbound stream bridge

import { describe, it, expect } from 'vitest';
import type { StreamChunk } from '@asms/protocol';
import { sleep } from '../abort.js';
import { Channel } from '../channel.js';
import { bridgeStream, contentChunk } from './bridge.js';

describe('bridgeStream', () => {
  it('forwards every produced item in order', async () => {
    const outbound = new Channel<StreamChunk>(20);
    await bridgeStream<string>({
      signal: new AbortController().signal,
      outbound,
      capacity: 2,
      async produce(sink, signal) {
        for (const word of ['one ', 'two ', 'three']) {
          await sink.send(word, signal);
        }
      },
      toChunk: (word) => contentChunk(word, {}),
    });

    expect(outbound.drain()).toEqual([
      { type: 'content', data: 'one ', metadata: {} },
      { type: 'content', data: 'two ', metadata: {} },
      { type: 'content', data: 'three', metadata: {} },
    ]);
    expect(outbound.closed).toBe(false);
  });

  it('propagates a producer failure', async () => {
    const failure = new Error('provider failed');
    await expect(
      bridgeStream<string>({
        signal: new AbortController().signal,
        outbound: new Channel<StreamChunk>(1),
        async produce() {
          throw failure;
        },
        toChunk: (word) => contentChunk(word, {}),
      })
    ).rejects.toBe(failure);
  });

  it('rejects with the abort reason and stops forwarding', async () => {
    const controller = new AbortController();
    const outbound = new Channel<StreamChunk>(100);
    const reason = new Error('cancelled');
    setTimeout(() => controller.abort(reason), 30);

    await expect(
      bridgeStream<number>({
        signal: controller.signal,
        outbound,
        async produce(sink, signal) {
          for (let i = 0; ; i++) {
            await sleep(5, signal);
            await sink.send(i, signal);
          }
        },
        toChunk: (value) => contentChunk(value, {}),
      })
    ).rejects.toBe(reason);

    const forwarded = outbound.size;
    await sleep(20);
    expect(outbound.size).toBe(forwarded);
  });

  it('rejects immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort('gone');
    await expect(
      bridgeStream<number>({
        signal: controller.signal,
        outbound: new Channel<StreamChunk>(1),
        async produce() {},
        toChunk: (value) => contentChunk(value, {}),
      })
    ).rejects.toBe('gone');
  });
});

describe('contentChunk', () => {
  it('sets only the metadata that is known', () => {
    expect(contentChunk('hi', { finishReason: 'stop', model: 'llama3', id: '' })).toEqual({
      type: 'content',
      data: 'hi',
      metadata: { finish_reason: 'stop', model: 'llama3' },
    });
  });
});
