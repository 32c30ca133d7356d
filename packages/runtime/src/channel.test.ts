// Tests for the bounded channel

import { describe, it, expect } from 'vitest';
import { hasCode } from '@asms/protocol';
import { Channel, ChannelClosedError } from './channel.js';

describe('Channel', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new Channel<number>(0)).toThrow(RangeError);
    expect(() => new Channel<number>(1.5)).toThrow(RangeError);
  });

  it('delivers values in send order', async () => {
    const channel = new Channel<number>(3);
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) {
      received.push(value);
    }
    expect(received).toEqual([1, 2, 3]);
  });

  it('trySend fails when the buffer is full', () => {
    const channel = new Channel<string>(1);
    expect(channel.trySend('a')).toBe(true);
    expect(channel.trySend('b')).toBe(false);
    expect(channel.size).toBe(1);
  });

  it('trySend hands a value straight to a waiting receiver', async () => {
    const channel = new Channel<string>(1);
    const pending = channel.receive();
    expect(channel.trySend('direct')).toBe(true);
    expect(channel.size).toBe(0);
    await expect(pending).resolves.toEqual({ done: false, value: 'direct' });
  });

  it('send waits for space and resumes after a receive', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);
    let sent = false;
    const second = channel.send(2).then(() => {
      sent = true;
    });
    await Promise.resolve();
    expect(sent).toBe(false);

    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await second;
    expect(sent).toBe(true);
    expect(channel.drain()).toEqual([2]);
  });

  it('a blocked send rejects with the abort reason', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);
    const controller = new AbortController();
    const blocked = channel.send(2, controller.signal);
    const reason = new Error('stop');
    controller.abort(reason);

    await expect(blocked).rejects.toBe(reason);
    expect(channel.drain()).toEqual([1]);
  });

  it('receive rejects with the abort reason while waiting', async () => {
    const channel = new Channel<number>(1);
    const controller = new AbortController();
    const waiting = channel.receive(controller.signal);
    controller.abort('cancelled');
    await expect(waiting).rejects.toBe('cancelled');
  });

  it('close ends waiting receivers and rejects waiting senders', async () => {
    const receiving = new Channel<number>(1);
    const waiting = receiving.receive();
    receiving.close();
    await expect(waiting).resolves.toEqual({ done: true, value: undefined });

    const sending = new Channel<number>(1);
    await sending.send(1);
    const blocked = sending.send(2);
    sending.close();
    await expect(blocked).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('still yields buffered values after close', async () => {
    const channel = new Channel<number>(2);
    channel.trySend(1);
    channel.trySend(2);
    channel.close();

    expect(channel.closed).toBe(true);
    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await expect(channel.receive()).resolves.toEqual({ done: false, value: 2 });
    await expect(channel.receive()).resolves.toEqual({ done: true, value: undefined });
  });

  it('send on a closed channel fails internal_error', async () => {
    const channel = new Channel<number>(1);
    channel.close();
    channel.close();
    expect(channel.trySend(1)).toBe(false);

    const error = await channel.send(1).catch((e: unknown) => e);
    expect(hasCode(error, 'internal_error')).toBe(true);
  });
});
