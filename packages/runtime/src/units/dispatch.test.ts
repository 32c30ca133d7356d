// Tests for the registry and name-based dispatch

import { describe, it, expect, beforeEach } from 'vitest';
import type { Resource, StreamChunk } from '@asms/protocol';
import { hasCode, numberSchema, objectSchema, stringSchema } from '@asms/protocol';
import { sleep } from '../abort.js';
import { Channel } from '../channel.js';
import { PollingResource } from '../resources/poller.js';
import { defineCommand, defineQuery, defineStreamingCommand } from './define.js';
import { executeUnit, iterateStream, streamUnit } from './dispatch.js';
import { UnitRegistry, describeUnit } from './registry.js';

// --- Test Fixtures ---

const greetSchema = objectSchema({ name: stringSchema(), times: numberSchema({ min: 1 }) }, ['name']);

function createGreetCommand() {
  return defineCommand({
    name: 'test.greet',
    domain: 'test',
    description: 'Greet someone',
    inputSchema: greetSchema,
    outputSchema: objectSchema({ greeting: stringSchema() }),
    async run(input) {
      return { greeting: `hello ${String(input.name)}` };
    },
  });
}

function createSlowQuery(delayMs: number) {
  return defineQuery({
    name: 'test.slow',
    domain: 'test',
    description: 'Wait before answering',
    inputSchema: objectSchema({}),
    outputSchema: objectSchema({}),
    async run(_input, ctx) {
      await sleep(delayMs, ctx.signal);
      return { done: true };
    },
  });
}

function createCountCommand(count: number, delayMs = 0) {
  return defineStreamingCommand({
    name: 'test.count',
    domain: 'test',
    description: 'Stream numbers',
    inputSchema: objectSchema({}),
    outputSchema: objectSchema({}),
    async run() {
      return { count };
    },
    async stream(_input, ctx, outbound) {
      for (let i = 1; i <= count; i++) {
        if (delayMs > 0) await sleep(delayMs, ctx.signal);
        await outbound.send({ type: 'content', data: i, metadata: {} }, ctx.signal);
      }
    },
  });
}

function createStaticResource(uri: string): Resource {
  return new PollingResource({
    uri,
    domain: 'test',
    schema: objectSchema({}),
    intervalMs: 1000,
    fetch: async () => ({ uri }),
  });
}

describe('UnitRegistry', () => {
  let registry: UnitRegistry;

  beforeEach(() => {
    registry = new UnitRegistry();
  });

  it('rejects duplicate names with already_exists', () => {
    registry.registerCommand(createGreetCommand());
    let caught: unknown;
    try {
      registry.registerCommand(createGreetCommand());
    } catch (error) {
      caught = error;
    }
    expect(hasCode(caught, 'already_exists')).toBe(true);
  });

  it('resolves static resources before factories', () => {
    const fixed = createStaticResource('asms://test/fixed');
    registry.registerResource(fixed);
    registry.registerResourceFactory({
      pattern: 'asms://test/*',
      canCreate: (uri) => uri.startsWith('asms://test/'),
      create: (uri) => createStaticResource(uri),
    });

    expect(registry.getResource('asms://test/fixed')).toBe(fixed);
    expect(registry.getResource('asms://test/other')?.uri).toBe('asms://test/other');
    expect(registry.getResource('asms://elsewhere/x')).toBeUndefined();
  });

  it('counts and unregisters units', () => {
    registry.registerCommand(createGreetCommand());
    registry.registerQuery(createSlowQuery(1));
    expect(registry.counts()).toEqual({ commands: 1, queries: 1, resources: 0, factories: 0 });
    expect(registry.listUnits().map((unit) => unit.name)).toEqual(['test.greet', 'test.slow']);

    expect(registry.unregisterCommand('test.greet')).toBe(true);
    expect(registry.unregisterCommand('test.greet')).toBe(false);
    expect(registry.getUnit('test.greet')).toBeUndefined();
  });

  it('describes units for discovery', () => {
    expect(describeUnit(createCountCommand(1))).toMatchObject({
      name: 'test.count',
      domain: 'test',
      kind: 'command',
      streaming: true,
    });
    expect(describeUnit(createGreetCommand()).streaming).toBe(false);
  });
});

describe('executeUnit', () => {
  let registry: UnitRegistry;

  beforeEach(() => {
    registry = new UnitRegistry();
    registry.registerCommand(createGreetCommand());
    registry.registerQuery(createSlowQuery(1000));
  });

  it('runs a unit by name', async () => {
    await expect(executeUnit(registry, 'test.greet', { name: 'ada' })).resolves.toEqual({
      greeting: 'hello ada',
    });
  });

  it('fails not_found for an unknown name', async () => {
    await expect(executeUnit(registry, 'test.missing', {})).rejects.toMatchObject({
      code: 'not_found',
      message: 'unit not found: test.missing',
    });
  });

  it('validates input against the schema before running', async () => {
    await expect(executeUnit(registry, 'test.greet', { times: 2 })).rejects.toMatchObject({
      code: 'invalid_input',
      message: 'required field "name" is missing',
    });
  });

  it('rejects with the abort reason when the timeout elapses', async () => {
    await expect(executeUnit(registry, 'test.slow', {}, { timeoutMs: 10 })).rejects.toMatchObject({
      name: 'TimeoutError',
    });
  });
});

describe('streamUnit', () => {
  it('forwards chunks in order into the caller sink', async () => {
    const registry = new UnitRegistry();
    registry.registerCommand(createCountCommand(3));
    const outbound = new Channel<StreamChunk>(10);

    await streamUnit(registry, 'test.count', {}, outbound);

    expect(outbound.drain().map((chunk) => chunk.data)).toEqual([1, 2, 3]);
  });

  it('refuses units that do not stream', async () => {
    const registry = new UnitRegistry();
    registry.registerCommand(createGreetCommand());

    await expect(
      streamUnit(registry, 'test.greet', { name: 'ada' }, new Channel<StreamChunk>(1))
    ).rejects.toMatchObject({ code: 'invalid_input', message: 'unit does not support streaming: test.greet' });
  });

  it('rejects with the caller abort reason', async () => {
    const registry = new UnitRegistry();
    registry.registerCommand(createCountCommand(100, 5));
    const controller = new AbortController();
    const reason = new Error('caller went away');
    setTimeout(() => controller.abort(reason), 20);

    await expect(
      streamUnit(registry, 'test.count', {}, new Channel<StreamChunk>(100), { signal: controller.signal })
    ).rejects.toBe(reason);
  });
});

describe('iterateStream', () => {
  it('yields every chunk then ends', async () => {
    const registry = new UnitRegistry();
    registry.registerCommand(createCountCommand(4));

    const received: unknown[] = [];
    for await (const chunk of iterateStream(registry, 'test.count', {}, { bufferSize: 2 })) {
      received.push(chunk.data);
    }
    expect(received).toEqual([1, 2, 3, 4]);
  });

  it('stops the stream when the consumer leaves early', async () => {
    const registry = new UnitRegistry();
    registry.registerCommand(createCountCommand(1000));

    const received: unknown[] = [];
    for await (const chunk of iterateStream(registry, 'test.count', {}, { bufferSize: 1 })) {
      received.push(chunk.data);
      if (received.length === 2) break;
    }
    expect(received).toEqual([1, 2]);
  });
});
