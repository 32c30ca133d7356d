// Tests for inference units and the model catalogue resource

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ResourceUpdate, StreamChunk } from '@asms/protocol';
import { sleep } from '../abort.js';
import { Channel } from '../channel.js';
import { createCapturingPublisher } from '../events/publishers.js';
import { executeUnit, streamUnit } from '../units/dispatch.js';
import { UnitRegistry } from '../units/registry.js';
import { registerInferenceUnits } from './index.js';
import { MOCK_CHAT_CONTENT, MOCK_COMPLETION_TEXT, MockInferenceProvider, splitWords } from './provider.js';
import { MODELS_URI } from './resources.js';

const signal = () => new AbortController().signal;

describe('inference units', () => {
  let provider: MockInferenceProvider;
  let registry: UnitRegistry;
  let events: ReturnType<typeof createCapturingPublisher>;

  beforeEach(() => {
    provider = new MockInferenceProvider();
    registry = new UnitRegistry();
    events = createCapturingPublisher();
    registerInferenceUnits(registry, { provider, events });
  });

  describe('inference.chat', () => {
    it('returns the completion with usage and request events', async () => {
      const output = await executeUnit(registry, 'inference.chat', {
        model: 'llama3',
        messages: [{ role: 'user', content: 'Hello!' }],
      });

      expect(output).toMatchObject({
        content: MOCK_CHAT_CONTENT,
        finish_reason: 'stop',
        usage: { prompt_tokens: 1, completion_tokens: 50, total_tokens: 51 },
        model: 'llama3',
      });
      expect(output.id).toMatch(/^chatcmpl-/);
      expect(events.events.map((event) => event.type)).toEqual([
        'execution_started',
        'inference.request_started',
        'inference.request_completed',
        'execution_completed',
      ]);
      expect(events.ofType('inference.request_completed')[0].payload).toMatchObject({
        unit: 'inference.chat',
        model: 'llama3',
      });
    });

    it('rejects an unknown role', async () => {
      const command = registry.getCommand('inference.chat');
      await expect(
        command?.execute({ signal: signal() }, { model: 'llama3', messages: [{ role: 'robot', content: 'hi' }] })
      ).rejects.toMatchObject({ code: 'invalid_input', message: 'invalid message role: robot' });
    });

    it('rejects an unknown role through dispatch before the provider runs', async () => {
      await expect(
        executeUnit(registry, 'inference.chat', { model: 'llama3', messages: [{ role: 'robot', content: 'hi' }] })
      ).rejects.toMatchObject({ code: 'invalid_input' });
      expect(events.ofType('inference.request_started')).toEqual([]);
    });

    it('requires a non-empty message list', async () => {
      const command = registry.getCommand('inference.chat');
      await expect(command?.execute({ signal: signal() }, { model: 'llama3', messages: [] })).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'messages are required',
      });
    });

    it('requires a model', async () => {
      const command = registry.getCommand('inference.chat');
      await expect(
        command?.execute({ signal: signal() }, { model: '', messages: [{ role: 'user', content: 'hi' }] })
      ).rejects.toMatchObject({ code: 'invalid_input', message: 'model not specified' });
    });

    it('wraps a provider failure and reports it', async () => {
      provider.errors.chat = new Error('backend down');

      await expect(
        executeUnit(registry, 'inference.chat', { model: 'llama3', messages: [{ role: 'user', content: 'hi' }] })
      ).rejects.toMatchObject({ code: 'internal_error', message: 'chat completion failed: backend down' });
      expect(events.ofType('inference.request_failed')[0].payload).toMatchObject({
        unit: 'inference.chat',
        error: 'chat completion failed: backend down',
        error_code: 'internal_error',
      });
    });

    it('streams word chunks that concatenate to the full reply', async () => {
      const outbound = new Channel<StreamChunk>(20);

      await streamUnit(
        registry,
        'inference.chat',
        { model: 'llama3', messages: [{ role: 'user', content: 'Hello!' }] },
        outbound
      );

      const chunks = outbound.drain();
      expect(chunks).toHaveLength(splitWords(MOCK_CHAT_CONTENT).length);
      expect(chunks.map((chunk) => chunk.data).join('')).toBe(MOCK_CHAT_CONTENT);
      expect(chunks.every((chunk) => chunk.type === 'content')).toBe(true);
      expect(chunks[chunks.length - 1].metadata).toMatchObject({ finish_reason: 'stop', model: 'llama3' });
      expect(events.ofType('execution_completed')[0].payload).toMatchObject({ output: { chunks: 9 } });
    });
  });

  describe('stream cancellation', () => {
    it('stops forwarding once the caller aborts', async () => {
      const slow = new MockInferenceProvider({ streamDelayMs: 20 });
      const slowRegistry = new UnitRegistry();
      registerInferenceUnits(slowRegistry, { provider: slow });
      const controller = new AbortController();
      const reason = new Error('client went away');
      const outbound = new Channel<StreamChunk>(20);
      setTimeout(() => controller.abort(reason), 50);

      await expect(
        streamUnit(
          slowRegistry,
          'inference.chat',
          { model: 'llama3', messages: [{ role: 'user', content: 'Hello!' }] },
          outbound,
          { signal: controller.signal }
        )
      ).rejects.toBe(reason);

      const forwarded = outbound.size;
      expect(forwarded).toBeLessThan(splitWords(MOCK_CHAT_CONTENT).length);
      await sleep(60);
      expect(outbound.size).toBe(forwarded);
    });
  });

  describe('inference.complete', () => {
    it('completes a prompt', async () => {
      const output = await executeUnit(registry, 'inference.complete', { model: 'llama3', prompt: 'Once upon' });
      expect(output).toEqual({
        text: MOCK_COMPLETION_TEXT,
        finish_reason: 'stop',
        usage: { prompt_tokens: 2, completion_tokens: 30, total_tokens: 32 },
      });
    });

    it('streams the completion text', async () => {
      const outbound = new Channel<StreamChunk>(20);
      await streamUnit(registry, 'inference.complete', { model: 'llama3', prompt: 'Once upon' }, outbound);
      expect(
        outbound
          .drain()
          .map((chunk) => chunk.data)
          .join('')
      ).toBe(MOCK_COMPLETION_TEXT);
    });

    it('cannot stream a unit without a streaming form', async () => {
      await expect(
        streamUnit(registry, 'inference.embed', { model: 'm', input: ['x'] }, new Channel<StreamChunk>(1))
      ).rejects.toMatchObject({ message: 'unit does not support streaming: inference.embed' });
    });
  });

  describe('inference.embed', () => {
    it('returns one vector per text', async () => {
      const output = await executeUnit(registry, 'inference.embed', {
        model: 'text-embedding-3-small',
        input: ['hello world', 'hi'],
      });
      expect(output.embeddings).toHaveLength(2);
      expect(output.usage).toEqual({ prompt_tokens: 2, total_tokens: 2 });
    });

    it('accepts a single string when called directly', async () => {
      const command = registry.getCommand('inference.embed');
      const output = await command?.execute({ signal: signal() }, { model: 'm', input: 'hello' });
      expect(output?.embeddings).toHaveLength(1);
    });
  });

  describe('binary fields', () => {
    it('decodes base64 audio for transcription', async () => {
      const audio = Buffer.from(new Uint8Array(32000)).toString('base64');
      const output = await executeUnit(registry, 'inference.transcribe', { model: 'whisper-large-v3', audio });
      expect(output).toMatchObject({ language: 'en', duration: 2 });
      expect(output.segments).toHaveLength(2);
    });

    it('rejects empty audio', async () => {
      await expect(
        executeUnit(registry, 'inference.transcribe', { model: 'whisper-large-v3', audio: '' })
      ).rejects.toMatchObject({ code: 'invalid_input', message: 'audio is required' });
    });

    it('encodes synthesized audio as base64', async () => {
      const output = await executeUnit(registry, 'inference.synthesize', { model: 'tts-1', text: 'Hello' });
      expect(output.format).toBe('wav');
      expect(output.duration).toBeCloseTo(0.25);
      expect(typeof output.audio === 'string' && Buffer.from(output.audio, 'base64').length).toBe(4000);
    });

    it('encodes generated video as base64', async () => {
      const output = await executeUnit(registry, 'inference.generate_video', { model: 'v', prompt: 'waves' });
      expect(output).toEqual({
        video: Buffer.from('mock_video_data').toString('base64'),
        format: 'mp4',
        duration: 5,
      });
    });
  });

  describe('other units', () => {
    it('ranks documents in order', async () => {
      const output = await executeUnit(registry, 'inference.rerank', {
        model: 'r',
        query: 'ai',
        documents: ['about ai', 'about cats'],
      });
      expect(output.results).toEqual([
        { document: 'about ai', score: 1, index: 0 },
        { document: 'about cats', score: 0.9, index: 1 },
      ]);
    });

    it('generates images', async () => {
      const output = await executeUnit(registry, 'inference.generate_image', { model: 'dall-e-3', prompt: 'a cat' });
      expect(output).toEqual({ images: [{ base64: 'mock_base64_image_data', url: '', data: '' }], format: 'png' });
    });

    it('detects objects', async () => {
      const image = Buffer.from('png').toString('base64');
      const output = await executeUnit(registry, 'inference.detect', { model: 'yolo', image });
      expect(output.detections).toEqual([
        { label: 'person', confidence: 0.95, bbox: [100, 100, 200, 300] },
        { label: 'car', confidence: 0.87, bbox: [350, 200, 150, 100] },
      ]);
    });

    it('filters models by type', async () => {
      const output = await executeUnit(registry, 'inference.models', { type: 'diffusion' });
      expect(output.models).toEqual([
        { id: 'dall-e-3', name: 'DALL-E 3', type: 'diffusion', provider: 'openai', description: '', max_tokens: 0 },
        {
          id: 'stable-diffusion-xl',
          name: 'Stable Diffusion XL',
          type: 'diffusion',
          provider: 'local',
          description: '',
          max_tokens: 0,
        },
      ]);
    });

    it('lists voices with empty strings for unknown fields', async () => {
      const output = await executeUnit(registry, 'inference.voices', {});
      expect(output.voices).toHaveLength(6);
      expect(Array.isArray(output.voices) && output.voices[0]).toEqual({
        id: 'alloy',
        name: 'Alloy',
        language: 'en',
        gender: '',
        description: 'Neutral and balanced',
      });
    });
  });
});

describe('models resource', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('emits models_changed when the catalogue size changes', async () => {
    const provider = new MockInferenceProvider();
    const registry = new UnitRegistry();
    registerInferenceUnits(registry, { provider });

    const resource = registry.getResource(MODELS_URI);
    const subscription = resource?.watch();
    await vi.advanceTimersByTimeAsync(60_000);
    provider.models.push({ id: 'mistral', name: 'Mistral', type: 'llm' });
    await vi.advanceTimersByTimeAsync(60_000);
    await vi.advanceTimersByTimeAsync(60_000);
    subscription?.unsubscribe();

    const updates: ResourceUpdate[] = [];
    for await (const update of subscription?.updates ?? []) {
      updates.push(update);
    }
    expect(updates.map((update) => update.operation)).toEqual(['refresh', 'models_changed', 'refresh']);
    expect(updates[1].data?.models).toHaveLength(8);
  });
});
