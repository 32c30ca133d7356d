// Inference backends

import { randomUUID } from 'node:crypto';
import type {
  AudioResponse,
  ChatOptions,
  ChatResponse,
  ChatStreamChunk,
  ChunkSink,
  CompleteOptions,
  CompleteStreamChunk,
  CompletionResponse,
  DetectionResponse,
  EmbeddingResponse,
  ImageGenerationResponse,
  ImageOptions,
  InferenceModel,
  Message,
  RerankResponse,
  TranscriptionResponse,
  VideoGenerationResponse,
  VideoOptions,
  Voice,
} from '@asms/protocol';
import { sleep } from '../abort.js';

/**
 * Backend that runs models.
 *
 * Stream methods write chunks to `sink` in order and resolve once the last
 * chunk is written. They must stop promptly once `signal` aborts.
 */
export interface InferenceProvider {
  chat(model: string, messages: Message[], options: ChatOptions, signal?: AbortSignal): Promise<ChatResponse>;
  chatStream(
    model: string,
    messages: Message[],
    options: ChatOptions,
    sink: ChunkSink<ChatStreamChunk>,
    signal: AbortSignal
  ): Promise<void>;
  complete(model: string, prompt: string, options: CompleteOptions, signal?: AbortSignal): Promise<CompletionResponse>;
  completeStream(
    model: string,
    prompt: string,
    options: CompleteOptions,
    sink: ChunkSink<CompleteStreamChunk>,
    signal: AbortSignal
  ): Promise<void>;
  embed(model: string, input: string[], signal?: AbortSignal): Promise<EmbeddingResponse>;
  transcribe(model: string, audio: Uint8Array, language: string, signal?: AbortSignal): Promise<TranscriptionResponse>;
  synthesize(model: string, text: string, voice: string, signal?: AbortSignal): Promise<AudioResponse>;
  generateImage(model: string, prompt: string, options: ImageOptions, signal?: AbortSignal): Promise<ImageGenerationResponse>;
  generateVideo(model: string, prompt: string, options: VideoOptions, signal?: AbortSignal): Promise<VideoGenerationResponse>;
  rerank(model: string, query: string, documents: string[], signal?: AbortSignal): Promise<RerankResponse>;
  detect(model: string, image: Uint8Array, signal?: AbortSignal): Promise<DetectionResponse>;
  /** Empty type means every model */
  listModels(modelType?: string, signal?: AbortSignal): Promise<InferenceModel[]>;
  listVoices(model?: string, signal?: AbortSignal): Promise<Voice[]>;
}

export type InferenceOperation = keyof InferenceProvider;

export const MOCK_CHAT_CONTENT = 'This is a mock response from the AI model.';
export const MOCK_COMPLETION_TEXT = 'This is a mock completion response.';
export const MOCK_EMBEDDING_DIMENSIONS = 1536;

const MOCK_MODELS: readonly InferenceModel[] = [
  { id: 'llama3', name: 'Llama 3', type: 'llm', provider: 'ollama', maxTokens: 8192 },
  { id: 'gpt-4', name: 'GPT-4', type: 'llm', provider: 'openai', maxTokens: 8192 },
  { id: 'whisper-large-v3', name: 'Whisper Large V3', type: 'asr', provider: 'ollama' },
  { id: 'tts-1', name: 'TTS 1', type: 'tts', provider: 'openai' },
  { id: 'text-embedding-3-small', name: 'Text Embedding 3 Small', type: 'embedding', provider: 'openai' },
  { id: 'dall-e-3', name: 'DALL-E 3', type: 'diffusion', provider: 'openai' },
  { id: 'stable-diffusion-xl', name: 'Stable Diffusion XL', type: 'diffusion', provider: 'local' },
];

const MOCK_VOICES: readonly Voice[] = [
  { id: 'alloy', name: 'Alloy', language: 'en', description: 'Neutral and balanced' },
  { id: 'echo', name: 'Echo', language: 'en', gender: 'male', description: 'Warm and conversational' },
  { id: 'fable', name: 'Fable', language: 'en', gender: 'neutral', description: 'British accent' },
  { id: 'onyx', name: 'Onyx', language: 'en', gender: 'male', description: 'Deep and authoritative' },
  { id: 'nova', name: 'Nova', language: 'en', gender: 'female', description: 'Energetic and friendly' },
  { id: 'shimmer', name: 'Shimmer', language: 'en', gender: 'female', description: 'Soft and gentle' },
];

function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * Split text into word chunks that concatenate back to the original.
 */
export function splitWords(text: string): string[] {
  return text.match(/\S+\s*/g) ?? [];
}

export type MockInferenceOptions = {
  /** Delay before each streamed chunk */
  streamDelayMs?: number;
};

/**
 * Deterministic in-process provider. Assign an error to `errors[operation]`
 * to make that operation fail.
 */
export class MockInferenceProvider implements InferenceProvider {
  errors: Partial<Record<InferenceOperation, Error>> = {};
  models: InferenceModel[] = MOCK_MODELS.map((model) => ({ ...model }));
  streamDelayMs: number;

  constructor(options: MockInferenceOptions = {}) {
    this.streamDelayMs = options.streamDelayMs ?? 0;
  }

  async chat(model: string, messages: Message[]): Promise<ChatResponse> {
    this.fail('chat');
    const promptTokens = messages.reduce((sum, message) => sum + estimateTokens(message.content), 0);
    const completionTokens = 50;
    return {
      content: MOCK_CHAT_CONTENT,
      finishReason: 'stop',
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      model,
      id: `chatcmpl-${randomUUID().slice(0, 8)}`,
      created: Math.floor(Date.now() / 1000),
    };
  }

  async chatStream(
    model: string,
    _messages: Message[],
    _options: ChatOptions,
    sink: ChunkSink<ChatStreamChunk>,
    signal: AbortSignal
  ): Promise<void> {
    this.fail('chatStream');
    const id = `chatcmpl-${randomUUID().slice(0, 8)}`;
    const words = splitWords(MOCK_CHAT_CONTENT);
    for (const [index, content] of words.entries()) {
      await this.pause(signal);
      const last = index === words.length - 1;
      await sink.send({ id, model, content, finishReason: last ? 'stop' : undefined }, signal);
    }
  }

  async complete(_model: string, prompt: string): Promise<CompletionResponse> {
    this.fail('complete');
    const promptTokens = estimateTokens(prompt);
    const completionTokens = 30;
    return {
      text: MOCK_COMPLETION_TEXT,
      finishReason: 'stop',
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
    };
  }

  async completeStream(
    model: string,
    _prompt: string,
    _options: CompleteOptions,
    sink: ChunkSink<CompleteStreamChunk>,
    signal: AbortSignal
  ): Promise<void> {
    this.fail('completeStream');
    const id = `cmpl-${randomUUID().slice(0, 8)}`;
    const words = splitWords(MOCK_COMPLETION_TEXT);
    for (const [index, text] of words.entries()) {
      await this.pause(signal);
      const last = index === words.length - 1;
      await sink.send({ id, model, text, finishReason: last ? 'stop' : undefined }, signal);
    }
  }

  async embed(_model: string, input: string[]): Promise<EmbeddingResponse> {
    this.fail('embed');
    const totalTokens = input.reduce((sum, text) => sum + estimateTokens(text), 0);
    return {
      embeddings: input.map(() => new Array<number>(MOCK_EMBEDDING_DIMENSIONS).fill(0.1)),
      usage: { promptTokens: totalTokens, completionTokens: 0, totalTokens },
    };
  }

  async transcribe(_model: string, audio: Uint8Array, language: string): Promise<TranscriptionResponse> {
    this.fail('transcribe');
    return {
      text: 'This is a mock transcription of the audio.',
      language: language || 'en',
      duration: audio.length / 16000,
      segments: [
        { id: 0, start: 0, end: 2.5, text: 'This is a mock transcription' },
        { id: 1, start: 2.5, end: 5, text: 'of the audio.' },
      ],
    };
  }

  async synthesize(_model: string, text: string): Promise<AudioResponse> {
    this.fail('synthesize');
    const duration = text.length * 0.05;
    return {
      audio: new Uint8Array(Math.trunc(duration * 16000)),
      format: 'wav',
      duration,
    };
  }

  async generateImage(): Promise<ImageGenerationResponse> {
    this.fail('generateImage');
    return { images: [{ base64: 'mock_base64_image_data' }], format: 'png' };
  }

  async generateVideo(_model: string, _prompt: string, options: VideoOptions): Promise<VideoGenerationResponse> {
    this.fail('generateVideo');
    return {
      video: new TextEncoder().encode('mock_video_data'),
      format: 'mp4',
      duration: options.duration || 5,
    };
  }

  async rerank(_model: string, query: string, documents: string[]): Promise<RerankResponse> {
    this.fail('rerank');
    const tokens = estimateTokens(query);
    return {
      results: documents.map((document, index) => ({ document, score: 1 - index * 0.1, index })),
      usage: { promptTokens: tokens, completionTokens: 0, totalTokens: tokens },
    };
  }

  async detect(model: string): Promise<DetectionResponse> {
    this.fail('detect');
    return {
      detections: [
        { label: 'person', confidence: 0.95, bbox: [100, 100, 200, 300] },
        { label: 'car', confidence: 0.87, bbox: [350, 200, 150, 100] },
      ],
      model,
    };
  }

  async listModels(modelType?: string): Promise<InferenceModel[]> {
    this.fail('listModels');
    const models = this.models.map((model) => ({ ...model }));
    return modelType ? models.filter((model) => model.type === modelType) : models;
  }

  async listVoices(): Promise<Voice[]> {
    this.fail('listVoices');
    return MOCK_VOICES.map((voice) => ({ ...voice }));
  }

  private fail(operation: InferenceOperation): void {
    const error = this.errors[operation];
    if (error) throw error;
  }

  private async pause(signal: AbortSignal): Promise<void> {
    if (this.streamDelayMs > 0) {
      await sleep(this.streamDelayMs, signal);
    } else if (signal.aborted) {
      throw signal.reason;
    }
  }
}
