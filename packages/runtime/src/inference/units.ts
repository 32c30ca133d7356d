// Inference commands and queries

import type {
  ChatStreamChunk,
  Command,
  CompleteStreamChunk,
  DynamicMap,
  Query,
  Schema,
  StreamingCommand,
  Usage,
} from '@asms/protocol';
import {
  MESSAGE_ROLES,
  MODEL_TYPES,
  arraySchema,
  booleanSchema,
  numberSchema,
  objectSchema,
  readString,
  stringSchema,
  wrapError,
} from '@asms/protocol';
import { INFERENCE_DOMAIN, providerNotSet } from '../errors.js';
import { bridgeStream, contentChunk } from '../streaming/bridge.js';
import type { UnitDeps } from '../units/define.js';
import { defineCommand, defineQuery, defineStreamingCommand } from '../units/define.js';
import { trackRequest } from './events.js';
import {
  parseChatOptions,
  parseCompleteOptions,
  parseImageOptions,
  parseMessages,
  parseTexts,
  parseVideoOptions,
  requireBytes,
  requireModel,
  requireText,
} from './parse.js';
import type { InferenceProvider } from './provider.js';

export type InferenceUnitDeps = UnitDeps & {
  /** Absent means every unit fails with provider_not_set */
  provider?: InferenceProvider;
  /** Capacity of the internal provider stream channel */
  streamCapacity?: number;
};

function requireProvider(deps: InferenceUnitDeps): InferenceProvider {
  if (!deps.provider) throw providerNotSet(INFERENCE_DOMAIN);
  return deps.provider;
}

function usageToMap(usage: Usage): DynamicMap {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

const modelField = stringSchema({ description: 'Model identifier' });

const usageSchema = objectSchema({
  prompt_tokens: numberSchema(),
  completion_tokens: numberSchema(),
  total_tokens: numberSchema(),
});

const messageSchema = objectSchema(
  {
    role: stringSchema({ enum: MESSAGE_ROLES }),
    content: stringSchema(),
  },
  ['role', 'content']
);

const samplingFields: Record<string, Schema> = {
  temperature: numberSchema({ description: 'Sampling temperature', min: 0, max: 2 }),
  max_tokens: numberSchema({ description: 'Maximum tokens to generate', min: 1 }),
  top_p: numberSchema({ description: 'Nucleus sampling', min: 0, max: 1 }),
  stop: arraySchema(stringSchema(), { description: 'Stop sequences' }),
  stream: booleanSchema({ description: 'Stream the response' }),
};

export function chatCommand(deps: InferenceUnitDeps): StreamingCommand {
  return defineStreamingCommand(
    {
      name: 'inference.chat',
      domain: INFERENCE_DOMAIN,
      description: 'Perform a chat completion with an AI model',
      inputSchema: objectSchema(
        {
          model: modelField,
          messages: arraySchema(messageSchema, { description: 'Conversation messages' }),
          ...samplingFields,
          top_k: numberSchema({ description: 'Top-k sampling', min: 1 }),
          frequency_penalty: numberSchema({ description: 'Frequency penalty', min: -2, max: 2 }),
          presence_penalty: numberSchema({ description: 'Presence penalty', min: -2, max: 2 }),
        },
        ['model', 'messages']
      ),
      outputSchema: objectSchema({
        content: stringSchema(),
        finish_reason: stringSchema(),
        usage: usageSchema,
        model: stringSchema(),
        id: stringSchema(),
      }),
      examples: [
        {
          input: { model: 'llama3', messages: [{ role: 'user', content: 'Hello!' }] },
          output: {
            content: 'Hello! How can I help you today?',
            finish_reason: 'stop',
            usage: { prompt_tokens: 10, completion_tokens: 20, total_tokens: 30 },
          },
          description: 'Simple chat',
        },
      ],
      async run(input, ctx, exec) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const messages = parseMessages(input);
        const options = parseChatOptions(input);

        const response = await trackRequest(
          deps,
          { requestId: exec.requestId, unit: 'inference.chat', model },
          async () => {
            try {
              return await provider.chat(model, messages, options, ctx.signal);
            } catch (error) {
              throw wrapError('chat completion failed', error);
            }
          }
        );
        return {
          content: response.content,
          finish_reason: response.finishReason,
          usage: usageToMap(response.usage),
          model: response.model ?? model,
          id: response.id ?? '',
        };
      },
      async stream(input, ctx, outbound, exec) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const messages = parseMessages(input);
        const options = { ...parseChatOptions(input), stream: true };

        await trackRequest(deps, { requestId: exec.requestId, unit: 'inference.chat', model }, () =>
          bridgeStream<ChatStreamChunk>({
            signal: ctx.signal,
            outbound,
            capacity: deps.streamCapacity,
            produce: (sink, signal) => provider.chatStream(model, messages, options, sink, signal),
            toChunk: (chunk) => contentChunk(chunk.content, chunk),
          })
        );
      },
    },
    deps
  );
}

export function completeCommand(deps: InferenceUnitDeps): StreamingCommand {
  return defineStreamingCommand(
    {
      name: 'inference.complete',
      domain: INFERENCE_DOMAIN,
      description: 'Perform a text completion with an AI model',
      inputSchema: objectSchema(
        {
          model: modelField,
          prompt: stringSchema({ description: 'The prompt to complete' }),
          ...samplingFields,
        },
        ['model', 'prompt']
      ),
      outputSchema: objectSchema({
        text: stringSchema(),
        finish_reason: stringSchema(),
        usage: usageSchema,
      }),
      examples: [
        {
          input: { model: 'llama3', prompt: 'Once upon a time' },
          output: {
            text: ' there was a small village.',
            finish_reason: 'stop',
            usage: { prompt_tokens: 4, completion_tokens: 6, total_tokens: 10 },
          },
          description: 'Complete a prompt',
        },
      ],
      async run(input, ctx, exec) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const prompt = requireText(input, 'prompt');
        const options = parseCompleteOptions(input);

        const response = await trackRequest(
          deps,
          { requestId: exec.requestId, unit: 'inference.complete', model },
          async () => {
            try {
              return await provider.complete(model, prompt, options, ctx.signal);
            } catch (error) {
              throw wrapError('completion failed', error);
            }
          }
        );
        return {
          text: response.text,
          finish_reason: response.finishReason,
          usage: usageToMap(response.usage),
        };
      },
      async stream(input, ctx, outbound, exec) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const prompt = requireText(input, 'prompt');
        const options = { ...parseCompleteOptions(input), stream: true };

        await trackRequest(deps, { requestId: exec.requestId, unit: 'inference.complete', model }, () =>
          bridgeStream<CompleteStreamChunk>({
            signal: ctx.signal,
            outbound,
            capacity: deps.streamCapacity,
            produce: (sink, signal) => provider.completeStream(model, prompt, options, sink, signal),
            toChunk: (chunk) => contentChunk(chunk.text, chunk),
          })
        );
      },
    },
    deps
  );
}

export function embedCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.embed',
      domain: INFERENCE_DOMAIN,
      description: 'Generate text embeddings',
      inputSchema: objectSchema(
        {
          model: modelField,
          input: arraySchema(stringSchema(), { description: 'Texts to embed' }),
        },
        ['model', 'input']
      ),
      outputSchema: objectSchema({
        embeddings: arraySchema(arraySchema(numberSchema())),
        usage: objectSchema({ prompt_tokens: numberSchema(), total_tokens: numberSchema() }),
      }),
      examples: [
        {
          input: { model: 'text-embedding-3-small', input: ['Hello world'] },
          output: { embeddings: [[0.1, 0.2, 0.3]], usage: { prompt_tokens: 2, total_tokens: 2 } },
          description: 'Embed one text',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const texts = parseTexts(input, 'input');
        try {
          const response = await provider.embed(model, texts, ctx.signal);
          return {
            embeddings: response.embeddings,
            usage: {
              prompt_tokens: response.usage.promptTokens,
              total_tokens: response.usage.totalTokens,
            },
          };
        } catch (error) {
          throw wrapError('embedding failed', error);
        }
      },
    },
    deps
  );
}

export function transcribeCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.transcribe',
      domain: INFERENCE_DOMAIN,
      description: 'Transcribe audio to text',
      inputSchema: objectSchema(
        {
          model: modelField,
          audio: stringSchema({ description: 'Base64-encoded audio' }),
          language: stringSchema({ description: 'Language code, defaults to en' }),
        },
        ['model', 'audio']
      ),
      outputSchema: objectSchema({
        text: stringSchema(),
        language: stringSchema(),
        duration: numberSchema({ description: 'Seconds' }),
        segments: arraySchema(
          objectSchema({ id: numberSchema(), start: numberSchema(), end: numberSchema(), text: stringSchema() })
        ),
      }),
      examples: [
        {
          input: { model: 'whisper-large-v3', audio: '<base64>' },
          output: { text: 'Hello world', language: 'en', duration: 1.5, segments: [] },
          description: 'Transcribe a clip',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const audio = requireBytes(input, 'audio');
        const language = readString(input, 'language');
        try {
          const response = await provider.transcribe(model, audio, language, ctx.signal);
          return {
            text: response.text,
            language: response.language,
            duration: response.duration ?? 0,
            segments: response.segments.map((segment) => ({
              id: segment.id,
              start: segment.start,
              end: segment.end,
              text: segment.text,
            })),
          };
        } catch (error) {
          throw wrapError('transcription failed', error);
        }
      },
    },
    deps
  );
}

export function synthesizeCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.synthesize',
      domain: INFERENCE_DOMAIN,
      description: 'Convert text to speech',
      inputSchema: objectSchema(
        {
          model: modelField,
          text: stringSchema({ description: 'Text to speak' }),
          voice: stringSchema({ description: 'Voice identifier' }),
        },
        ['model', 'text']
      ),
      outputSchema: objectSchema({
        audio: stringSchema({ description: 'Base64-encoded audio' }),
        format: stringSchema(),
        duration: numberSchema({ description: 'Seconds' }),
      }),
      examples: [
        {
          input: { model: 'tts-1', text: 'Hello', voice: 'alloy' },
          output: { audio: '<base64>', format: 'wav', duration: 0.25 },
          description: 'Speak a word',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const text = requireText(input, 'text');
        const voice = readString(input, 'voice');
        try {
          const response = await provider.synthesize(model, text, voice, ctx.signal);
          return { audio: toBase64(response.audio), format: response.format, duration: response.duration };
        } catch (error) {
          throw wrapError('synthesis failed', error);
        }
      },
    },
    deps
  );
}

export function generateImageCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.generate_image',
      domain: INFERENCE_DOMAIN,
      description: 'Generate images from a text prompt',
      inputSchema: objectSchema(
        {
          model: modelField,
          prompt: stringSchema({ description: 'Image description' }),
          size: stringSchema({ description: 'Size such as 1024x1024' }),
          negative_prompt: stringSchema(),
          steps: numberSchema({ min: 1 }),
          width: numberSchema({ min: 1 }),
          height: numberSchema({ min: 1 }),
          seed: numberSchema(),
        },
        ['model', 'prompt']
      ),
      outputSchema: objectSchema({
        images: arraySchema(objectSchema({ base64: stringSchema(), url: stringSchema(), data: stringSchema() })),
        format: stringSchema(),
      }),
      examples: [
        {
          input: { model: 'stable-diffusion-xl', prompt: 'A lighthouse at dusk' },
          output: { images: [{ base64: '<base64>', url: '', data: '' }], format: 'png' },
          description: 'One image',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const prompt = requireText(input, 'prompt');
        try {
          const response = await provider.generateImage(model, prompt, parseImageOptions(input), ctx.signal);
          return {
            images: response.images.map((image) => ({
              base64: image.base64 ?? '',
              url: image.url ?? '',
              data: image.data ? toBase64(image.data) : '',
            })),
            format: response.format,
          };
        } catch (error) {
          throw wrapError('image generation failed', error);
        }
      },
    },
    deps
  );
}

export function generateVideoCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.generate_video',
      domain: INFERENCE_DOMAIN,
      description: 'Generate a video from a text prompt',
      inputSchema: objectSchema(
        {
          model: modelField,
          prompt: stringSchema({ description: 'Video description' }),
          duration: numberSchema({ description: 'Seconds', min: 0 }),
          fps: numberSchema({ min: 1 }),
          width: numberSchema({ min: 1 }),
          height: numberSchema({ min: 1 }),
          steps: numberSchema({ min: 1 }),
          seed: numberSchema(),
        },
        ['model', 'prompt']
      ),
      outputSchema: objectSchema({
        video: stringSchema({ description: 'Base64-encoded video' }),
        format: stringSchema(),
        duration: numberSchema({ description: 'Seconds' }),
      }),
      examples: [
        {
          input: { model: 'video-gen', prompt: 'Waves on a beach', duration: 5 },
          output: { video: '<base64>', format: 'mp4', duration: 5 },
          description: 'Five-second clip',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const prompt = requireText(input, 'prompt');
        try {
          const response = await provider.generateVideo(model, prompt, parseVideoOptions(input), ctx.signal);
          return { video: toBase64(response.video), format: response.format, duration: response.duration };
        } catch (error) {
          throw wrapError('video generation failed', error);
        }
      },
    },
    deps
  );
}

export function rerankCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.rerank',
      domain: INFERENCE_DOMAIN,
      description: 'Rerank documents by relevance to a query',
      inputSchema: objectSchema(
        {
          model: modelField,
          query: stringSchema({ description: 'Search query' }),
          documents: arraySchema(stringSchema(), { description: 'Documents to rank' }),
        },
        ['model', 'query', 'documents']
      ),
      outputSchema: objectSchema({
        results: arraySchema(objectSchema({ document: stringSchema(), score: numberSchema(), index: numberSchema() })),
      }),
      examples: [
        {
          input: { model: 'reranker', query: 'ai', documents: ['about ai', 'about cats'] },
          output: {
            results: [
              { document: 'about ai', score: 1, index: 0 },
              { document: 'about cats', score: 0.9, index: 1 },
            ],
          },
          description: 'Rank two documents',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const query = requireText(input, 'query');
        const documents = parseTexts(input, 'documents');
        try {
          const response = await provider.rerank(model, query, documents, ctx.signal);
          return {
            results: response.results.map((result) => ({
              document: result.document,
              score: result.score,
              index: result.index,
            })),
          };
        } catch (error) {
          throw wrapError('rerank failed', error);
        }
      },
    },
    deps
  );
}

export function detectCommand(deps: InferenceUnitDeps): Command {
  return defineCommand(
    {
      name: 'inference.detect',
      domain: INFERENCE_DOMAIN,
      description: 'Detect objects in an image',
      inputSchema: objectSchema(
        {
          model: modelField,
          image: stringSchema({ description: 'Base64-encoded image' }),
        },
        ['model', 'image']
      ),
      outputSchema: objectSchema({
        detections: arraySchema(
          objectSchema({
            label: stringSchema(),
            confidence: numberSchema(),
            bbox: arraySchema(numberSchema(), { description: 'x, y, width, height' }),
          })
        ),
      }),
      examples: [
        {
          input: { model: 'yolov8', image: '<base64>' },
          output: { detections: [{ label: 'person', confidence: 0.95, bbox: [100, 100, 200, 300] }] },
          description: 'Detect people',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const model = requireModel(input);
        const image = requireBytes(input, 'image');
        try {
          const response = await provider.detect(model, image, ctx.signal);
          return {
            detections: response.detections.map((detection) => ({
              label: detection.label,
              confidence: detection.confidence,
              bbox: [...detection.bbox],
            })),
          };
        } catch (error) {
          throw wrapError('detection failed', error);
        }
      },
    },
    deps
  );
}

export const modelListSchema = objectSchema({
  models: arraySchema(
    objectSchema({
      id: stringSchema(),
      name: stringSchema(),
      type: stringSchema(),
      provider: stringSchema(),
      description: stringSchema(),
      max_tokens: numberSchema(),
    })
  ),
});

export async function listModelMaps(
  provider: InferenceProvider,
  modelType: string,
  signal?: AbortSignal
): Promise<DynamicMap[]> {
  const models = await provider.listModels(modelType, signal);
  return models.map((model) => ({
    id: model.id,
    name: model.name,
    type: model.type,
    provider: model.provider ?? '',
    description: model.description ?? '',
    max_tokens: model.maxTokens ?? 0,
  }));
}

export function modelsQuery(deps: InferenceUnitDeps): Query {
  return defineQuery(
    {
      name: 'inference.models',
      domain: INFERENCE_DOMAIN,
      description: 'List available inference models',
      inputSchema: objectSchema({
        type: stringSchema({
          description: 'Filter by model type',
          enum: MODEL_TYPES,
        }),
      }),
      outputSchema: modelListSchema,
      examples: [
        {
          input: { type: 'llm' },
          output: { models: [{ id: 'llama3', name: 'Llama 3', type: 'llm' }] },
          description: 'Language models only',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        try {
          return { models: await listModelMaps(provider, readString(input, 'type'), ctx.signal) };
        } catch (error) {
          throw wrapError('list models', error);
        }
      },
    },
    deps
  );
}

export function voicesQuery(deps: InferenceUnitDeps): Query {
  return defineQuery(
    {
      name: 'inference.voices',
      domain: INFERENCE_DOMAIN,
      description: 'List available voices for text-to-speech',
      inputSchema: objectSchema({ model: stringSchema({ description: 'TTS model to get voices for' }) }),
      outputSchema: objectSchema({
        voices: arraySchema(
          objectSchema({
            id: stringSchema(),
            name: stringSchema(),
            language: stringSchema(),
            gender: stringSchema(),
            description: stringSchema(),
          })
        ),
      }),
      examples: [
        {
          input: { model: 'tts-1' },
          output: { voices: [{ id: 'alloy', name: 'Alloy', language: 'en' }] },
          description: 'Voices of one model',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        try {
          const voices = await provider.listVoices(readString(input, 'model'), ctx.signal);
          return {
            voices: voices.map((voice) => ({
              id: voice.id,
              name: voice.name,
              language: voice.language ?? '',
              gender: voice.gender ?? '',
              description: voice.description ?? '',
            })),
          };
        } catch (error) {
          throw wrapError('list voices', error);
        }
      },
    },
    deps
  );
}
