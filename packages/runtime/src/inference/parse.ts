// Input narrowing for inference units
//
// Required fields fail `invalid_input`; options are read with best-effort
// numeric coercion and absent or malformed options leave provider defaults.

import type {
  ChatOptions,
  CompleteOptions,
  DynamicMap,
  ImageOptions,
  Message,
  MessageRole,
  VideoOptions,
} from '@asms/protocol';
import {
  MESSAGE_ROLES,
  isDynamicMap,
  readBoolean,
  readString,
  toInt,
  toNumber,
  toStringList,
} from '@asms/protocol';
import { INFERENCE_DOMAIN, missingField, modelNotSpecified } from '../errors.js';

export function requireModel(input: DynamicMap): string {
  const model = readString(input, 'model');
  if (!model) throw modelNotSpecified();
  return model;
}

export function requireText(input: DynamicMap, field: string): string {
  const value = readString(input, field);
  if (!value) throw missingField(INFERENCE_DOMAIN, field);
  return value;
}

function isRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/**
 * Non-empty list of `{role, content}` maps with text values.
 */
export function parseMessages(input: DynamicMap): Message[] {
  const raw = input.messages;
  if (!Array.isArray(raw) || raw.length === 0) {
    throw missingField(INFERENCE_DOMAIN, 'messages', 'messages are required');
  }
  return raw.map((item: unknown, index) => {
    if (!isDynamicMap(item)) {
      throw missingField(INFERENCE_DOMAIN, `messages[${index}]`, `invalid message format at index ${index}`);
    }
    const { role, content } = item;
    if (typeof role !== 'string' || typeof content !== 'string') {
      throw missingField(
        INFERENCE_DOMAIN,
        `messages[${index}]`,
        `message ${index} must have text role and content`
      );
    }
    if (!isRole(role)) {
      throw missingField(INFERENCE_DOMAIN, `messages[${index}].role`, `invalid message role: ${role}`);
    }
    return { role, content };
  });
}

/**
 * Text list from a single string or a list of strings.
 */
export function parseTexts(input: DynamicMap, field: string): string[] {
  const raw = input[field];
  if (typeof raw === 'string' && raw !== '') return [raw];
  if (Array.isArray(raw) && raw.length > 0 && raw.every((item) => typeof item === 'string')) {
    return toStringList(raw) ?? [];
  }
  throw missingField(INFERENCE_DOMAIN, field, `${field} must be a string or a non-empty array of strings`);
}

/**
 * Base64 payload decoded to bytes. Empty or missing fails `invalid_input`.
 */
export function requireBytes(input: DynamicMap, field: string): Uint8Array {
  return new Uint8Array(Buffer.from(requireText(input, field), 'base64'));
}

export function parseChatOptions(input: DynamicMap): ChatOptions {
  const options: ChatOptions = {};
  const temperature = toNumber(input.temperature);
  if (temperature !== undefined) options.temperature = temperature;
  const maxTokens = toInt(input.max_tokens);
  if (maxTokens !== undefined) options.maxTokens = maxTokens;
  const topP = toNumber(input.top_p);
  if (topP !== undefined) options.topP = topP;
  const topK = toInt(input.top_k);
  if (topK !== undefined) options.topK = topK;
  const frequencyPenalty = toNumber(input.frequency_penalty);
  if (frequencyPenalty !== undefined) options.frequencyPenalty = frequencyPenalty;
  const presencePenalty = toNumber(input.presence_penalty);
  if (presencePenalty !== undefined) options.presencePenalty = presencePenalty;
  const stop = toStringList(input.stop);
  if (stop) options.stop = stop;
  const stream = readBoolean(input, 'stream');
  if (stream !== undefined) options.stream = stream;
  return options;
}

export function parseCompleteOptions(input: DynamicMap): CompleteOptions {
  const options: CompleteOptions = {};
  const temperature = toNumber(input.temperature);
  if (temperature !== undefined) options.temperature = temperature;
  const maxTokens = toInt(input.max_tokens);
  if (maxTokens !== undefined) options.maxTokens = maxTokens;
  const topP = toNumber(input.top_p);
  if (topP !== undefined) options.topP = topP;
  const stop = toStringList(input.stop);
  if (stop) options.stop = stop;
  const stream = readBoolean(input, 'stream');
  if (stream !== undefined) options.stream = stream;
  return options;
}

export function parseImageOptions(input: DynamicMap): ImageOptions {
  const options: ImageOptions = {};
  const size = readString(input, 'size');
  if (size) options.size = size;
  const negativePrompt = readString(input, 'negative_prompt');
  if (negativePrompt) options.negativePrompt = negativePrompt;
  const steps = toInt(input.steps);
  if (steps !== undefined) options.steps = steps;
  const width = toInt(input.width);
  if (width !== undefined) options.width = width;
  const height = toInt(input.height);
  if (height !== undefined) options.height = height;
  const seed = toInt(input.seed);
  if (seed !== undefined) options.seed = seed;
  return options;
}

export function parseVideoOptions(input: DynamicMap): VideoOptions {
  const options: VideoOptions = {};
  const duration = toNumber(input.duration);
  if (duration !== undefined) options.duration = duration;
  const fps = toInt(input.fps);
  if (fps !== undefined) options.fps = fps;
  const width = toInt(input.width);
  if (width !== undefined) options.width = width;
  const height = toInt(input.height);
  if (height !== undefined) options.height = height;
  const steps = toInt(input.steps);
  if (steps !== undefined) options.steps = steps;
  const seed = toInt(input.seed);
  if (seed !== undefined) options.seed = seed;
  return options;
}
