// Inference domain types

export type MessageRole = 'system' | 'user' | 'assistant';

export const MESSAGE_ROLES: readonly MessageRole[] = ['system', 'user', 'assistant'];

export type ModelType =
  | 'llm'
  | 'asr'
  | 'tts'
  | 'embedding'
  | 'diffusion'
  | 'video_gen'
  | 'detection'
  | 'rerank';

export const MODEL_TYPES: readonly ModelType[] = [
  'llm',
  'asr',
  'tts',
  'embedding',
  'diffusion',
  'video_gen',
  'detection',
  'rerank',
];

export type Message = {
  role: MessageRole;
  content: string;
};

export type Usage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type ChatResponse = {
  content: string;
  finishReason: string;
  usage: Usage;
  model?: string;
  id?: string;
  created?: number;
};

export type CompletionResponse = {
  text: string;
  finishReason: string;
  usage: Usage;
};

export type EmbeddingResponse = {
  embeddings: number[][];
  usage: Usage;
};

export type TranscriptionSegment = {
  id: number;
  /** Seconds */
  start: number;
  end: number;
  text: string;
};

export type TranscriptionResponse = {
  text: string;
  segments: TranscriptionSegment[];
  language: string;
  /** Seconds */
  duration?: number;
};

export type AudioResponse = {
  audio: Uint8Array;
  format: string;
  /** Seconds */
  duration: number;
};

export type GeneratedImage = {
  data?: Uint8Array;
  url?: string;
  base64?: string;
};

export type ImageGenerationResponse = {
  images: GeneratedImage[];
  format: string;
};

export type VideoGenerationResponse = {
  video: Uint8Array;
  format: string;
  duration: number;
};

export type RerankResult = {
  document: string;
  score: number;
  index: number;
};

export type RerankResponse = {
  results: RerankResult[];
  usage: Usage;
};

/** x, y, width, height */
export type BBox = [number, number, number, number];

export type Detection = {
  label: string;
  confidence: number;
  bbox: BBox;
};

export type DetectionResponse = {
  detections: Detection[];
  model?: string;
};

export type Voice = {
  id: string;
  name: string;
  language?: string;
  gender?: string;
  description?: string;
};

export type InferenceModel = {
  id: string;
  name: string;
  type: string;
  provider?: string;
  description?: string;
  maxTokens?: number;
  modalities?: string[];
};

export type ChatStreamChunk = {
  id?: string;
  model?: string;
  content: string;
  finishReason?: string;
  usage?: Usage;
};

export type CompleteStreamChunk = {
  id?: string;
  model?: string;
  text: string;
  finishReason?: string;
  usage?: Usage;
};

export type ChatOptions = {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  topK?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  stream?: boolean;
};

export type CompleteOptions = {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
  stream?: boolean;
};

export type ImageOptions = {
  size?: string;
  steps?: number;
  seed?: number;
  negativePrompt?: string;
  width?: number;
  height?: number;
};

export type VideoOptions = {
  duration?: number;
  fps?: number;
  width?: number;
  height?: number;
  steps?: number;
  seed?: number;
};

export type InferenceEventType =
  | 'inference.request_started'
  | 'inference.request_completed'
  | 'inference.request_failed';
