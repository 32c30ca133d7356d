// Inference domain

import type { Command, Query } from '@asms/protocol';
import type { PollingResource } from '../resources/poller.js';
import type { UnitRegistry } from '../units/registry.js';
import { createModelsResource } from './resources.js';
import type { InferenceUnitDeps } from './units.js';
import {
  chatCommand,
  completeCommand,
  detectCommand,
  embedCommand,
  generateImageCommand,
  generateVideoCommand,
  modelsQuery,
  rerankCommand,
  synthesizeCommand,
  transcribeCommand,
  voicesQuery,
} from './units.js';

export type InferenceModule = {
  commands: Command[];
  queries: Query[];
  resources: { models: PollingResource<number> };
};

export function createInferenceModule(deps: InferenceUnitDeps): InferenceModule {
  return {
    commands: [
      chatCommand(deps),
      completeCommand(deps),
      embedCommand(deps),
      transcribeCommand(deps),
      synthesizeCommand(deps),
      generateImageCommand(deps),
      generateVideoCommand(deps),
      rerankCommand(deps),
      detectCommand(deps),
    ],
    queries: [modelsQuery(deps), voicesQuery(deps)],
    resources: { models: createModelsResource(deps) },
  };
}

export function registerInferenceUnits(registry: UnitRegistry, deps: InferenceUnitDeps): InferenceModule {
  const inferenceModule = createInferenceModule(deps);
  inferenceModule.commands.forEach((command) => registry.registerCommand(command));
  inferenceModule.queries.forEach((query) => registry.registerQuery(query));
  registry.registerResource(inferenceModule.resources.models);
  return inferenceModule;
}

export type { InferenceUnitDeps } from './units.js';
export {
  MockInferenceProvider,
  MOCK_CHAT_CONTENT,
  MOCK_COMPLETION_TEXT,
  MOCK_EMBEDDING_DIMENSIONS,
  splitWords,
  type InferenceProvider,
  type InferenceOperation,
  type MockInferenceOptions,
} from './provider.js';
export { MODELS_URI, MODELS_POLL_INTERVAL_MS } from './resources.js';
