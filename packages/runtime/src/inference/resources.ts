// Inference resources

import { RESOURCE_SCHEME } from '@asms/protocol';
import { INFERENCE_DOMAIN, providerNotSet } from '../errors.js';
import { PollingResource } from '../resources/poller.js';
import type { InferenceUnitDeps } from './units.js';
import { listModelMaps, modelListSchema } from './units.js';

export const MODELS_URI = `${RESOURCE_SCHEME}inference/models`;
export const MODELS_POLL_INTERVAL_MS = 60_000;

/**
 * Model catalogue. A tick whose model count differs from the previous
 * non-empty count emits `models_changed`.
 */
export function createModelsResource(deps: InferenceUnitDeps): PollingResource<number> {
  return new PollingResource<number>({
    uri: MODELS_URI,
    domain: INFERENCE_DOMAIN,
    schema: modelListSchema,
    intervalMs: MODELS_POLL_INTERVAL_MS,
    clock: deps.clock,
    logger: deps.logger,
    async fetch(signal) {
      if (!deps.provider) throw providerNotSet(INFERENCE_DOMAIN);
      return { models: await listModelMaps(deps.provider, '', signal) };
    },
    classify(data, previous) {
      const count = Array.isArray(data.models) ? data.models.length : 0;
      const changed = previous !== undefined && previous > 0 && previous !== count;
      return { operation: changed ? 'models_changed' : 'refresh', state: count };
    },
  });
}
