// Service identifiers: svc-{engine}-{model}

import { invalidServiceId } from '../errors.js';

export const SERVICE_ID_PREFIX = 'svc-';

export type ServiceId = {
  engineType: string;
  /** May itself contain dashes */
  modelId: string;
};

/**
 * Split a service id at the first dash after the prefix. Fails
 * `invalid_input` when the prefix or the engine separator is missing.
 */
export function parseServiceId(id: string): ServiceId {
  if (!id.startsWith(SERVICE_ID_PREFIX)) {
    throw invalidServiceId(id);
  }
  const rest = id.slice(SERVICE_ID_PREFIX.length);
  const separator = rest.indexOf('-');
  if (separator === -1) {
    throw invalidServiceId(id);
  }
  return { engineType: rest.slice(0, separator), modelId: rest.slice(separator + 1) };
}

export function formatServiceId({ engineType, modelId }: ServiceId): string {
  return `${SERVICE_ID_PREFIX}${engineType}-${modelId}`;
}
