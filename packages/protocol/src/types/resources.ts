// Resource contracts: pollable, watchable views addressed by asms:// URIs

import type { DynamicMap } from './common.js';
import type { Schema } from './schema.js';

export const RESOURCE_SCHEME = 'asms://';

export type ResourceOperation =
  | 'refresh'
  | 'update'
  | 'status_changed'
  | 'health_changed'
  | 'models_changed'
  | 'error';

/**
 * Change notification emitted by a resource watch.
 */
export type ResourceUpdate = {
  uri: string;
  timestamp: Date;
  operation: ResourceOperation;
  data?: DynamicMap;
  error?: Error;
};

/**
 * Live subscription returned by `Resource.watch`.
 *
 * `updates` ends once `unsubscribe` is called or the watch signal aborts.
 */
export type WatchSubscription = {
  updates: AsyncIterable<ResourceUpdate>;
  unsubscribe(): void;
};

export type Resource = {
  uri: string;
  domain: string;
  schema: Schema;
  /** Synchronous snapshot */
  get(signal?: AbortSignal): Promise<DynamicMap>;
  watch(signal?: AbortSignal): WatchSubscription;
};

/**
 * Builds resources for dynamic URIs such as `asms://device/<id>/info`.
 */
export type ResourceFactory = {
  /** Glob-ish pattern for discovery, e.g. `asms://device/*` */
  pattern: string;
  canCreate(uri: string): boolean;
  create(uri: string): Resource;
};
