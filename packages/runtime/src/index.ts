// @asms/runtime
// Unit registry, execution lifecycle, streams, resource watches and the reference domains

// Assembly
export {
  createUnitRuntime,
  type UnitRuntime,
  type UnitRuntimeOptions,
  type RuntimeProviders,
} from './bootstrap.js';

// Units
export {
  defineCommand,
  defineQuery,
  defineStreamingCommand,
  type UnitDeps,
  type UnitHandler,
  type StreamHandler,
  type UnitDefinition,
  type StreamingUnitDefinition,
} from './units/define.js';
export {
  ExecutionContext,
  generateRequestId,
  generateTraceId,
  type ExecutionContextOptions,
} from './units/execution-context.js';
export { UnitRegistry, describeUnit, type UnitDescriptor } from './units/registry.js';
export {
  executeUnit,
  streamUnit,
  iterateStream,
  type DispatchOptions,
  type StreamOptions,
} from './units/dispatch.js';

// Events
export {
  EventBus,
  ALL_EVENTS,
  createEvent,
  noopPublisher,
  createCapturingPublisher,
  safePublish,
  type EventHandler,
} from './events/index.js';

// Streams and watches
export { Channel, ChannelClosedError } from './channel.js';
export {
  bridgeStream,
  contentChunk,
  DEFAULT_STREAM_CAPACITY,
  type StreamBridgeOptions,
} from './streaming/bridge.js';
export {
  PollingResource,
  diffField,
  DEFAULT_WATCH_CAPACITY,
  type PollingResourceOptions,
  type TickDecision,
} from './resources/poller.js';
export { raceAbort, combineSignals, sleep } from './abort.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLevelFilter,
  createCapturingLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';

// Domain errors
export {
  ALERT_DOMAIN,
  DEVICE_DOMAIN,
  INFERENCE_DOMAIN,
  SERVICE_DOMAIN,
  providerNotSet,
  deviceNotFound,
  missingField,
  modelNotSpecified,
  modelNotLoaded,
  invalidServiceId,
  serviceAlreadyRunning,
} from './errors.js';

// Domains
export * from './alert/index.js';
export * from './device/index.js';
export * from './inference/index.js';
export * from './service/index.js';
