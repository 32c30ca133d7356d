export { EventBus, ALL_EVENTS, type EventHandler } from './bus.js';
export { createEvent, noopPublisher, createCapturingPublisher, safePublish } from './publishers.js';
