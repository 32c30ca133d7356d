// Protocol types

export * from './common.js';
export * from './schema.js';
export * from './units.js';
export * from './resources.js';
export * from './events.js';
export * from './alerts.js';
export * from './devices.js';
export * from './inference.js';
export * from './services.js';
