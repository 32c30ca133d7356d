// Common types used across the protocol

/**
 * RFC 3339 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque identifier
 */
export type Id = string;

/**
 * Decoded wire payload: a string-keyed map of primitives, lists and maps.
 * Inputs arrive in this shape and outputs leave in it.
 */
export type DynamicMap = Record<string, unknown>;

/**
 * Time source injected into stores and units so tests can pin timestamps.
 */
export type Clock = {
  now(): Date;
};

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that returns a fixed instant until advanced.
 */
export function createFixedClock(start: Date | string): Clock & {
  set(at: Date | string): void;
  advance(ms: number): void;
} {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    set(at) {
      current = new Date(at);
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}

/**
 * Serialize a date as RFC 3339 with an explicit offset.
 */
export function formatTimestamp(date: Date): Timestamp {
  return date.toISOString();
}
