// Tests for gateway configuration

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults for unset and empty variables', () => {
    expect(loadConfig({ ASMS_HOST: '' })).toEqual({
      host: '127.0.0.1',
      port: 9090,
      logLevel: 'info',
      requestTimeoutMs: 30_000,
      streamBuffer: 10,
      mockDeviceId: 'gpu-0',
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      ASMS_PORT: '8080',
      ASMS_LOG_LEVEL: 'debug',
      ASMS_REQUEST_TIMEOUT_MS: '500',
      ASMS_STREAM_BUFFER: '4',
      ASMS_MOCK_DEVICE_ID: 'gpu-7',
    });
    expect(config).toMatchObject({
      port: 8080,
      logLevel: 'debug',
      requestTimeoutMs: 500,
      streamBuffer: 4,
      mockDeviceId: 'gpu-7',
    });
  });

  it('lists every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ ASMS_PORT: '70000', ASMS_LOG_LEVEL: 'loud', ASMS_STREAM_BUFFER: '0' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues.map((issue) => issue.key)).toEqual([
      'ASMS_PORT',
      'ASMS_LOG_LEVEL',
      'ASMS_STREAM_BUFFER',
    ]);
  });
});
