// Gateway configuration from environment variables

import { z } from 'zod';
import type { LogLevel } from '@asms/runtime';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const EnvSchema = z.object({
  ASMS_HOST: z.string().min(1).default('127.0.0.1'),
  ASMS_PORT: z.coerce.number().int().min(1).max(65535).default(9090),
  ASMS_LOG_LEVEL: LogLevelSchema.default('info'),
  ASMS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ASMS_STREAM_BUFFER: z.coerce.number().int().min(1).default(10),
  ASMS_MOCK_DEVICE_ID: z.string().min(1).default('gpu-0'),
});

export type GatewayConfig = {
  host: string;
  port: number;
  logLevel: LogLevel;
  requestTimeoutMs: number;
  streamBuffer: number;
  mockDeviceId: string;
};

/**
 * Raised when one or more environment variables fail validation.
 */
export class ConfigError extends Error {
  constructor(readonly issues: { key: string; message: string }[]) {
    super(`invalid configuration: ${issues.map((issue) => `${issue.key}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse gateway configuration. Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ASMS_') && value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ key: issue.path.join('.'), message: issue.message }))
    );
  }

  const values = parsed.data;
  return {
    host: values.ASMS_HOST,
    port: values.ASMS_PORT,
    logLevel: values.ASMS_LOG_LEVEL,
    requestTimeoutMs: values.ASMS_REQUEST_TIMEOUT_MS,
    streamBuffer: values.ASMS_STREAM_BUFFER,
    mockDeviceId: values.ASMS_MOCK_DEVICE_ID,
  };
}
