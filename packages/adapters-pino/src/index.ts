/**
 * @module @llmverify/adapters-pino
 * Pino adapter implementing ILogger interface.
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@llmverify/adapters-pino';
 *
 * const logger = createAdapter({
 *   level: 'info',
 *   pretty: true,
 * });
 *
 * logger.info('Verification finished', { provider: 'openai', score: 87 });
 * logger.error('Redis tier unavailable', new Error('ECONNREFUSED'));
 *
 * const probeLogger = logger.child({ component: 'probe-client' });
 * probeLogger.debug('Probe dispatched');
 * ```
 */

import pino, { type DestinationStream, type Logger as PinoLoggerInstance } from 'pino';
import { VerifierError } from '@llmverify/core';
import type { ILogger } from '@llmverify/core';

export { manifest } from './manifest.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Fields that may carry provider credentials */
export const REDACTED_PATHS: readonly string[] = [
  'credential',
  '*.credential',
  'apiKey',
  '*.apiKey',
  '*.accessToken',
  '*.authToken',
  '*.botToken',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
];

/**
 * Configuration for Pino logger adapter.
 */
export interface PinoLoggerConfig {
  /** Log level (default: 'info') */
  level?: LogLevel;
  /** Enable pretty printing for development (default: false) */
  pretty?: boolean;
  /** Write to this stream instead of stdout (pretty printing is skipped) */
  destination?: DestinationStream;
  /** Extra paths to censor on top of REDACTED_PATHS */
  redact?: string[];
  /** Additional pino options */
  options?: pino.LoggerOptions;
}

/**
 * Pino implementation of ILogger interface.
 */
export class PinoLoggerAdapter implements ILogger {
  private readonly pino: PinoLoggerInstance;

  constructor(config: PinoLoggerConfig = {}, instance?: PinoLoggerInstance) {
    this.pino = instance ?? PinoLoggerAdapter.build(config);
  }

  private static build(config: PinoLoggerConfig): PinoLoggerInstance {
    const options: pino.LoggerOptions = {
      level: config.level ?? 'info',
      redact: { paths: [...REDACTED_PATHS, ...(config.redact ?? [])], censor: '[redacted]' },
      ...config.options,
    };

    if (config.destination) {
      return pino(options, config.destination);
    }

    const transport = config.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    return pino({ ...options, transport });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.pino.info(meta ?? {}, message);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.pino.warn(meta ?? {}, message);
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pino.error(error ? { ...meta, error: serializeError(error) } : (meta ?? {}), message);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.pino.debug(meta ?? {}, message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLoggerAdapter({}, this.pino.child(bindings));
  }

  get level(): string {
    return this.pino.level;
  }
}

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    // Taxonomy kind lets log queries group probe failures
    ...(error instanceof VerifierError && { kind: error.kind }),
    stack: error.stack,
  };
}

/**
 * Create Pino logger adapter.
 * This is the factory the engine bootstrap calls for the logging section.
 */
export function createAdapter(config?: PinoLoggerConfig): PinoLoggerAdapter {
  return new PinoLoggerAdapter(config);
}

// Default export for direct import
export default createAdapter;
