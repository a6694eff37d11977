/**
 * Configuration helpers for model building.
 *
 * - defineConfig(): Helper to define ModelBuilder options with type safety
 * - env(): Type-safe environment variable access with validation
 *
 * The builder doesn't load .env files. Load them yourself
 * (`node --env-file=.env`) before reading configuration.
 */

import { isLogLevel } from './logger';
import type { LogLevel } from './logger';
import type { ModelBuilderOptions } from './types';

export const LOG_LEVEL_VARIABLE = 'MODEL_BUILDER_LOG_LEVEL';

/**
 * Helper to define model builder configuration with type safety.
 *
 * Returns the options object unchanged once it passes validation.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'model-conventions'
 *
 * export default defineConfig({
 *   entities: [Blog, Post],
 *   conventions: 'document',
 *   logging: process.env.NODE_ENV === 'development',
 * })
 * ```
 *
 * @throws Error when `entities` is empty or `maxConventionDepth` is not a positive integer
 */
export function defineConfig(options: ModelBuilderOptions): ModelBuilderOptions {
  validateConfig(options);
  return options;
}

/**
 * Type-safe environment variable accessor.
 *
 * Throws if the variable is not set, ensuring you catch
 * configuration errors early at startup.
 *
 * @example
 * ```typescript
 * const level = env('MODEL_BUILDER_LOG_LEVEL', 'warn')
 * ```
 */
export function env(name: string, defaultValue?: string): string {
  const value = process.env[name];

  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(
      `Missing required environment variable: ${name}\n` +
        `Please set ${name} or provide a default in your config.`,
    );
  }

  return value;
}

/**
 * Pick the log level for a builder.
 *
 * `logging: false` (or absent) is silent, a level string is used as given,
 * and `true` defers to MODEL_BUILDER_LOG_LEVEL, falling back to 'warn'.
 */
export function resolveLogLevel(options: Pick<ModelBuilderOptions, 'logging'>): LogLevel {
  const logging = options.logging;
  if (!logging) {
    return 'silent';
  }
  if (logging !== true) {
    return logging;
  }

  const level = env(LOG_LEVEL_VARIABLE, 'warn');
  if (!isLogLevel(level)) {
    throw new Error(
      `${LOG_LEVEL_VARIABLE} must be one of trace, debug, info, warn, error, fatal or silent; got '${level}'.`,
    );
  }
  return level;
}

/**
 * @internal
 */
function validateConfig(options: ModelBuilderOptions): void {
  if (!options.entities || options.entities.length === 0) {
    throw new Error(
      'ModelBuilderOptions.entities is required and must not be empty. \n' +
        'Example: { entities: [Blog, Post] }',
    );
  }

  const depth = options.maxConventionDepth;
  if (depth !== undefined && (!Number.isInteger(depth) || depth <= 0)) {
    throw new Error(
      `ModelBuilderOptions.maxConventionDepth must be a positive integer; got ${depth}.`,
    );
  }
}
