/**
 * Engine Configuration
 *
 * Reads engine defaults from environment variables.
 *
 * Environment Variables:
 * - FLOWKIT_MAX_CONCURRENCY: Default parallelism of async executors (default: 8)
 * - FLOWKIT_RECURSION_LIMIT: Default depth of nested calls (default: 25)
 * - FLOWKIT_HOOK_DEBUG: Log every run hook dispatch (default: false)
 * - FLOWKIT_LOG_LEVEL: debug | info | warn | error (default: info)
 * - FLOWKIT_DEBUG: Force debug logging
 *
 * @module @flowkit/core/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';
import { resolveLogLevel, type LogLevel } from '../reliability/observability.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');

/**
 * Raw environment schema
 */
export const EngineEnvSchema = z.object({
  FLOWKIT_MAX_CONCURRENCY: z.coerce.number().int().positive().default(8),
  FLOWKIT_RECURSION_LIMIT: z.coerce.number().int().positive().default(25),
  FLOWKIT_HOOK_DEBUG: booleanFlag,
});

/**
 * Engine defaults applied when a call's execution configuration
 * leaves a field unset
 */
export interface EngineConfig {
  /** Default parallelism of async executors */
  maxConcurrency: number;
  /** Default recursion limit */
  recursionLimit: number;
  /** Log every hook dispatch */
  hookDebug: boolean;
  /** Minimum log level */
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxConcurrency: 8,
  recursionLimit: 25,
  hookDebug: false,
  logLevel: 'INFO',
};

/**
 * Read engine configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function readEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Empty strings count as unset
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EngineEnvSchema.safeParse(raw);
  if (!result.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fieldErrors[issue.path.join('.')] = issue.message;
    }
    throw new ConfigurationError(
      `Invalid engine configuration: ${Object.keys(fieldErrors).join(', ')}`,
      { fieldErrors }
    );
  }

  return {
    maxConcurrency: result.data.FLOWKIT_MAX_CONCURRENCY,
    recursionLimit: result.data.FLOWKIT_RECURSION_LIMIT,
    hookDebug: result.data.FLOWKIT_HOOK_DEBUG,
    logLevel: resolveLogLevel(env),
  };
}
