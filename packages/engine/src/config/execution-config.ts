/**
 * Execution Configuration
 *
 * Per-call options threaded through every unit of work: run naming, tags,
 * hooks, executor selection and limits. Units never inspect it beyond
 * extracting an executor and deriving child configurations for nested calls.
 *
 * @module @flowkit/engine/config
 */

import { z } from 'zod';
import {
  ConfigurationError,
  readEngineConfigFromEnv,
  type EngineConfig,
} from '@flowkit/core';
import type { RunHook } from '../hooks/types.js';
import type { SyncExecutor } from './executor.js';

/**
 * Options accepted by every public operation
 */
export interface ExecutionConfig {
  /** Name reported to hooks instead of the unit's own name */
  runName?: string;
  /** Tags inherited by nested calls */
  tags?: string[];
  /** Metadata inherited by nested calls */
  metadata?: Record<string, unknown>;
  /** Run hooks inherited by nested calls */
  hooks?: RunHook[];
  /** Parallelism of async executors */
  maxConcurrency?: number;
  /** Maximum depth of nested calls */
  recursionLimit?: number;
  /** Executor for background work in synchronous call trees */
  executor?: SyncExecutor;
  /** Set by the engine on child configurations */
  parentRunId?: string;
  /** Set by the engine on child configurations */
  depth?: number;
}

/**
 * Configuration with every defaultable field filled in
 */
export interface ResolvedExecutionConfig extends ExecutionConfig {
  tags: string[];
  metadata: Record<string, unknown>;
  hooks: RunHook[];
  maxConcurrency: number;
  recursionLimit: number;
  depth: number;
}

/**
 * Schema for the fields a caller may get wrong
 */
export const ExecutionConfigSchema = z.object({
  runName: z.string().min(1).optional(),
  tags: z.array(z.string()).optional(),
  maxConcurrency: z.number().int().positive().optional(),
  recursionLimit: z.number().int().positive().optional(),
  depth: z.number().int().nonnegative().optional(),
});

// =============================================================================
// Engine defaults
// =============================================================================

let engineConfig: EngineConfig | null = null;

/**
 * Get engine defaults, reading the environment on first use
 */
export function getEngineConfig(): EngineConfig {
  if (!engineConfig) {
    engineConfig = readEngineConfigFromEnv();
  }
  return engineConfig;
}

/**
 * Set engine defaults (for testing); null re-reads the environment
 */
export function setEngineConfig(config: EngineConfig | null): void {
  engineConfig = config;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Validate a configuration and fill in defaults
 *
 * @throws ConfigurationError listing every invalid field
 */
export function ensureConfig(config?: ExecutionConfig): ResolvedExecutionConfig {
  const given = config ?? {};
  const result = ExecutionConfigSchema.safeParse({
    runName: given.runName,
    tags: given.tags,
    maxConcurrency: given.maxConcurrency,
    recursionLimit: given.recursionLimit,
    depth: given.depth,
  });

  if (!result.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fieldErrors[issue.path.join('.')] = issue.message;
    }
    throw new ConfigurationError(
      `Invalid execution configuration: ${Object.keys(fieldErrors).join(', ')}`,
      { fieldErrors }
    );
  }

  const defaults = getEngineConfig();
  return {
    ...given,
    tags: given.tags ?? [],
    metadata: given.metadata ?? {},
    hooks: given.hooks ?? [],
    maxConcurrency: given.maxConcurrency ?? defaults.maxConcurrency,
    recursionLimit: given.recursionLimit ?? defaults.recursionLimit,
    depth: given.depth ?? 0,
  };
}

/**
 * Configuration for a nested call made by the run `runId`
 */
export function getChildConfig(
  config: ResolvedExecutionConfig,
  runId: string
): ResolvedExecutionConfig {
  return {
    ...config,
    runName: undefined,
    parentRunId: runId,
    depth: config.depth + 1,
  };
}

/**
 * Configuration with extra tags, for scoping a nested call
 */
export function withTags(
  config: ResolvedExecutionConfig,
  ...tags: string[]
): ResolvedExecutionConfig {
  return { ...config, tags: [...config.tags, ...tags] };
}
