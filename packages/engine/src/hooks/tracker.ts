/**
 * Run Tracker
 *
 * Lifecycle of one public call on a unit of work: assigns the run id,
 * derives the child configuration, normalizes failures and notifies hooks.
 *
 * @module @flowkit/engine/hooks
 */

import { randomUUID } from 'node:crypto';
import {
  FlowkitError,
  UnitFailureError,
  errorMessage,
  getLogger,
  type Logger,
} from '@flowkit/core';
import {
  getChildConfig,
  getEngineConfig,
  type ResolvedExecutionConfig,
} from '../config/execution-config.js';
import { RunHookRunner } from './runner.js';
import type { RunEvent, RunMode } from './types.js';

const logger = getLogger('engine');

/**
 * Normalize a thrown value into the error surfaced by a unit.
 * Errors that are already FlowkitErrors pass through unchanged.
 */
export function toUnitFailure(error: unknown, unit: string): FlowkitError {
  if (error instanceof FlowkitError) {
    return error;
  }
  return new UnitFailureError(errorMessage(error), { unit, cause: error });
}

export class RunTracker {
  readonly runId: string;
  /** Configuration for calls nested inside this run */
  readonly childConfig: ResolvedExecutionConfig;

  private readonly event: RunEvent;
  private readonly hooks: RunHookRunner;
  private readonly log: Logger;
  private readonly startTime: number;
  private settled = false;

  private constructor(
    unit: string,
    mode: RunMode,
    input: unknown,
    config: ResolvedExecutionConfig
  ) {
    this.runId = randomUUID();
    this.startTime = Date.now();
    this.childConfig = getChildConfig(config, this.runId);
    this.event = {
      runId: this.runId,
      parentRunId: config.parentRunId,
      name: config.runName ?? unit,
      mode,
      tags: config.tags,
      metadata: config.metadata,
      startedAt: new Date(this.startTime).toISOString(),
      input,
    };
    this.hooks = new RunHookRunner(config.hooks, { debug: getEngineConfig().hookDebug });
    this.log = logger.child({ runId: this.runId, unit: this.event.name });
  }

  static start(
    unit: string,
    mode: RunMode,
    input: unknown,
    config: ResolvedExecutionConfig
  ): RunTracker {
    const tracker = new RunTracker(unit, mode, input, config);
    tracker.log.debug('Run started', { mode, parentRunId: config.parentRunId });
    tracker.hooks.start(tracker.event);
    return tracker;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  end(output: unknown): void {
    if (this.settled) return;
    this.settled = true;

    const durationMs = Date.now() - this.startTime;
    this.log.debug('Run completed', { durationMs });
    this.hooks.end({ ...this.event, output, durationMs });
  }

  /**
   * Record a failure
   *
   * @returns the error to rethrow to the caller
   */
  fail(error: unknown): FlowkitError {
    const failure = toUnitFailure(error, this.event.name);
    if (this.settled) return failure;
    this.settled = true;

    const durationMs = Date.now() - this.startTime;
    this.log.debug('Run failed', { durationMs, code: failure.code, error: failure.message });
    this.hooks.error({ ...this.event, error: failure, durationMs });
    return failure;
  }
}
