/**
 * Run Hook Runner
 *
 * Dispatches run events to the hooks of one run.
 * Designed to be resilient - hooks should never crash the main pipeline.
 *
 * @module @flowkit/engine/hooks
 */

import { errorMessage, getLogger, type Logger } from '@flowkit/core';
import type { RunEndEvent, RunErrorEvent, RunEvent, RunHook } from './types.js';

/**
 * Result of a single hook execution
 */
interface HookExecutionResult {
  hookName: string;
  success: boolean;
  error?: string;
}

/**
 * Result of dispatching one event to all hooks
 */
export interface HookRunResult {
  totalHooks: number;
  successfulHooks: number;
  failedHooks: number;
  results: HookExecutionResult[];
}

type HookMethod = 'onRunStart' | 'onRunEnd' | 'onRunError';

/**
 * RunHookRunner executes hooks around a run
 *
 * Usage:
 * ```typescript
 * const runner = new RunHookRunner(config.hooks);
 * runner.start(event);
 * // ... run the unit ...
 * runner.end({ ...event, output, durationMs });
 * ```
 */
export class RunHookRunner {
  private readonly hooks: RunHook[];
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(hooks: RunHook[], options?: { logger?: Logger; debug?: boolean }) {
    this.hooks = hooks;
    this.logger = options?.logger ?? getLogger('hook-runner');
    this.debug = options?.debug ?? false;
  }

  /**
   * Get list of hook names
   */
  getRegisteredHooks(): string[] {
    return this.hooks.map((h) => h.name);
  }

  start(event: RunEvent): HookRunResult {
    return this.dispatch('onRunStart', event, (hook) => hook.onRunStart?.(event));
  }

  end(event: RunEndEvent): HookRunResult {
    return this.dispatch('onRunEnd', event, (hook) => hook.onRunEnd?.(event));
  }

  error(event: RunErrorEvent): HookRunResult {
    return this.dispatch('onRunError', event, (hook) => hook.onRunError?.(event));
  }

  /**
   * Run hooks in registration order; failures are recorded, never rethrown
   */
  private dispatch(
    method: HookMethod,
    event: RunEvent,
    call: (hook: RunHook) => void
  ): HookRunResult {
    const withMethod = this.hooks.filter((h) => typeof h[method] === 'function');
    const results: HookExecutionResult[] = [];

    if (this.debug && withMethod.length > 0) {
      this.logger.debug(`Running ${withMethod.length} ${method} hooks`, {
        runId: event.runId,
        name: event.name,
      });
    }

    for (const hook of withMethod) {
      try {
        call(hook);
        results.push({ hookName: hook.name, success: true });
      } catch (error) {
        const message = errorMessage(error);
        results.push({ hookName: hook.name, success: false, error: message });

        this.logger.warn(`Hook ${hook.name}.${method} failed: ${message}`, {
          hookName: hook.name,
          runId: event.runId,
        });
      }
    }

    const successfulHooks = results.filter((r) => r.success).length;
    return {
      totalHooks: withMethod.length,
      successfulHooks,
      failedHooks: withMethod.length - successfulHooks,
      results,
    };
  }
}
