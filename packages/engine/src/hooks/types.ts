/**
 * Run Hook Types
 *
 * Callback hooks carried in the execution configuration. Every public call
 * on a unit of work is a run; hooks observe its start, end and failure.
 * Hooks can be used for:
 * - Custom logging or telemetry
 * - Collecting traces of nested calls in tests
 *
 * @module @flowkit/engine/hooks
 */

import type { FlowkitError } from '@flowkit/core';

/**
 * Execution mode of a run
 */
export type RunMode =
  | 'invoke'      // Sync single-shot
  | 'ainvoke'     // Async single-shot
  | 'stream'      // Sync streaming of one input
  | 'astream'     // Async streaming of one input
  | 'transform'   // Sync streaming of an input stream
  | 'atransform'; // Async streaming of an input stream

/**
 * Context passed to every hook callback
 */
export interface RunEvent {
  /** Unique identifier for this run */
  runId: string;

  /** Run that made this nested call, if any */
  parentRunId?: string;

  /** Unit name, or the configured run name */
  name: string;

  mode: RunMode;

  tags: string[];

  metadata: Record<string, unknown>;

  /** ISO 8601 timestamp of when the run started */
  startedAt: string;

  /** Single-shot input; absent for transform runs */
  input?: unknown;
}

export interface RunEndEvent extends RunEvent {
  /** Result, or the accumulated chunks of a streaming run */
  output: unknown;

  durationMs: number;
}

export interface RunErrorEvent extends RunEvent {
  error: FlowkitError;

  durationMs: number;
}

/**
 * Run hook interface
 *
 * Callbacks are synchronous because synchronous call trees dispatch them too.
 * A throwing hook is logged and ignored.
 */
export interface RunHook {
  /** Unique name for this hook */
  name: string;

  onRunStart?(event: RunEvent): void;

  onRunEnd?(event: RunEndEvent): void;

  onRunError?(event: RunErrorEvent): void;
}
