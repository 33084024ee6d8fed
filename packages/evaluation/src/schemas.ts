/**
 * Evaluation Record Schemas
 *
 * Shapes of the execution records and dataset rows the evaluation glue
 * reads. Records come from outside the process, so they are validated.
 *
 * @module @flowkit/evaluation/schemas
 */

import { z } from 'zod';
import { TypeMismatchError } from '@flowkit/core';

// =============================================================================
// Chat messages
// =============================================================================

export const ChatMessageType = z.enum(['human', 'ai', 'system', 'function', 'tool', 'chat']);

export type ChatMessageType = z.infer<typeof ChatMessageType>;

/**
 * Serialized chat message: { type, data: { content, role? } }
 */
export const ChatMessageRecord = z.object({
  type: ChatMessageType,
  data: z
    .object({
      content: z.string(),
      /** Speaker label for 'chat' messages */
      role: z.string().optional(),
    })
    .passthrough(),
});

export type ChatMessageRecord = z.infer<typeof ChatMessageRecord>;

// =============================================================================
// Run records
// =============================================================================

const RunFields = {
  /** Run identifier */
  id: z.string(),
  /** Inputs the model was called with */
  inputs: z.record(z.unknown()),
  /** Outputs; absent when the run errored or is still running */
  outputs: z.record(z.unknown()).nullish(),
  /** Error message of a failed run */
  error: z.string().nullish(),
};

export const LlmRunRecord = z.object({ runType: z.literal('llm'), ...RunFields });
export const ChainRunRecord = z.object({ runType: z.literal('chain'), ...RunFields });
export const ToolRunRecord = z.object({ runType: z.literal('tool'), ...RunFields });

/**
 * Execution record of a language model, chain or tool call
 */
export const RunRecord = z.discriminatedUnion('runType', [
  LlmRunRecord,
  ChainRunRecord,
  ToolRunRecord,
]);

export type LlmRunRecord = z.infer<typeof LlmRunRecord>;
export type ChainRunRecord = z.infer<typeof ChainRunRecord>;
export type ToolRunRecord = z.infer<typeof ToolRunRecord>;
export type RunRecord = z.infer<typeof RunRecord>;
export type RunType = RunRecord['runType'];

// =============================================================================
// Dataset rows
// =============================================================================

export const ExampleRecord = z.object({
  id: z.string(),
  inputs: z.record(z.unknown()).default({}),
  outputs: z.record(z.unknown()).nullish(),
});

export type ExampleRecord = z.infer<typeof ExampleRecord>;

// =============================================================================
// Parsing
// =============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * @throws TypeMismatchError when the value is not a run record
 */
export function parseRunRecord(value: unknown): RunRecord {
  const result = RunRecord.safeParse(value);
  if (!result.success) {
    throw new TypeMismatchError(`Invalid run record: ${describeIssues(result.error)}`, {
      expected: 'run record',
      received: typeof value,
    });
  }
  return result.data;
}

/**
 * @throws TypeMismatchError when the value is not an example record
 */
export function parseExampleRecord(value: unknown): ExampleRecord {
  const result = ExampleRecord.safeParse(value);
  if (!result.success) {
    throw new TypeMismatchError(`Invalid example record: ${describeIssues(result.error)}`, {
      expected: 'example record',
      received: typeof value,
    });
  }
  return result.data;
}
