/**
 * Run Mapper
 *
 * Extracts the input and prediction of an execution record so a string
 * evaluator can score it. One mapping per run type, selected by an
 * exhaustive switch on the record's tag.
 *
 * @module @flowkit/evaluation/run-mapper
 */

import { z } from 'zod';
import { ConfigurationError, SourceMappingError, errorMessage } from '@flowkit/core';
import { formatMessageBuffer } from './messages.js';
import {
  ChatMessageRecord,
  type ChainRunRecord,
  type LlmRunRecord,
  type RunRecord,
  type RunType,
  type ToolRunRecord,
} from './schemas.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Description of the model that produced a run
 */
export type ModelDescriptor =
  | { kind: 'llm'; name: string }
  | { kind: 'chain'; name: string; inputKeys: string[]; outputKeys: string[] }
  | { kind: 'tool'; name: string };

/**
 * Keys used to read chain runs
 */
export interface ChainKeys {
  inputKey: string;
  predictionKey: string;
}

/**
 * How runs of one model are read
 */
export type RunMapping =
  | { runType: 'llm' }
  | ({ runType: 'chain' } & ChainKeys)
  | { runType: 'tool' };

/**
 * What an evaluator scores
 */
export interface EvaluationInput {
  input: unknown;
  prediction: unknown;
}

// =============================================================================
// Key resolution
// =============================================================================

/**
 * Pick the keys used to read runs of a chain. A key that is not given
 * defaults to the chain's single input or output key.
 *
 * @throws ConfigurationError listing every key that cannot be resolved
 */
export function resolveChainKeys(
  model: { name: string; inputKeys: string[]; outputKeys: string[] },
  inputKey?: string,
  predictionKey?: string
): ChainKeys {
  const fieldErrors: Record<string, string> = {};

  let resolvedInput = inputKey;
  if (resolvedInput === undefined) {
    if (model.inputKeys.length === 1) {
      resolvedInput = model.inputKeys[0];
    } else {
      fieldErrors.inputKey = `Must specify input key for model with multiple inputs: ${model.inputKeys.join(', ')}`;
    }
  } else if (!model.inputKeys.includes(resolvedInput)) {
    fieldErrors.inputKey = `Input key ${resolvedInput} not in model's input keys: ${model.inputKeys.join(', ')}`;
  }

  let resolvedPrediction = predictionKey;
  if (resolvedPrediction === undefined) {
    if (model.outputKeys.length === 1) {
      resolvedPrediction = model.outputKeys[0];
    } else {
      fieldErrors.predictionKey = `Must specify prediction key for model with multiple outputs: ${model.outputKeys.join(', ')}`;
    }
  } else if (!model.outputKeys.includes(resolvedPrediction)) {
    fieldErrors.predictionKey = `Prediction key ${resolvedPrediction} not in model's output keys: ${model.outputKeys.join(', ')}`;
  }

  if (resolvedInput === undefined || resolvedPrediction === undefined || Object.keys(fieldErrors).length > 0) {
    throw new ConfigurationError(Object.values(fieldErrors).join('\n'), {
      fieldErrors,
      context: { model: model.name },
    });
  }

  return { inputKey: resolvedInput, predictionKey: resolvedPrediction };
}

/**
 * Build the mapping for runs of a model
 */
export function createRunMapping(
  model: ModelDescriptor,
  keys?: Partial<ChainKeys>
): RunMapping {
  switch (model.kind) {
    case 'llm':
      return { runType: 'llm' };
    case 'chain':
      return { runType: 'chain', ...resolveChainKeys(model, keys?.inputKey, keys?.predictionKey) };
    case 'tool':
      return { runType: 'tool' };
  }
}

// =============================================================================
// Mapping
// =============================================================================

function unexpectedRunType(run: RunRecord, expected: RunType): SourceMappingError {
  return new SourceMappingError(
    `Run ${run.id} is a ${run.runType} run; this mapping reads ${expected} runs`,
    { sourceId: run.id }
  );
}

/**
 * Map a run to the input and prediction an evaluator scores
 *
 * @throws SourceMappingError when the run has no outputs, is of the wrong
 * type, or lacks a key the mapping reads
 */
export function mapRunToEvaluationInput(run: RunRecord, mapping: RunMapping): EvaluationInput {
  const outputs = run.outputs;
  if (!outputs) {
    const reason = run.error ? `: ${run.error}` : '';
    throw new SourceMappingError(`Run ${run.id} has no outputs to evaluate${reason}`, {
      sourceId: run.id,
    });
  }

  switch (mapping.runType) {
    case 'llm':
      if (run.runType !== 'llm') throw unexpectedRunType(run, 'llm');
      return mapLlmRun(run, outputs);
    case 'chain':
      if (run.runType !== 'chain') throw unexpectedRunType(run, 'chain');
      return mapChainRun(run, outputs, mapping);
    case 'tool':
      if (run.runType !== 'tool') throw unexpectedRunType(run, 'tool');
      return mapToolRun(run, outputs);
  }
}

// =============================================================================
// LLM runs
// =============================================================================

const PromptsInput = z.object({ prompts: z.array(z.string()) });
const PromptInput = z.object({ prompt: z.string() });
const MessagesInput = z.object({ messages: z.array(ChatMessageRecord) });

const MessageGenerations = z.object({ messages: z.array(ChatMessageRecord) });
const TextGenerations = z.array(z.array(z.object({ text: z.string() })));

function serializeLlmInputs(run: LlmRunRecord): string {
  const inputs = run.inputs;
  if ('prompts' in inputs) {
    const parsed = PromptsInput.safeParse(inputs);
    if (parsed.success) return parsed.data.prompts.join('\n\n');
  } else if ('prompt' in inputs) {
    const parsed = PromptInput.safeParse(inputs);
    if (parsed.success) return parsed.data.prompt;
  } else if ('messages' in inputs) {
    const parsed = MessagesInput.safeParse(inputs);
    if (parsed.success) return formatMessageBuffer(parsed.data.messages);
  } else {
    throw new SourceMappingError('LLM run must have either messages or prompts as inputs', {
      sourceId: run.id,
    });
  }
  throw new SourceMappingError(`Could not parse LLM input from run ${run.id} inputs`, {
    sourceId: run.id,
  });
}

function serializeLlmOutputs(run: LlmRunRecord, outputs: Record<string, unknown>): string {
  const generations = outputs.generations;
  if (!Array.isArray(generations) || generations.length === 0) {
    throw new SourceMappingError(`LLM run ${run.id} must have generations as outputs`, {
      sourceId: run.id,
    });
  }

  const messages = MessageGenerations.safeParse(generations[0]);
  if (messages.success) {
    return formatMessageBuffer(messages.data.messages);
  }

  const texts = TextGenerations.safeParse(generations);
  if (!texts.success) {
    throw new SourceMappingError(`Could not parse LLM prediction from run ${run.id} outputs`, {
      sourceId: run.id,
      cause: texts.error,
    });
  }
  return texts.data.flatMap((batch) => batch.map((generation) => generation.text)).join('\n\n');
}

function mapLlmRun(run: LlmRunRecord, outputs: Record<string, unknown>): EvaluationInput {
  try {
    return {
      input: serializeLlmInputs(run),
      prediction: serializeLlmOutputs(run, outputs),
    };
  } catch (error) {
    if (error instanceof SourceMappingError) {
      throw error;
    }
    throw new SourceMappingError(`Could not map LLM run ${run.id}: ${errorMessage(error)}`, {
      sourceId: run.id,
      cause: error,
    });
  }
}

// =============================================================================
// Chain and tool runs
// =============================================================================

function readKey(
  run: RunRecord,
  record: Record<string, unknown>,
  key: string,
  side: 'input' | 'output'
): unknown {
  if (!(key in record)) {
    throw new SourceMappingError(`Run ${run.id} does not have ${side} key ${key}`, {
      sourceId: run.id,
      context: { key, available: Object.keys(record) },
    });
  }
  return record[key];
}

function mapChainRun(
  run: ChainRunRecord,
  outputs: Record<string, unknown>,
  keys: ChainKeys
): EvaluationInput {
  return {
    input: readKey(run, run.inputs, keys.inputKey, 'input'),
    prediction: readKey(run, outputs, keys.predictionKey, 'output'),
  };
}

function mapToolRun(run: ToolRunRecord, outputs: Record<string, unknown>): EvaluationInput {
  return {
    input: readKey(run, run.inputs, 'input', 'input'),
    prediction: readKey(run, outputs, 'output', 'output'),
  };
}
