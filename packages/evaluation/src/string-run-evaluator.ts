/**
 * String Run Evaluator
 *
 * Scores an execution record with a string evaluator: the run (and the
 * dataset example, when a reference is configured) is mapped to
 * { input, prediction, reference } and handed to the evaluator.
 *
 * @module @flowkit/evaluation/string-run-evaluator
 */

import { ConfigurationError, SourceMappingError } from '@flowkit/core';
import {
  InvokableUnit,
  type ExecutionConfig,
  type ResolvedExecutionConfig,
  type WorkUnitOptions,
} from '@flowkit/engine';
import { mapExampleToReference } from './example-mapper.js';
import {
  createRunMapping,
  mapRunToEvaluationInput,
  type ChainKeys,
  type ModelDescriptor,
  type RunMapping,
} from './run-mapper.js';
import type { ExampleRecord, RunRecord } from './schemas.js';

// =============================================================================
// Evaluator boundary
// =============================================================================

export interface StringEvaluationArgs {
  prediction: unknown;
  reference?: unknown;
  input?: unknown;
}

/**
 * Raw result of a string evaluator. Keys other than the known ones are
 * kept as evaluator info.
 */
export interface EvaluationScore {
  score?: number;
  value?: string;
  comment?: string;
  reasoning?: string;
  [key: string]: unknown;
}

/**
 * Scores a prediction, optionally against a reference
 */
export interface StringEvaluator {
  /** Key the feedback is reported under */
  readonly evaluationName: string;
  readonly requiresReference: boolean;
  evaluateStrings(args: StringEvaluationArgs): EvaluationScore;
  /** Falls back to evaluateStrings when absent */
  aevaluateStrings?(args: StringEvaluationArgs): Promise<EvaluationScore>;
}

export interface EvaluationResult {
  key: string;
  score?: number;
  value?: string;
  comment?: string;
  evaluatorInfo: Record<string, unknown>;
}

export interface RunEvaluationInput {
  run: RunRecord;
  example?: ExampleRecord;
}

export interface RunEvaluationOutput {
  feedback: EvaluationResult;
}

export interface StringRunEvaluatorOptions extends WorkUnitOptions {
  evaluator: StringEvaluator;
  runMapping: RunMapping;
  /**
   * Read a reference from the example. `{}` reads the example's only
   * output; omit to evaluate without a reference.
   */
  referenceMapping?: { referenceKey?: string };
}

// =============================================================================
// Evaluator unit
// =============================================================================

export class StringRunEvaluator extends InvokableUnit<RunEvaluationInput, RunEvaluationOutput> {
  readonly evaluator: StringEvaluator;
  readonly runMapping: RunMapping;
  readonly referenceMapping?: { referenceKey?: string };

  constructor(options: StringRunEvaluatorOptions) {
    super({ name: options.name ?? options.evaluator.evaluationName });
    this.evaluator = options.evaluator;
    this.runMapping = options.runMapping;
    this.referenceMapping = options.referenceMapping;
  }

  /**
   * Build an evaluator for runs of the given model
   *
   * @throws ConfigurationError when chain keys cannot be resolved, or the
   * evaluator needs a reference and no reference key is given
   */
  static fromModelAndEvaluator(
    model: ModelDescriptor,
    evaluator: StringEvaluator,
    keys: Partial<ChainKeys> & { referenceKey?: string } = {}
  ): StringRunEvaluator {
    const runMapping = createRunMapping(model, keys);

    if (keys.referenceKey === undefined && evaluator.requiresReference) {
      throw new ConfigurationError(
        `Evaluator ${evaluator.evaluationName} requires a reference example from the dataset; specify the reference key from amongst the dataset output keys`,
        { fieldErrors: { referenceKey: 'required by evaluator' } }
      );
    }

    return new StringRunEvaluator({
      evaluator,
      runMapping,
      referenceMapping:
        keys.referenceKey === undefined ? undefined : { referenceKey: keys.referenceKey },
    });
  }

  evaluateRun(run: RunRecord, example?: ExampleRecord, config?: ExecutionConfig): EvaluationResult {
    return this.invoke({ run, example }, config).feedback;
  }

  async aevaluateRun(
    run: RunRecord,
    example?: ExampleRecord,
    config?: ExecutionConfig
  ): Promise<EvaluationResult> {
    const output = await this.ainvoke({ run, example }, config);
    return output.feedback;
  }

  protected _invoke(input: RunEvaluationInput, _config: ResolvedExecutionConfig): RunEvaluationOutput {
    const args = this.prepareInput(input);
    return { feedback: this.prepareOutput(this.evaluator.evaluateStrings(args)) };
  }

  protected async _ainvoke(
    input: RunEvaluationInput,
    _config: ResolvedExecutionConfig
  ): Promise<RunEvaluationOutput> {
    const args = this.prepareInput(input);
    const score = this.evaluator.aevaluateStrings
      ? await this.evaluator.aevaluateStrings(args)
      : this.evaluator.evaluateStrings(args);
    return { feedback: this.prepareOutput(score) };
  }

  private prepareInput({ run, example }: RunEvaluationInput): StringEvaluationArgs {
    const args: StringEvaluationArgs = mapRunToEvaluationInput(run, this.runMapping);
    if (!this.referenceMapping) {
      return args;
    }
    if (!example) {
      throw new SourceMappingError(
        `Evaluator ${this.getName()} requires a reference example from the dataset, but none was provided for run ${run.id}`,
        { sourceId: run.id }
      );
    }
    return { ...args, ...mapExampleToReference(example, this.referenceMapping.referenceKey) };
  }

  private prepareOutput(output: EvaluationScore): EvaluationResult {
    const { score, value, comment, reasoning, ...rest } = output;
    const result: EvaluationResult = { key: this.getName(), evaluatorInfo: rest };
    if (score !== undefined) result.score = score;
    if (value !== undefined) result.value = value;
    const note = comment ?? reasoning;
    if (note !== undefined) result.comment = note;
    return result;
  }
}
