/**
 * Example Mapper
 *
 * Reads the reference answer of a dataset row.
 *
 * @module @flowkit/evaluation/example-mapper
 */

import { SourceMappingError } from '@flowkit/core';
import type { ExampleRecord } from './schemas.js';

export interface ReferenceInput {
  reference: unknown;
}

/**
 * Map an example to its reference output.
 * Without a key, the example must have exactly one output.
 *
 * @throws SourceMappingError when the output cannot be determined
 */
export function mapExampleToReference(
  example: ExampleRecord,
  referenceKey?: string
): ReferenceInput {
  const outputs = example.outputs;
  if (!outputs) {
    throw new SourceMappingError(`Example ${example.id} has no outputs to use as a reference`, {
      sourceId: example.id,
    });
  }

  if (referenceKey === undefined) {
    const keys = Object.keys(outputs);
    if (keys.length !== 1) {
      throw new SourceMappingError(
        `Example ${example.id} has ${keys.length} outputs; specify a reference key`,
        { sourceId: example.id, context: { available: keys } }
      );
    }
    return { reference: outputs[keys[0]] };
  }

  if (!(referenceKey in outputs)) {
    throw new SourceMappingError(
      `Example ${example.id} does not have reference key ${referenceKey}`,
      { sourceId: example.id, context: { available: Object.keys(outputs) } }
    );
  }
  return { reference: outputs[referenceKey] };
}
