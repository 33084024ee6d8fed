/**
 * Structured Records
 *
 * Shape checks and chunk accumulation for the dict-like payloads that flow
 * through the parallel map and merge-assign combinators.
 *
 * @module @flowkit/engine/streams
 */

import { TypeMismatchError } from '@flowkit/core';

/**
 * Ordered string-keyed mapping
 */
export type StructuredRecord = Record<string, unknown>;

/**
 * True for plain objects (prototype is Object.prototype or null).
 * Arrays, class instances, Maps and primitives are not records.
 */
export function isStructuredRecord(value: unknown): value is StructuredRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Short description of a value's shape for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

/**
 * @throws TypeMismatchError when the value is not a structured record
 */
export function assertStructuredRecord(
  value: unknown,
  unit: string
): asserts value is StructuredRecord {
  if (!isStructuredRecord(value)) {
    const received = describeValue(value);
    throw new TypeMismatchError(`The input to ${unit} must be a record, received ${received}`, {
      expected: 'record',
      received,
      context: { unit },
    });
  }
}

/**
 * Copy of a record without the given keys
 */
export function omitKeys(record: StructuredRecord, keys: ReadonlySet<string>): StructuredRecord {
  const result: StructuredRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (!keys.has(key)) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Fold a chunk into the value accumulated so far.
 *
 * Records merge key-wise (later keys overwrite), strings and arrays
 * concatenate, anything else is replaced by the later chunk.
 */
export function concatChunks<T>(previous: T, chunk: T): T;
export function concatChunks(previous: unknown, chunk: unknown): unknown {
  if (isStructuredRecord(previous) && isStructuredRecord(chunk)) {
    return { ...previous, ...chunk };
  }
  if (typeof previous === 'string' && typeof chunk === 'string') {
    return previous + chunk;
  }
  if (Array.isArray(previous) && Array.isArray(chunk)) {
    return [...previous, ...chunk];
  }
  return chunk;
}

/**
 * The value itself, typed as a record
 *
 * @throws TypeMismatchError when the value is not a structured record
 */
export function expectRecord(value: unknown, unit: string): StructuredRecord {
  assertStructuredRecord(value, unit);
  return value;
}
