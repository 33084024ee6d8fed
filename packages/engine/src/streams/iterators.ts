/**
 * Iterator helpers shared by the sync and async code paths.
 *
 * @module @flowkit/engine/streams
 */

import { assertStructuredRecord, concatChunks, type StructuredRecord } from './records.js';

/**
 * Accumulated value of a stream, absent when the stream was empty
 */
export type Accumulated<T> = { value: T } | undefined;

export function* singleton<T>(value: T): Generator<T, void, undefined> {
  yield value;
}

export async function* asyncSingleton<T>(value: T): AsyncGenerator<T, void, undefined> {
  yield value;
}

/**
 * Drain a stream, folding chunks with concatChunks
 */
export function accumulate<T>(source: Iterable<T>): Accumulated<T> {
  let acc: Accumulated<T>;
  for (const chunk of source) {
    acc = acc ? { value: concatChunks(acc.value, chunk) } : { value: chunk };
  }
  return acc;
}

export async function accumulateAsync<T>(source: AsyncIterable<T>): Promise<Accumulated<T>> {
  let acc: Accumulated<T>;
  for await (const chunk of source) {
    acc = acc ? { value: concatChunks(acc.value, chunk) } : { value: chunk };
  }
  return acc;
}

/**
 * Pass records through, failing on the first item that is not one
 */
export function* requireRecords(
  source: Iterable<unknown>,
  unit: string
): Generator<StructuredRecord, void, undefined> {
  for (const item of source) {
    assertStructuredRecord(item, unit);
    yield item;
  }
}

export async function* requireRecordsAsync(
  source: AsyncIterable<unknown>,
  unit: string
): AsyncGenerator<StructuredRecord, void, undefined> {
  for await (const item of source) {
    assertStructuredRecord(item, unit);
    yield item;
  }
}
