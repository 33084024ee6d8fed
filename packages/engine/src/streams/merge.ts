/**
 * Keyed stream merge
 *
 * Interleaves several async streams, emitting whichever chunk settles first.
 * Order within one stream is preserved; order across streams is not.
 *
 * @module @flowkit/engine/streams
 */

export interface KeyedStream<T> {
  key: string;
  iterator: AsyncIterator<T>;
}

export interface KeyedChunk<T> {
  key: string;
  value: T;
}

type Pulled<T> =
  | { stream: KeyedStream<T>; ok: true; result: IteratorResult<T> }
  | { stream: KeyedStream<T>; ok: false; error: unknown };

/**
 * Pending pulls never reject, so a stream abandoned after a sibling failed
 * cannot surface as an unhandled rejection.
 */
function pull<T>(stream: KeyedStream<T>): Promise<Pulled<T>> {
  return stream.iterator.next().then(
    (result) => ({ stream, ok: true as const, result }),
    (error: unknown) => ({ stream, ok: false as const, error })
  );
}

/**
 * Merge keyed streams.
 *
 * The first failure ends the merge; `attribute` maps it to the error thrown
 * to the consumer. Streams still running are abandoned, not cancelled.
 */
export async function* mergeKeyedStreams<T>(
  streams: KeyedStream<T>[],
  attribute: (key: string, error: unknown) => unknown = (_key, error) => error
): AsyncGenerator<KeyedChunk<T>, void, undefined> {
  const pending = new Map<string, Promise<Pulled<T>>>();
  for (const stream of streams) {
    pending.set(stream.key, pull(stream));
  }

  while (pending.size > 0) {
    const pulled = await Promise.race(pending.values());
    const { key } = pulled.stream;

    if (!pulled.ok) {
      throw attribute(key, pulled.error);
    }
    if (pulled.result.done) {
      pending.delete(key);
      continue;
    }

    pending.set(key, pull(pulled.stream));
    yield { key, value: pulled.result.value };
  }
}
