import type { NormalizedEvent } from '@streamnorm/shared';

import { ChunkNormalizer, type ChunkNormalizerOptions } from './chunkNormalizer';
import { resolveModelAdapter, type ModelAdapterSpec, type ModelFamily } from './modelAdapters';

export interface NormalizeOptions extends Omit<ChunkNormalizerOptions, 'adapter'> {
  /** Model name used to pick an adapter when none is given. */
  model?: string;
  adapter?: ModelFamily | Readonly<ModelAdapterSpec>;
}

export type ProcessInput = NormalizeOptions &
  (
    | { kind: 'stream'; chunks: Iterable<unknown> }
    | { kind: 'response'; response: unknown }
  );

export function createNormalizer(options: NormalizeOptions = {}): ChunkNormalizer {
  const { model, adapter, ...rest } = options;
  const spec =
    typeof adapter === 'object' ? adapter : resolveModelAdapter(model ?? '', adapter);
  return new ChunkNormalizer({ ...rest, adapter: spec });
}

/**
 * Normalizes one request. Events are produced as the caller pulls them and
 * the sequence always ends with one terminal event.
 */
export function* processRequest(input: ProcessInput): Generator<NormalizedEvent, void, undefined> {
  const normalizer = createNormalizer(input);

  if (input.kind === 'response') {
    yield* normalizer.normalizeResponse(input.response);
    return;
  }

  for (const chunk of input.chunks) {
    yield* normalizer.push(chunk);
    if (normalizer.finished) {
      return;
    }
  }
  yield* normalizer.end();
}

export { processRequest as process };

export async function* normalizeStream(
  chunks: AsyncIterable<unknown>,
  options: NormalizeOptions = {},
): AsyncGenerator<NormalizedEvent, void, undefined> {
  const normalizer = createNormalizer(options);
  for await (const chunk of chunks) {
    yield* normalizer.push(chunk);
    if (normalizer.finished) {
      return;
    }
  }
  yield* normalizer.end();
}

/** Normalizes several requests one after another, keeping their order. */
export function processBatch(inputs: Iterable<ProcessInput>): NormalizedEvent[][] {
  return Array.from(inputs, (input) => [...processRequest(input)]);
}
