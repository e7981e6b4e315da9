import type { NormalizedEvent } from '@streamnorm/shared';
import { processRequest, type NormalizeOptions } from '@streamnorm/stream-core';

import { LlmClientError } from './errors';

export interface ReplayOptions extends NormalizeOptions {
  /**
   * `stream`: every record is a chunk. `response`: the single record is a
   * non-streaming response.
   */
  mode?: 'stream' | 'response';
}

const SSE_DATA_PREFIX = 'data:';
const SSE_DONE = '[DONE]';

/**
 * Reads recorded provider output, one JSON object per line. Server-sent event
 * framing (`data:` prefixes, the `[DONE]` marker) is accepted too.
 */
export function parseJsonLines(lines: Iterable<string>): unknown[] {
  const records: unknown[] = [];
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber += 1;
    let text = line.trim();
    if (text.length === 0 || text.startsWith(':')) {
      continue;
    }
    if (text.startsWith(SSE_DATA_PREFIX)) {
      text = text.slice(SSE_DATA_PREFIX.length).trim();
    }
    if (text === SSE_DONE) {
      continue;
    }

    try {
      records.push(JSON.parse(text));
    } catch (err) {
      throw new LlmClientError(
        'replay_error',
        `Line ${lineNumber} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
  return records;
}

export function replayJsonLines(
  lines: Iterable<string>,
  options: ReplayOptions = {},
): NormalizedEvent[] {
  const { mode = 'stream', ...normalizeOptions } = options;
  const records = parseJsonLines(lines);

  if (mode === 'response') {
    if (records.length !== 1) {
      throw new LlmClientError(
        'replay_error',
        `Expected exactly one recorded response, found ${records.length}`,
      );
    }
    return [...processRequest({ ...normalizeOptions, kind: 'response', response: records[0] })];
  }

  return [...processRequest({ ...normalizeOptions, kind: 'stream', chunks: records })];
}
