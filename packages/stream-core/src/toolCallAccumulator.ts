import type { CompletedToolCall, JsonContainer, NormalizedEvent } from '@streamnorm/shared';

import { isNormalizerError, MalformedJsonError, ProtocolViolationError } from './errors';
import { errorEvent } from './events';
import { noopLogger, type Logger } from './logger';
import type { ModelAdapterSpec } from './modelAdapters';
import { jsonEquals, parseCompleteJson, parsePartialJson } from './partialJson';
import type { RawToolCallDelta } from './rawChunk';

interface ToolCallState {
  index: number;
  id?: string;
  name?: string;
  /** Append-only argument text. */
  rawArguments: string;
  lastEmitted?: JsonContainer;
  malformed: boolean;
}

export interface ToolCallAccumulatorOptions {
  indexing?: ModelAdapterSpec['toolCallIndexing'];
  toolArguments?: ModelAdapterSpec['toolArguments'];
  /** Expose unterminated string values in `partialArgs`. */
  partialStrings?: boolean;
  logger?: Logger;
}

export interface ToolCallFinishResult {
  events: NormalizedEvent[];
  completed: CompletedToolCall[];
}

/**
 * Rebuilds tool-call arguments for one request from streamed fragments.
 * Calls are reported in the order their index first appeared.
 */
export class ToolCallAccumulator {
  private readonly states = new Map<number, ToolCallState>();

  private readonly indexById = new Map<string, number>();

  private latestIndex: number | undefined;

  private nextOrdinal = 0;

  private missingIndexReported = false;

  private finished = false;

  private readonly logger: Logger;

  constructor(private readonly options: ToolCallAccumulatorOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * Applies one delta. `final` marks deltas that arrive on the chunk carrying
   * the finish signal.
   */
  push(delta: RawToolCallDelta, context: { final?: boolean } = {}): NormalizedEvent[] {
    if (this.finished) {
      throw new ProtocolViolationError('Tool-call delta received after the request finished');
    }

    const events: NormalizedEvent[] = [];
    const index = this.resolveIndex(delta, events);

    let state = this.states.get(index);
    if (!state) {
      state = { index, rawArguments: '', malformed: false };
      this.states.set(index, state);
    }
    this.latestIndex = index;

    if (delta.id && !state.id) {
      state.id = delta.id;
    }

    let nameBound = false;
    if (delta.name) {
      if (state.name === undefined) {
        state.name = delta.name;
        nameBound = true;
      } else if (state.name !== delta.name) {
        throw new ProtocolViolationError(
          `Tool call ${index} is bound to "${state.name}" but received "${delta.name}"`,
          index,
        );
      }
    }

    const text = delta.argumentsText;
    if (text !== undefined) {
      this.appendArguments(state, text, context.final === true);
    }

    if (state.name === undefined || state.malformed) {
      return events;
    }
    if (text === undefined && !nameBound) {
      return events;
    }

    const parsed = this.parse(state, events);
    if (parsed && !jsonEquals(parsed, state.lastEmitted)) {
      state.lastEmitted = structuredClone(parsed);
      events.push({
        type: 'tool_call_delta',
        payload: {
          index,
          ...(state.id ? { id: state.id } : {}),
          name: state.name,
          partialArgs: parsed,
        },
      });
    }
    return events;
  }

  /**
   * Strictly parses every call. Each index yields exactly one
   * `tool_call_complete` or scoped error, except calls already reported as
   * malformed.
   */
  finish(): ToolCallFinishResult {
    if (this.finished) {
      throw new ProtocolViolationError('Tool calls were already finished');
    }
    this.finished = true;

    const events: NormalizedEvent[] = [];
    const completed: CompletedToolCall[] = [];

    for (const state of this.states.values()) {
      if (state.malformed) {
        continue;
      }

      if (state.name === undefined) {
        events.push(
          errorEvent(
            'IncompleteToolCallArguments',
            `Tool call ${state.index} ended without a function name`,
            { index: state.index },
          ),
        );
        continue;
      }

      try {
        const args = parseCompleteJson(state.rawArguments);
        const call: CompletedToolCall = {
          index: state.index,
          ...(state.id ? { id: state.id } : {}),
          name: state.name,
          args,
        };
        completed.push(call);
        events.push({ type: 'tool_call_complete', payload: { ...call, args: structuredClone(args) } });
      } catch (err) {
        if (!isNormalizerError(err)) {
          throw err;
        }
        this.logger.warn(`[tool-calls] ${state.name} (index ${state.index}): ${err.message}`);
        events.push(
          errorEvent(
            err.kind === 'MalformedJsonError' ? 'MalformedJsonError' : 'IncompleteToolCallArguments',
            `Tool call ${state.index} (${state.name}) has invalid arguments: ${err.message}`,
            { index: state.index },
          ),
        );
      }
    }

    this.states.clear();
    this.indexById.clear();
    return { events, completed };
  }

  private resolveIndex(delta: RawToolCallDelta, events: NormalizedEvent[]): number {
    if (this.options.indexing === 'id') {
      if (delta.id) {
        const known = this.indexById.get(delta.id);
        if (known !== undefined) {
          return known;
        }
        const assigned = this.nextOrdinal;
        this.nextOrdinal += 1;
        this.indexById.set(delta.id, assigned);
        return assigned;
      }
      if (this.latestIndex !== undefined) {
        return this.latestIndex;
      }
      const assigned = this.nextOrdinal;
      this.nextOrdinal += 1;
      return assigned;
    }

    if (delta.index !== undefined) {
      return delta.index;
    }

    if (!this.missingIndexReported) {
      this.missingIndexReported = true;
      this.logger.warn('[tool-calls] tool-call delta without an index; using its position');
      events.push(
        errorEvent(
          'AdapterMismatch',
          'Tool-call delta has no index; falling back to its position in the chunk',
        ),
      );
    }
    return delta.position;
  }

  /**
   * Snapshot adapters may resend the whole argument text on the finishing
   * chunk. A snapshot that extends the streamed text replaces it, one equal to
   * the already complete arguments is dropped, anything else is a fragment.
   */
  private appendArguments(state: ToolCallState, text: string, final: boolean): void {
    if (final && this.options.toolArguments === 'final-snapshot' && state.rawArguments.length > 0) {
      if (text.startsWith(state.rawArguments)) {
        state.rawArguments = text;
        return;
      }
      if (sameCompleteArguments(state.rawArguments, text)) {
        this.logger.debug?.(`[tool-calls] index ${state.index}: final snapshot matches the streamed arguments`);
        return;
      }
    }
    state.rawArguments += text;
  }

  private parse(state: ToolCallState, events: NormalizedEvent[]): JsonContainer | undefined {
    try {
      return parsePartialJson(state.rawArguments, {
        partialStrings: this.options.partialStrings ?? false,
      }).value;
    } catch (err) {
      if (!(err instanceof MalformedJsonError)) {
        throw err;
      }
      state.malformed = true;
      this.logger.warn(`[tool-calls] ${state.name ?? 'unknown'} (index ${state.index}): ${err.message}`);
      events.push(
        errorEvent('MalformedJsonError', `Tool call ${state.index} arguments: ${err.message}`, {
          index: state.index,
        }),
      );
      return undefined;
    }
  }
}

function sameCompleteArguments(streamed: string, snapshot: string): boolean {
  try {
    return jsonEquals(parseCompleteJson(streamed), parseCompleteJson(snapshot));
  } catch (err) {
    if (isNormalizerError(err)) {
      return false;
    }
    throw err;
  }
}
