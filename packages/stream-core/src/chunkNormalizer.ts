import type { CompletePayload, NormalizedEvent, Usage } from '@streamnorm/shared';

import { isNormalizerError, ProtocolViolationError } from './errors';
import { errorEvent } from './events';
import { noopLogger, type Logger } from './logger';
import { MODEL_ADAPTERS, type ModelAdapterSpec } from './modelAdapters';
import {
  KNOWN_REASONING_FIELDS,
  readCompletionResponse,
  readStreamChunk,
  type RawChunk,
} from './rawChunk';
import { ThinkingSplitter } from './thinkingSplitter';
import { ToolCallAccumulator } from './toolCallAccumulator';

export interface ChunkNormalizerOptions {
  adapter?: Readonly<ModelAdapterSpec>;
  /** Emit `thinking_delta` events. Thinking text is retained either way. */
  keepThinking?: boolean;
  /** Report retained thinking text on the `complete` event. Defaults to true. */
  includeThinking?: boolean;
  /** Expose unterminated string values in `tool_call_delta` arguments. */
  partialToolArguments?: boolean;
  logger?: Logger;
}

/**
 * Turns one request's provider chunks into normalized events. One instance
 * per request; every request ends with exactly one terminal event.
 */
export class ChunkNormalizer {
  private readonly adapter: Readonly<ModelAdapterSpec>;

  private readonly splitter: ThinkingSplitter;

  private readonly accumulator: ToolCallAccumulator;

  private readonly reasoningFields: readonly string[];

  private readonly logger: Logger;

  private usage: Usage | undefined;

  private chunkCount = 0;

  private terminated = false;

  private extraChoicesReported = false;

  constructor(private readonly options: ChunkNormalizerOptions = {}) {
    this.adapter = options.adapter ?? MODEL_ADAPTERS.base;
    this.logger = options.logger ?? noopLogger;

    const thinking = this.adapter.thinking;
    // Non-field adapters still read the known fields so stray reasoning is reported.
    this.reasoningFields = thinking.kind === 'field' ? thinking.fields : KNOWN_REASONING_FIELDS;

    this.splitter = new ThinkingSplitter({
      thinking,
      allowReentry: this.adapter.allowThinkingReentry,
      keepThinking: options.keepThinking ?? false,
      logger: this.logger,
    });
    this.accumulator = new ToolCallAccumulator({
      indexing: this.adapter.toolCallIndexing,
      toolArguments: this.adapter.toolArguments,
      partialStrings: options.partialToolArguments ?? false,
      logger: this.logger,
    });
  }

  get finished(): boolean {
    return this.terminated;
  }

  get family(): string {
    return this.adapter.family;
  }

  push(chunk: unknown): NormalizedEvent[] {
    if (this.terminated) {
      const raw = readStreamChunk(chunk, this.reasoningFields);
      if (raw && raw.choiceCount === 0) {
        this.logger.debug?.('[normalizer] chunk without choices after the terminal event ignored');
        return [];
      }
      return this.ignored('chunk');
    }

    return this.guard((events) => {
      const raw = readStreamChunk(chunk, this.reasoningFields);
      if (!raw) {
        throw new ProtocolViolationError('Stream chunk is not an object');
      }
      this.apply(raw, false, events);
    });
  }

  /** Ends a stream that stopped without a finish signal. */
  end(): NormalizedEvent[] {
    if (this.terminated) {
      return this.ignored('end of stream');
    }
    return this.guard((events) => {
      this.logger.debug?.('[normalizer] stream ended without a finish reason');
      this.complete(null, events);
    });
  }

  /**
   * Normalizes a non-streaming response as one final chunk, so its event tail
   * matches the streamed equivalent.
   */
  normalizeResponse(response: unknown): NormalizedEvent[] {
    if (this.terminated) {
      return this.ignored('response');
    }

    return this.guard((events) => {
      if (this.chunkCount > 0) {
        throw new ProtocolViolationError('Complete response received after stream chunks');
      }
      const raw = readCompletionResponse(response, this.reasoningFields);
      if (!raw) {
        throw new ProtocolViolationError('Response is not an object');
      }
      if (raw.choiceCount === 0) {
        throw new ProtocolViolationError('Response has no choices');
      }
      this.apply(raw, true, events);
      if (!this.terminated) {
        this.complete(null, events);
      }
    });
  }

  private apply(raw: RawChunk, finalChunk: boolean, events: NormalizedEvent[]): void {
    this.chunkCount += 1;
    if (raw.usage) {
      this.usage = raw.usage;
    }

    if (raw.choiceCount === 0) {
      this.logger.debug?.('[normalizer] chunk without choices skipped');
      return;
    }
    if (raw.choiceCount > 1 && !this.extraChoicesReported) {
      this.extraChoicesReported = true;
      this.logger.warn(`[normalizer] chunk has ${raw.choiceCount} choices; only the first is read`);
    }

    const final = finalChunk || raw.finishReason !== undefined;

    if (raw.reasoningDelta !== undefined) {
      events.push(...this.splitter.push({ channel: 'reasoning', text: raw.reasoningDelta }));
    }
    if (raw.textDelta !== undefined) {
      events.push(...this.splitter.push({ channel: 'content', text: raw.textDelta }));
    }
    for (const delta of raw.toolCallDeltas) {
      events.push(...this.accumulator.push(delta, { final }));
    }

    if (raw.finishReason !== undefined) {
      this.complete(raw.finishReason, events);
    }
  }

  private complete(finishReason: string | null, events: NormalizedEvent[]): void {
    events.push(...this.splitter.flush());
    const tools = this.accumulator.finish();
    events.push(...tools.events);

    const state = this.splitter.state;
    const includeThinking = this.options.includeThinking ?? true;
    const payload: CompletePayload = {
      finishReason,
      content: state.content,
      ...(includeThinking && state.thinking.length > 0 ? { thinking: state.thinking } : {}),
      toolCalls: tools.completed,
      ...(this.usage ? { usage: this.usage } : {}),
    };
    events.push({ type: 'complete', payload });
    this.terminated = true;

    this.logger.debug?.(
      `[normalizer] complete (${finishReason ?? 'no finish reason'}, ${tools.completed.length} tool calls)`,
    );
  }

  private guard(step: (events: NormalizedEvent[]) => void): NormalizedEvent[] {
    const events: NormalizedEvent[] = [];
    try {
      step(events);
    } catch (err) {
      events.push(this.fail(err));
    }
    return events;
  }

  private fail(err: unknown): NormalizedEvent {
    this.terminated = true;
    if (isNormalizerError(err)) {
      this.logger.error(`[normalizer] ${err.kind}: ${err.message}`);
      return errorEvent(err.kind, err.message, { index: err.index, fatal: true });
    }

    const detail = err instanceof Error ? err.message : String(err);
    this.logger.error(`[normalizer] unexpected failure: ${detail}`);
    return errorEvent('ProtocolViolation', `Unexpected normalizer failure: ${detail}`, {
      fatal: true,
    });
  }

  private ignored(what: string): NormalizedEvent[] {
    this.logger.warn(`[normalizer] ${what} received after the terminal event; ignoring`);
    return [];
  }
}
