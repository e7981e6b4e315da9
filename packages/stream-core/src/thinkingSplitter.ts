import type { NormalizedEvent } from '@streamnorm/shared';

import { contentDelta, errorEvent, thinkingDelta } from './events';
import { noopLogger, type Logger } from './logger';
import type { ThinkingSignal } from './modelAdapters';

export type SplitterMode = 'idle' | 'thinking' | 'answering';

export interface TextFragment {
  /** `reasoning` when the text came from a dedicated reasoning field. */
  channel: 'content' | 'reasoning';
  text: string;
}

export interface ThinkingState {
  mode: SplitterMode;
  thinking: string;
  content: string;
}

export interface ThinkingSplitterOptions {
  thinking: ThinkingSignal;
  allowReentry?: boolean;
  /** Forward thinking text as `thinking_delta` events instead of only retaining it. */
  keepThinking?: boolean;
  logger?: Logger;
}

type MismatchCause = 'reentry' | 'reasoning-field';

/**
 * Splits one request's text into thinking and answer segments. Never throws
 * on model output: anything it cannot place is answer text.
 */
export class ThinkingSplitter {
  private mode: SplitterMode = 'idle';

  private thinkingText = '';

  private contentText = '';

  /** Set once the first thinking segment starts; only a later one is re-entry. */
  private thinkingStarted = false;

  /** Text held back: a possible partial tag, or whitespace seen while idle. */
  private carry = '';

  private readonly reported = new Set<MismatchCause>();

  private readonly logger: Logger;

  constructor(private readonly options: ThinkingSplitterOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  get state(): ThinkingState {
    return {
      mode: this.mode,
      thinking: this.thinkingText,
      content: this.contentText,
    };
  }

  push(fragment: TextFragment): NormalizedEvent[] {
    const events: NormalizedEvent[] = [];
    if (fragment.text.length === 0) {
      return events;
    }

    const signal = this.options.thinking;
    if (fragment.channel === 'reasoning') {
      if (signal.kind !== 'field') {
        this.reportMismatch(
          'reasoning-field',
          `Adapter expects ${signal.kind === 'delimiter' ? 'delimiter-tagged' : 'no'} thinking but the chunk carries a reasoning field; treating it as answer text`,
          events,
        );
        this.pushText(fragment.text, events);
        return events;
      }
      this.pushReasoningField(fragment.text, events);
      return events;
    }

    this.pushText(fragment.text, events);
    return events;
  }

  /** Releases held-back text once the request is over. */
  flush(): NormalizedEvent[] {
    const events: NormalizedEvent[] = [];
    const rest = this.carry;
    this.carry = '';
    if (this.mode === 'thinking') {
      this.emitThinking(rest, events);
    } else {
      this.emitContent(rest, events);
    }
    return events;
  }

  private pushText(text: string, events: NormalizedEvent[]): void {
    const signal = this.options.thinking;
    if (signal.kind === 'delimiter') {
      this.pushDelimited(text, signal.open, signal.close, events);
      return;
    }
    if (signal.kind === 'none') {
      this.emitContent(text, events);
      return;
    }

    const combined = this.carry + text;
    this.carry = '';
    if (this.mode === 'idle' && combined.trim().length === 0) {
      this.carry = combined;
      return;
    }
    this.emitContent(combined, events);
  }

  private pushReasoningField(text: string, events: NormalizedEvent[]): void {
    if (this.isReentry()) {
      this.reportMismatch(
        'reentry',
        'Reasoning text arrived after the answer started; treating it as answer text',
        events,
      );
      this.emitContent(text, events);
      return;
    }
    if (this.mode === 'idle') {
      // Leading whitespace before the reasoning is dropped.
      this.carry = '';
    }
    this.emitThinking(text, events);
  }

  private pushDelimited(fragment: string, open: string, close: string, events: NormalizedEvent[]): void {
    let text = this.carry + fragment;
    this.carry = '';

    while (text.length > 0) {
      if (this.mode === 'thinking') {
        const end = text.indexOf(close);
        if (end === -1) {
          const split = splitKeepingTagPrefix(text, close);
          this.emitThinking(split.emit, events);
          this.carry = split.carry;
          return;
        }
        this.emitThinking(text.slice(0, end), events);
        this.enter('answering', events);
        text = text.slice(end + close.length);
        continue;
      }

      const start = text.indexOf(open);
      if (start === -1) {
        const split = splitKeepingTagPrefix(text, open);
        if (this.mode === 'idle' && split.emit.trim().length === 0) {
          this.carry = text;
          return;
        }
        this.emitContent(split.emit, events);
        this.carry = split.carry;
        return;
      }

      const before = text.slice(0, start);
      if (this.mode !== 'idle' || before.trim().length > 0) {
        this.emitContent(before, events);
      }
      text = text.slice(start + open.length);

      if (this.isReentry()) {
        this.reportMismatch(
          'reentry',
          `Thinking tag ${open} appeared after the answer started; treating it as answer text`,
          events,
        );
        this.emitContent(open, events);
        continue;
      }
      this.enter('thinking', events);
    }
  }

  private isReentry(): boolean {
    return this.mode === 'answering' && this.thinkingStarted && !this.options.allowReentry;
  }

  private enter(mode: 'thinking' | 'answering', events: NormalizedEvent[]): void {
    if (this.mode === mode) {
      return;
    }
    this.mode = mode;
    if (mode === 'thinking') {
      this.thinkingStarted = true;
    }
    events.push({ type: 'mode_change', payload: { mode } });
  }

  private emitThinking(text: string, events: NormalizedEvent[]): void {
    if (text.length === 0) {
      return;
    }
    this.enter('thinking', events);
    this.thinkingText += text;
    if (this.options.keepThinking) {
      events.push(thinkingDelta(text));
    }
  }

  private emitContent(text: string, events: NormalizedEvent[]): void {
    if (text.length === 0) {
      return;
    }
    this.enter('answering', events);
    this.contentText += text;
    events.push(contentDelta(text));
  }

  private reportMismatch(cause: MismatchCause, message: string, events: NormalizedEvent[]): void {
    if (this.reported.has(cause)) {
      return;
    }
    this.reported.add(cause);
    this.logger.warn(`[thinking] ${message}`);
    events.push(errorEvent('AdapterMismatch', message));
  }
}

/**
 * Holds back the longest suffix of `text` that could be the start of `tag`.
 */
export function splitKeepingTagPrefix(text: string, tag: string): { emit: string; carry: string } {
  const maxKeep = Math.min(tag.length - 1, text.length);
  for (let keep = maxKeep; keep > 0; keep -= 1) {
    if (text.endsWith(tag.slice(0, keep))) {
      return { emit: text.slice(0, text.length - keep), carry: text.slice(text.length - keep) };
    }
  }
  return { emit: text, carry: '' };
}
