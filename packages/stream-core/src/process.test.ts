import { describe, expect, it } from 'vitest';

import type { NormalizedEvent } from '@streamnorm/shared';

import { MODEL_ADAPTERS } from './modelAdapters';
import { normalizeStream, process, processBatch, processRequest } from './process';

function chunk(delta: Record<string, unknown>, finishReason: string | null = null): unknown {
  return { choices: [{ index: 0, delta, finish_reason: finishReason }] };
}

describe('processRequest', () => {
  it('picks the adapter from the model name', () => {
    const events = [
      ...processRequest({
        kind: 'stream',
        model: 'qwq-32b',
        chunks: [chunk({ content: '<think>plan</think>' }), chunk({ content: 'Done' }), chunk({}, 'stop')],
      }),
    ];

    expect(events).toEqual([
      { type: 'mode_change', payload: { mode: 'thinking' } },
      { type: 'mode_change', payload: { mode: 'answering' } },
      { type: 'content_delta', payload: { text: 'Done' } },
      {
        type: 'complete',
        payload: { finishReason: 'stop', content: 'Done', thinking: 'plan', toolCalls: [] },
      },
    ]);
  });

  it('stops reading chunks after the terminal event', () => {
    function* chunks(): Generator<unknown> {
      yield chunk({ content: 'hi' }, 'stop');
      throw new Error('read past the end');
    }

    const events = [...processRequest({ kind: 'stream', chunks: chunks() })];
    expect(events[events.length - 1]?.type).toBe('complete');
  });

  it('ends a stream without a finish reason', () => {
    const events = [...processRequest({ kind: 'stream', chunks: [chunk({ content: 'x' })] })];
    expect(events[events.length - 1]).toEqual({
      type: 'complete',
      payload: { finishReason: null, content: 'x', toolCalls: [] },
    });
  });

  it('accepts an adapter spec directly', () => {
    const events = [
      ...processRequest({
        kind: 'response',
        model: 'qwen3-8b',
        adapter: MODEL_ADAPTERS.plain,
        response: { choices: [{ message: { content: '<think>x</think>y' }, finish_reason: 'stop' }] },
      }),
    ];
    expect(events[events.length - 1]).toEqual({
      type: 'complete',
      payload: { finishReason: 'stop', content: '<think>x</think>y', toolCalls: [] },
    });
  });

  it('is exported as process', () => {
    expect(process).toBe(processRequest);
  });
});

describe('processBatch', () => {
  it('keeps the order of its inputs', () => {
    const results = processBatch([
      { kind: 'stream', chunks: [chunk({ content: 'first' }, 'stop')] },
      { kind: 'response', response: { choices: [{ message: { content: 'second' }, finish_reason: 'length' }] } },
    ]);

    expect(results.map((events) => events[events.length - 1])).toEqual([
      { type: 'complete', payload: { finishReason: 'stop', content: 'first', toolCalls: [] } },
      { type: 'complete', payload: { finishReason: 'length', content: 'second', toolCalls: [] } },
    ]);
  });
});

describe('normalizeStream', () => {
  it('normalizes an async chunk source', async () => {
    async function* source(): AsyncGenerator<unknown> {
      yield chunk({ reasoning_content: 'thinking...' });
      yield chunk({ content: 'answer' });
      yield chunk({}, 'stop');
    }

    const events: NormalizedEvent[] = [];
    for await (const event of normalizeStream(source(), { model: 'deepseek-reasoner', keepThinking: true })) {
      events.push(event);
    }

    expect(events.map((event) => event.type)).toEqual([
      'mode_change',
      'thinking_delta',
      'mode_change',
      'content_delta',
      'complete',
    ]);
  });
});
