import { describe, expect, it } from 'vitest';

import type { NormalizedEvent } from '@streamnorm/shared';

import { ProtocolViolationError } from './errors';
import type { RawToolCallDelta } from './rawChunk';
import { ToolCallAccumulator } from './toolCallAccumulator';

function delta(fields: Omit<RawToolCallDelta, 'position'> & { position?: number }): RawToolCallDelta {
  return { position: 0, ...fields };
}

function partialArgsOf(events: NormalizedEvent[]): unknown[] {
  const result: unknown[] = [];
  for (const event of events) {
    if (event.type === 'tool_call_delta') {
      result.push(event.payload.partialArgs);
    }
  }
  return result;
}

describe('ToolCallAccumulator', () => {
  it('rebuilds the get_weather call from fragments', () => {
    const accumulator = new ToolCallAccumulator();
    const events: NormalizedEvent[] = [];

    events.push(
      ...accumulator.push(delta({ index: 0, id: 'call_1', name: 'get_weather', argumentsText: '' })),
    );
    events.push(...accumulator.push(delta({ index: 0, argumentsText: '{"location": "San' })));
    events.push(...accumulator.push(delta({ index: 0, argumentsText: ' Francisco"}' })));

    expect(events).toEqual([
      {
        type: 'tool_call_delta',
        payload: { index: 0, id: 'call_1', name: 'get_weather', partialArgs: {} },
      },
      {
        type: 'tool_call_delta',
        payload: {
          index: 0,
          id: 'call_1',
          name: 'get_weather',
          partialArgs: { location: 'San Francisco' },
        },
      },
    ]);

    const result = accumulator.finish();
    expect(result.events).toEqual([
      {
        type: 'tool_call_complete',
        payload: {
          index: 0,
          id: 'call_1',
          name: 'get_weather',
          args: { location: 'San Francisco' },
        },
      },
    ]);
    expect(result.completed).toEqual([
      { index: 0, id: 'call_1', name: 'get_weather', args: { location: 'San Francisco' } },
    ]);
  });

  it('exposes open strings only when asked to', () => {
    const accumulator = new ToolCallAccumulator({ partialStrings: true });
    accumulator.push(delta({ index: 0, name: 'get_weather' }));
    const events = accumulator.push(delta({ index: 0, argumentsText: '{"location": "San' }));
    expect(partialArgsOf(events)).toEqual([{ location: 'San' }]);
  });

  it('emits a delta only when the parsed arguments change', () => {
    const accumulator = new ToolCallAccumulator();
    const events: NormalizedEvent[] = [];
    events.push(...accumulator.push(delta({ index: 0, name: 'sum', argumentsText: '{"a"' })));
    events.push(...accumulator.push(delta({ index: 0, argumentsText: ': 1' })));
    events.push(...accumulator.push(delta({ index: 0, argumentsText: ', ' })));
    events.push(...accumulator.push(delta({ index: 0, argumentsText: '"b": 2}' })));

    expect(partialArgsOf(events)).toEqual([{}, { a: 1 }, { a: 1, b: 2 }]);
  });

  it('produces the same result however the arguments are split', () => {
    const text = '{"location": "Paris", "days": 3, "tags": ["a", "b"]}';
    const expected = { location: 'Paris', days: 3, tags: ['a', 'b'] };

    for (let cut = 0; cut <= text.length; cut += 1) {
      const accumulator = new ToolCallAccumulator();
      const events = [
        ...accumulator.push(delta({ index: 0, id: 'call_9', name: 'plan' })),
        ...accumulator.push(delta({ index: 0, argumentsText: text.slice(0, cut) })),
        ...accumulator.push(delta({ index: 0, argumentsText: text.slice(cut) })),
      ];

      const partials = partialArgsOf(events);
      expect(partials[partials.length - 1]).toEqual(expected);
      for (const partial of partials) {
        const location: unknown = Reflect.get(Object(partial), 'location');
        expect(location === undefined || location === 'Paris').toBe(true);
      }
      expect(accumulator.finish().completed).toEqual([
        { index: 0, id: 'call_9', name: 'plan', args: expected },
      ]);
    }
  });

  it('keeps calls in the order their index first appeared', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push(delta({ index: 1, name: 'second', argumentsText: '{}' }));
    accumulator.push(delta({ index: 0, name: 'first', argumentsText: '{}' }));

    expect(accumulator.finish().completed.map((call) => call.index)).toEqual([1, 0]);
  });

  it('rejects a second name for the same index', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push(delta({ index: 0, name: 'alpha' }));
    expect(() => accumulator.push(delta({ index: 0, name: 'beta' }))).toThrow(
      ProtocolViolationError,
    );
  });

  it('accepts a repeated identical name', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push(delta({ index: 0, name: 'alpha', argumentsText: '{"x": ' }));
    accumulator.push(delta({ index: 0, name: 'alpha', argumentsText: '1}' }));
    expect(accumulator.finish().completed).toEqual([{ index: 0, name: 'alpha', args: { x: 1 } }]);
  });

  it('replaces the arguments with the final snapshot for snapshot adapters', () => {
    const accumulator = new ToolCallAccumulator({ toolArguments: 'final-snapshot' });
    accumulator.push(delta({ index: 0, name: 'f', argumentsText: '{"a": 1' }));
    accumulator.push(delta({ index: 0, argumentsText: '{"a": 1, "b": 2}' }), { final: true });

    expect(accumulator.finish().completed).toEqual([{ index: 0, name: 'f', args: { a: 1, b: 2 } }]);
  });

  it('appends a last fragment that rides on the finishing chunk', () => {
    const accumulator = new ToolCallAccumulator({ toolArguments: 'final-snapshot' });
    accumulator.push(delta({ index: 0, name: 'get_weather', argumentsText: '{"city": "Ber' }));

    expect(accumulator.push(delta({ index: 0, argumentsText: 'lin"}' }), { final: true })).toEqual([
      { type: 'tool_call_delta', payload: { index: 0, name: 'get_weather', partialArgs: { city: 'Berlin' } } },
    ]);
    expect(accumulator.finish().completed).toEqual([
      { index: 0, name: 'get_weather', args: { city: 'Berlin' } },
    ]);
  });

  it('drops a re-serialized final snapshot equal to the streamed arguments', () => {
    const accumulator = new ToolCallAccumulator({ toolArguments: 'final-snapshot' });
    accumulator.push(delta({ index: 0, name: 'get_weather', argumentsText: '{"city": "Berlin"}' }));

    expect(accumulator.push(delta({ index: 0, argumentsText: '{"city":"Berlin"}' }), { final: true })).toEqual(
      [],
    );
    expect(accumulator.finish().completed).toEqual([
      { index: 0, name: 'get_weather', args: { city: 'Berlin' } },
    ]);
  });

  it('scopes a conflicting final snapshot to its call', () => {
    const accumulator = new ToolCallAccumulator({ toolArguments: 'final-snapshot' });
    accumulator.push(delta({ index: 0, name: 'f', argumentsText: '{"a": 1}' }));
    accumulator.push(delta({ index: 1, name: 'g', argumentsText: '{}' }));

    const events = accumulator.push(delta({ index: 0, argumentsText: '{"a": 2}' }), { final: true });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'error',
      payload: { kind: 'MalformedJsonError', index: 0, fatal: false },
    });
    expect(accumulator.finish().completed).toEqual([{ index: 1, name: 'g', args: {} }]);
  });

  it('keeps its own copy of the arguments it hands out', () => {
    const accumulator = new ToolCallAccumulator();
    const [first] = accumulator.push(delta({ index: 0, name: 'f', argumentsText: '{"a": [1]' }));
    expect(first).toEqual({ type: 'tool_call_delta', payload: { index: 0, name: 'f', partialArgs: { a: [1] } } });

    if (first?.type === 'tool_call_delta') {
      const handedOut = first.payload.partialArgs;
      if (!Array.isArray(handedOut)) {
        handedOut['a'] = 'changed';
      }
    }
    expect(accumulator.push(delta({ index: 0, argumentsText: ' ' }))).toEqual([]);
    expect(accumulator.push(delta({ index: 0, argumentsText: '}' }))).toEqual([]);

    const { events, completed } = accumulator.finish();
    const call = completed[0];
    if (call && !Array.isArray(call.args)) {
      call.args['a'] = 'changed';
    }
    expect(events).toEqual([
      { type: 'tool_call_complete', payload: { index: 0, name: 'f', args: { a: [1] } } },
    ]);
  });

  it('keys calls by id for id-indexed adapters', () => {
    const accumulator = new ToolCallAccumulator({ indexing: 'id' });
    accumulator.push(delta({ id: 'a', name: 'f', argumentsText: '{"x":' }));
    accumulator.push(delta({ argumentsText: ' 1}' }));
    accumulator.push(delta({ id: 'b', name: 'g', argumentsText: '{}' }));

    expect(accumulator.finish().completed).toEqual([
      { index: 0, id: 'a', name: 'f', args: { x: 1 } },
      { index: 1, id: 'b', name: 'g', args: {} },
    ]);
  });

  it('falls back to the position when a delta has no index', () => {
    const accumulator = new ToolCallAccumulator();
    const first = accumulator.push(delta({ position: 2, name: 'f', argumentsText: '{}' }));
    expect(first).toEqual([
      {
        type: 'error',
        payload: {
          kind: 'AdapterMismatch',
          message: 'Tool-call delta has no index; falling back to its position in the chunk',
          fatal: false,
        },
      },
      { type: 'tool_call_delta', payload: { index: 2, name: 'f', partialArgs: {} } },
    ]);

    const second = accumulator.push(delta({ position: 3, name: 'g' }));
    expect(second.map((event) => event.type)).toEqual(['tool_call_delta']);
  });

  it('reports malformed arguments once and skips the call at finish', () => {
    const accumulator = new ToolCallAccumulator();
    const events = accumulator.push(delta({ index: 0, name: 'f', argumentsText: '{"a": 1,}' }));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'error',
      payload: { kind: 'MalformedJsonError', index: 0, fatal: false },
    });

    expect(accumulator.push(delta({ index: 0, argumentsText: '"b": 2}' }))).toEqual([]);
    expect(accumulator.finish()).toEqual({ events: [], completed: [] });
  });

  it('reports a call that never received a name', () => {
    const accumulator = new ToolCallAccumulator();
    expect(accumulator.push(delta({ index: 0, argumentsText: '{}' }))).toEqual([]);

    expect(accumulator.finish().events).toEqual([
      {
        type: 'error',
        payload: {
          kind: 'IncompleteToolCallArguments',
          message: 'Tool call 0 ended without a function name',
          index: 0,
          fatal: false,
        },
      },
    ]);
  });

  it('reports arguments that are still open at finish', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push(delta({ index: 0, name: 'f', argumentsText: '{"a": "x' }));

    const result = accumulator.finish();
    expect(result.completed).toEqual([]);
    expect(result.events).toHaveLength(1);
    expect(result.events[0]).toMatchObject({
      type: 'error',
      payload: { kind: 'IncompleteToolCallArguments', index: 0, fatal: false },
    });
  });

  it('treats empty arguments as an empty object', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push(delta({ index: 0, id: 'call_0', name: 'now' }));
    expect(accumulator.finish().completed).toEqual([
      { index: 0, id: 'call_0', name: 'now', args: {} },
    ]);
  });

  it('rejects deltas after finish', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.finish();
    expect(() => accumulator.push(delta({ index: 0, name: 'f' }))).toThrow(ProtocolViolationError);
  });
});
