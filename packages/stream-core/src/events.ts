import type { ErrorKind, ErrorEvent, NormalizedEvent } from '@streamnorm/shared';

export function errorEvent(
  kind: ErrorKind,
  message: string,
  options: { index?: number; fatal?: boolean } = {},
): ErrorEvent {
  return {
    type: 'error',
    payload: {
      kind,
      message,
      ...(options.index !== undefined ? { index: options.index } : {}),
      fatal: options.fatal ?? false,
    },
  };
}

export function contentDelta(text: string): NormalizedEvent {
  return { type: 'content_delta', payload: { text } };
}

export function thinkingDelta(text: string): NormalizedEvent {
  return { type: 'thinking_delta', payload: { text } };
}
