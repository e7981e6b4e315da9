import type { NormalizedEvent } from '@streamnorm/shared';

export interface OutputSink {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processOutputSink: OutputSink = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Human-readable rendering: answer text and tool calls on stdout, everything
 * else on stderr.
 */
export function renderEvent(event: NormalizedEvent, sink: OutputSink): void {
  switch (event.type) {
    case 'content_delta':
      sink.stdout(event.payload.text);
      return;
    case 'thinking_delta':
      sink.stderr(event.payload.text);
      return;
    case 'mode_change':
      sink.stderr(`[${event.payload.mode}]\n`);
      return;
    case 'tool_call_delta':
      return;
    case 'tool_call_complete':
      sink.stdout(
        `\n[tool call ${event.payload.index}] ${event.payload.name} ${JSON.stringify(event.payload.args)}\n`,
      );
      return;
    case 'complete': {
      const { finishReason, usage } = event.payload;
      sink.stdout('\n');
      sink.stderr(
        `[done] finish_reason=${finishReason ?? 'none'}${usage ? `, total_tokens=${usage.totalTokens}` : ''}\n`,
      );
      return;
    }
    case 'error': {
      const { kind, index, message } = event.payload;
      sink.stderr(`[${kind}${index !== undefined ? ` #${index}` : ''}] ${message}\n`);
      return;
    }
  }
}
