import type { Usage } from '@streamnorm/shared';

export interface RawToolCallDelta {
  /** Provider-assigned index, when the delta carries one. */
  index?: number;
  /** Position of the delta in the chunk's tool-call list. */
  position: number;
  id?: string;
  name?: string;
  argumentsText?: string;
}

/**
 * The parts of one provider chunk the normalizer acts on. Only the first
 * choice is read.
 */
export interface RawChunk {
  id?: string;
  choiceCount: number;
  textDelta?: string;
  reasoningDelta?: string;
  /** Name of the field that carried `reasoningDelta`. */
  reasoningField?: string;
  toolCallDeltas: RawToolCallDelta[];
  finishReason?: string;
  usage?: Usage;
}

export const KNOWN_REASONING_FIELDS: readonly string[] = ['reasoning_content', 'reasoning'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

export function extractTextFromContent(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }

  if (Array.isArray(content)) {
    let text = '';
    for (const part of content) {
      if (isRecord(part) && part['type'] === 'text' && typeof part['text'] === 'string') {
        text += part['text'];
      }
    }
    return text;
  }

  return '';
}

function readUsage(value: unknown): Usage | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const prompt = value['prompt_tokens'];
  const completion = value['completion_tokens'];
  const total = value['total_tokens'];
  if (typeof prompt !== 'number' || typeof completion !== 'number') {
    return undefined;
  }
  return {
    promptTokens: prompt,
    completionTokens: completion,
    totalTokens: typeof total === 'number' ? total : prompt + completion,
  };
}

function readToolCallDeltas(value: unknown): RawToolCallDelta[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const deltas: RawToolCallDelta[] = [];
  value.forEach((rawToolCall: unknown, position) => {
    if (!isRecord(rawToolCall)) {
      return;
    }

    const delta: RawToolCallDelta = { position };
    const indexRaw = rawToolCall['index'];
    if (typeof indexRaw === 'number' && Number.isInteger(indexRaw) && indexRaw >= 0) {
      delta.index = indexRaw;
    }
    if (isNonEmptyString(rawToolCall['id'])) {
      delta.id = rawToolCall['id'];
    }

    const functionBlock = rawToolCall['function'];
    if (isRecord(functionBlock)) {
      if (isNonEmptyString(functionBlock['name'])) {
        delta.name = functionBlock['name'];
      }
      const args = functionBlock['arguments'];
      if (typeof args === 'string') {
        delta.argumentsText = args;
      } else if (isRecord(args) || Array.isArray(args)) {
        // Some servers hand back already-decoded arguments.
        delta.argumentsText = JSON.stringify(args);
      }
    }
    deltas.push(delta);
  });
  return deltas;
}

function readReasoning(
  source: Record<string, unknown>,
  reasoningFields: readonly string[],
): { text: string; field: string } | undefined {
  for (const field of reasoningFields) {
    const value = source[field];
    if (isNonEmptyString(value)) {
      return { text: value, field };
    }
  }
  return undefined;
}

function readChoiceBody(
  chunk: Record<string, unknown>,
  bodyKey: 'delta' | 'message',
  reasoningFields: readonly string[],
): RawChunk {
  const choices = Array.isArray(chunk['choices']) ? chunk['choices'] : [];
  const raw: RawChunk = {
    choiceCount: choices.length,
    toolCallDeltas: [],
  };

  if (isNonEmptyString(chunk['id'])) {
    raw.id = chunk['id'];
  }
  const usage = readUsage(chunk['usage']);
  if (usage) {
    raw.usage = usage;
  }

  const choice: unknown = choices[0];
  if (!isRecord(choice)) {
    return raw;
  }

  if (isNonEmptyString(choice['finish_reason'])) {
    raw.finishReason = choice['finish_reason'];
  }

  const body = choice[bodyKey];
  if (!isRecord(body)) {
    return raw;
  }

  const text = extractTextFromContent(body['content']);
  if (text.length > 0) {
    raw.textDelta = text;
  }
  const reasoning = readReasoning(body, reasoningFields);
  if (reasoning) {
    raw.reasoningDelta = reasoning.text;
    raw.reasoningField = reasoning.field;
  }
  raw.toolCallDeltas = readToolCallDeltas(body['tool_calls']);
  return raw;
}

/** Reads one `chat.completion.chunk`. Returns undefined for non-objects. */
export function readStreamChunk(
  chunk: unknown,
  reasoningFields: readonly string[] = KNOWN_REASONING_FIELDS,
): RawChunk | undefined {
  if (!isRecord(chunk)) {
    return undefined;
  }
  return readChoiceBody(chunk, 'delta', reasoningFields);
}

/**
 * Reads a non-streaming `chat.completion` as one synthetic final chunk; tool
 * calls are indexed by their position in the message.
 */
export function readCompletionResponse(
  response: unknown,
  reasoningFields: readonly string[] = KNOWN_REASONING_FIELDS,
): RawChunk | undefined {
  if (!isRecord(response)) {
    return undefined;
  }
  const raw = readChoiceBody(response, 'message', reasoningFields);
  raw.toolCallDeltas = raw.toolCallDeltas.map((delta) => ({ ...delta, index: delta.position }));
  return raw;
}
