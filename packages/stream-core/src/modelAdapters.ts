/**
 * How a model family signals "thinking" text:
 * - `field`: a dedicated reasoning field on the delta (first present field wins)
 * - `delimiter`: inline text wrapped in reserved open/close tags
 * - `none`: the family never reasons; everything is answer text
 */
export type ThinkingSignal =
  | { kind: 'field'; fields: readonly string[] }
  | { kind: 'delimiter'; open: string; close: string }
  | { kind: 'none' };

export type ModelFamily = 'base' | 'glm' | 'deepseek' | 'think-tags' | 'plain';

export interface ModelAdapterSpec {
  family: string;
  thinking: ThinkingSignal;
  /** Whether the model may go back to thinking after it started answering. */
  allowThinkingReentry: boolean;
  /**
   * `index`: tool-call deltas carry a stable `index`.
   * `id`: deltas are keyed by call id; a delta with no id continues the latest call.
   */
  toolCallIndexing: 'index' | 'id';
  /**
   * `final-snapshot`: the finishing chunk repeats the complete argument text
   * instead of a delta.
   */
  toolArguments: 'delta' | 'final-snapshot';
  /** How thinking is switched on and off in requests. */
  thinkingToggle: 'none' | 'chat-template-kwargs';
}

const REASONING_FIELDS = ['reasoning_content', 'reasoning'] as const;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function defineModelAdapter(spec: ModelAdapterSpec): Readonly<ModelAdapterSpec> {
  return deepFreeze(structuredClone(spec));
}

const ADAPTER_TABLE: Record<ModelFamily, ModelAdapterSpec> = {
  base: {
    family: 'base',
    thinking: { kind: 'field', fields: [...REASONING_FIELDS] },
    allowThinkingReentry: false,
    toolCallIndexing: 'index',
    toolArguments: 'delta',
    thinkingToggle: 'none',
  },
  glm: {
    family: 'glm',
    thinking: { kind: 'field', fields: ['reasoning', 'reasoning_content'] },
    allowThinkingReentry: false,
    toolCallIndexing: 'index',
    toolArguments: 'final-snapshot',
    thinkingToggle: 'chat-template-kwargs',
  },
  deepseek: {
    family: 'deepseek',
    thinking: { kind: 'field', fields: ['reasoning_content'] },
    allowThinkingReentry: false,
    toolCallIndexing: 'index',
    toolArguments: 'delta',
    thinkingToggle: 'none',
  },
  'think-tags': {
    family: 'think-tags',
    thinking: { kind: 'delimiter', open: '<think>', close: '</think>' },
    allowThinkingReentry: false,
    toolCallIndexing: 'index',
    toolArguments: 'delta',
    thinkingToggle: 'chat-template-kwargs',
  },
  plain: {
    family: 'plain',
    thinking: { kind: 'none' },
    allowThinkingReentry: false,
    toolCallIndexing: 'index',
    toolArguments: 'delta',
    thinkingToggle: 'none',
  },
};

export const MODEL_ADAPTERS: Readonly<Record<ModelFamily, Readonly<ModelAdapterSpec>>> =
  deepFreeze(ADAPTER_TABLE);

export const MODEL_FAMILIES: readonly ModelFamily[] = ['base', 'glm', 'deepseek', 'think-tags', 'plain'];

export function isModelFamily(value: string): value is ModelFamily {
  return Object.prototype.hasOwnProperty.call(MODEL_ADAPTERS, value);
}

const FAMILY_PATTERNS: ReadonlyArray<{ pattern: RegExp; family: ModelFamily }> = [
  { pattern: /glm/i, family: 'glm' },
  { pattern: /qwq|r1-distill/i, family: 'think-tags' },
  { pattern: /deepseek/i, family: 'deepseek' },
];

/**
 * Resolves the adapter for a model. An explicit family wins over the
 * name-based match.
 */
export function resolveModelAdapter(
  modelName: string,
  family?: ModelFamily,
): Readonly<ModelAdapterSpec> {
  if (family) {
    return MODEL_ADAPTERS[family];
  }

  for (const { pattern, family: matched } of FAMILY_PATTERNS) {
    if (pattern.test(modelName)) {
      return MODEL_ADAPTERS[matched];
    }
  }

  return MODEL_ADAPTERS.base;
}
