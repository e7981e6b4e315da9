import { z } from 'zod';

export const NormalizedEventTypeSchema = z.enum([
  'content_delta',
  'thinking_delta',
  'mode_change',
  'tool_call_delta',
  'tool_call_complete',
  'complete',
  'error',
]);

export type NormalizedEventType = z.infer<typeof NormalizedEventTypeSchema>;

export const ErrorKindSchema = z.enum([
  'MalformedJsonError',
  'IncompleteToolCallArguments',
  'ProtocolViolation',
  'AdapterMismatch',
]);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export const ThinkingModeSchema = z.enum(['thinking', 'answering']);
export type ThinkingMode = z.infer<typeof ThinkingModeSchema>;

/**
 * Any JSON value. Tool-call arguments are objects or arrays at the top level,
 * but nested values can be anything JSON allows.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonContainer = JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export const JsonContainerSchema: z.ZodType<JsonContainer> = z.union([
  z.array(JsonValueSchema),
  z.record(z.string(), JsonValueSchema),
]);

export const ContentDeltaPayloadSchema = z.object({
  text: z.string(),
});
export type ContentDeltaPayload = z.infer<typeof ContentDeltaPayloadSchema>;

export const ThinkingDeltaPayloadSchema = z.object({
  text: z.string(),
});
export type ThinkingDeltaPayload = z.infer<typeof ThinkingDeltaPayloadSchema>;

export const ModeChangePayloadSchema = z.object({
  mode: ThinkingModeSchema,
});
export type ModeChangePayload = z.infer<typeof ModeChangePayloadSchema>;

export const ToolCallDeltaPayloadSchema = z.object({
  index: z.number().int().nonnegative(),
  id: z.string().optional(),
  name: z.string().optional(),
  /** Latest best-known arguments, reparsed from the accumulated text. */
  partialArgs: JsonContainerSchema,
});
export type ToolCallDeltaPayload = z.infer<typeof ToolCallDeltaPayloadSchema>;

export const ToolCallCompletePayloadSchema = z.object({
  index: z.number().int().nonnegative(),
  id: z.string().optional(),
  name: z.string(),
  args: JsonContainerSchema,
});
export type ToolCallCompletePayload = z.infer<typeof ToolCallCompletePayloadSchema>;

export const CompletedToolCallSchema = ToolCallCompletePayloadSchema;
export type CompletedToolCall = ToolCallCompletePayload;

export const UsageSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
});
export type Usage = z.infer<typeof UsageSchema>;

export const CompletePayloadSchema = z.object({
  /** Provider finish reason; null when the stream ended without one. */
  finishReason: z.string().nullable(),
  content: z.string(),
  thinking: z.string().optional(),
  toolCalls: z.array(CompletedToolCallSchema),
  usage: UsageSchema.optional(),
});
export type CompletePayload = z.infer<typeof CompletePayloadSchema>;

export const ErrorPayloadSchema = z.object({
  kind: ErrorKindSchema,
  message: z.string(),
  /** Tool-call index the error is scoped to, when there is one. */
  index: z.number().int().nonnegative().optional(),
  /** Fatal errors terminate the request's event sequence. */
  fatal: z.boolean(),
});
export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>;

export const ContentDeltaEventSchema = z.object({
  type: z.literal('content_delta'),
  payload: ContentDeltaPayloadSchema,
});

export const ThinkingDeltaEventSchema = z.object({
  type: z.literal('thinking_delta'),
  payload: ThinkingDeltaPayloadSchema,
});

export const ModeChangeEventSchema = z.object({
  type: z.literal('mode_change'),
  payload: ModeChangePayloadSchema,
});

export const ToolCallDeltaEventSchema = z.object({
  type: z.literal('tool_call_delta'),
  payload: ToolCallDeltaPayloadSchema,
});

export const ToolCallCompleteEventSchema = z.object({
  type: z.literal('tool_call_complete'),
  payload: ToolCallCompletePayloadSchema,
});

export const CompleteEventSchema = z.object({
  type: z.literal('complete'),
  payload: CompletePayloadSchema,
});

export const ErrorEventSchema = z.object({
  type: z.literal('error'),
  payload: ErrorPayloadSchema,
});

export const NormalizedEventSchema = z.discriminatedUnion('type', [
  ContentDeltaEventSchema,
  ThinkingDeltaEventSchema,
  ModeChangeEventSchema,
  ToolCallDeltaEventSchema,
  ToolCallCompleteEventSchema,
  CompleteEventSchema,
  ErrorEventSchema,
]);

export type NormalizedEvent = z.infer<typeof NormalizedEventSchema>;

export type ContentDeltaEvent = z.infer<typeof ContentDeltaEventSchema>;
export type ThinkingDeltaEvent = z.infer<typeof ThinkingDeltaEventSchema>;
export type ModeChangeEvent = z.infer<typeof ModeChangeEventSchema>;
export type ToolCallDeltaEvent = z.infer<typeof ToolCallDeltaEventSchema>;
export type ToolCallCompleteEvent = z.infer<typeof ToolCallCompleteEventSchema>;
export type CompleteEvent = z.infer<typeof CompleteEventSchema>;
export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

export function isTerminalEvent(event: NormalizedEvent): event is CompleteEvent | ErrorEvent {
  if (event.type === 'complete') {
    return true;
  }
  return event.type === 'error' && event.payload.fatal;
}

export function validateNormalizedEvent(data: unknown): NormalizedEvent {
  return NormalizedEventSchema.parse(data);
}

export function safeValidateNormalizedEvent(
  data: unknown,
): z.SafeParseReturnType<unknown, NormalizedEvent> {
  return NormalizedEventSchema.safeParse(data);
}
