import type {
  ChatCompletionCreateParamsBase,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';

import type { ModelAdapterSpec } from '@streamnorm/stream-core';

export interface JsonSchemaFormat {
  name: string;
  schema: Record<string, unknown>;
  description?: string;
  strict?: boolean;
}

/** Extra body field read by chat templates that can switch thinking on and off. */
export interface ChatTemplateKwargs {
  enable_thinking: boolean;
  clear_thinking: boolean;
}

/** Request body without the `stream` flag, which the transport sets. */
export type ChatRequestBody = Omit<ChatCompletionCreateParamsBase, 'stream' | 'stream_options'> & {
  chat_template_kwargs?: ChatTemplateKwargs;
};

export interface ChatRequestOptions {
  model: string;
  messages: ChatCompletionMessageParam[];
  tools?: ChatCompletionTool[];
  /** Constrains the answer to a JSON schema (structured output). */
  jsonSchema?: JsonSchemaFormat;
  maxTokens?: number;
  temperature?: number;
  /** Defaults to false. */
  enableThinking?: boolean;
  /** Drop thinking from earlier turns. Defaults to true. */
  clearThinking?: boolean;
}

export function buildChatRequest(
  adapter: Readonly<ModelAdapterSpec>,
  options: ChatRequestOptions,
): ChatRequestBody {
  const body: ChatRequestBody = {
    model: options.model,
    messages: options.messages,
  };

  if (options.tools && options.tools.length > 0) {
    body.tools = options.tools;
  }
  if (options.jsonSchema) {
    body.response_format = {
      type: 'json_schema',
      json_schema: {
        name: options.jsonSchema.name,
        schema: options.jsonSchema.schema,
        ...(options.jsonSchema.description ? { description: options.jsonSchema.description } : {}),
        ...(options.jsonSchema.strict !== undefined ? { strict: options.jsonSchema.strict } : {}),
      },
    };
  }
  if (typeof options.maxTokens === 'number' && Number.isFinite(options.maxTokens) && options.maxTokens > 0) {
    body.max_tokens = options.maxTokens;
  }
  if (typeof options.temperature === 'number' && Number.isFinite(options.temperature)) {
    body.temperature = options.temperature;
  }

  if (adapter.thinkingToggle === 'chat-template-kwargs') {
    body.chat_template_kwargs = {
      enable_thinking: options.enableThinking ?? false,
      clear_thinking: options.clearThinking ?? true,
    };
    if (body.tools) {
      body.parallel_tool_calls = true;
    }
  }

  return body;
}
