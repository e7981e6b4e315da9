import OpenAI from 'openai';
import type { ChatCompletionMessageParam, ChatCompletionTool } from 'openai/resources/chat/completions';
import type { EmbeddingCreateParams } from 'openai/resources/embeddings';

import type { NormalizedEvent } from '@streamnorm/shared';
import {
  noopLogger,
  normalizeStream,
  processRequest,
  resolveModelAdapter,
  type Logger,
  type ModelAdapterSpec,
  type ModelFamily,
  type NormalizeOptions,
} from '@streamnorm/stream-core';

import type { ModelConfig } from './config';
import { isLlmClientError, LlmClientError } from './errors';
import { buildChatRequest, type ChatRequestBody, type JsonSchemaFormat } from './requestParams';

/**
 * The provider calls the client makes. `createOpenAiTransport` backs it with
 * the OpenAI SDK.
 */
export interface ChatCompletionTransport {
  streamChat(body: ChatRequestBody, signal?: AbortSignal): Promise<AsyncIterable<unknown>>;
  completeChat(body: ChatRequestBody, signal?: AbortSignal): Promise<unknown>;
  /** `extraBody` carries provider fields the SDK does not know, such as images. */
  embed(model: string, input: string[], extraBody?: Record<string, unknown>): Promise<number[][]>;
}

export function createOpenAiTransport(client: OpenAI): ChatCompletionTransport {
  return {
    streamChat: async (body, signal) =>
      client.chat.completions.create({ ...body, stream: true }, { signal }),
    completeChat: async (body, signal) =>
      client.chat.completions.create({ ...body, stream: false }, { signal }),
    embed: async (model, input, extraBody) => {
      const body: EmbeddingCreateParams = { model, input, encoding_format: 'float' };
      // The request option body replaces the typed body, so extra fields reach the server.
      const response = await client.embeddings.create(
        body,
        extraBody ? { body: { ...extraBody, ...body } } : undefined,
      );
      return [...response.data].sort((left, right) => left.index - right.index).map((item) => item.embedding);
    },
  };
}

export interface LlmClientOptions {
  /** Model id sent to the provider. */
  model: string;
  /** Name used in log lines. Defaults to the model id. */
  label?: string;
  adapter?: ModelFamily;
  maxTokens?: number;
  temperature?: number;
  transport: ChatCompletionTransport;
  logger?: Logger;
}

export interface ChatCallOptions {
  tools?: ChatCompletionTool[];
  jsonSchema?: JsonSchemaFormat;
  maxTokens?: number;
  temperature?: number;
  enableThinking?: boolean;
  clearThinking?: boolean;
  keepThinking?: boolean;
  includeThinking?: boolean;
  partialToolArguments?: boolean;
  signal?: AbortSignal;
}

/**
 * One configured model. Every call yields normalized events, streamed or not.
 */
export class LlmClient {
  readonly adapter: Readonly<ModelAdapterSpec>;

  private readonly logger: Logger;

  constructor(private readonly options: LlmClientOptions) {
    this.adapter = resolveModelAdapter(options.model, options.adapter);
    this.logger = options.logger ?? noopLogger;
  }

  static fromConfig(config: ModelConfig, logger?: Logger): LlmClient {
    const openai = new OpenAI({
      apiKey: config.apiKey || 'sk-no-api-key',
      baseURL: config.apiBase,
      ...(config.headers ? { defaultHeaders: config.headers } : {}),
    });
    return new LlmClient({
      model: config.name,
      label: config.callName,
      ...(config.adapter ? { adapter: config.adapter } : {}),
      ...(config.maxTokens !== undefined ? { maxTokens: config.maxTokens } : {}),
      ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
      transport: createOpenAiTransport(openai),
      ...(logger ? { logger } : {}),
    });
  }

  get modelName(): string {
    return this.options.model;
  }

  get label(): string {
    return this.options.label ?? this.options.model;
  }

  async *stream(
    messages: ChatCompletionMessageParam[],
    options: ChatCallOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const body = this.buildRequest(messages, options, true);

    let chunks: AsyncIterable<unknown>;
    try {
      chunks = await this.options.transport.streamChat(body, options.signal);
    } catch (err) {
      throw this.toClientError(err);
    }

    yield* normalizeStream(this.readChunks(chunks), this.normalizeOptions(options));
  }

  async complete(
    messages: ChatCompletionMessageParam[],
    options: ChatCallOptions = {},
  ): Promise<NormalizedEvent[]> {
    const body = this.buildRequest(messages, options, false);

    let response: unknown;
    try {
      response = await this.options.transport.completeChat(body, options.signal);
    } catch (err) {
      throw this.toClientError(err);
    }

    return [...processRequest({ ...this.normalizeOptions(options), kind: 'response', response })];
  }

  async embed(input: string | string[], extraBody?: Record<string, unknown>): Promise<number[][]> {
    const texts = typeof input === 'string' ? [input] : input;
    this.logger.debug?.(`[llm-client] ${this.label}: embedding ${texts.length} text(s)`);
    try {
      return await this.options.transport.embed(this.options.model, texts, extraBody);
    } catch (err) {
      throw this.toClientError(err);
    }
  }

  private buildRequest(
    messages: ChatCompletionMessageParam[],
    options: ChatCallOptions,
    stream: boolean,
  ): ChatRequestBody {
    const maxTokens = options.maxTokens ?? this.options.maxTokens;
    const temperature = options.temperature ?? this.options.temperature;
    const body = buildChatRequest(this.adapter, {
      model: this.options.model,
      messages,
      ...(options.tools ? { tools: options.tools } : {}),
      ...(options.jsonSchema ? { jsonSchema: options.jsonSchema } : {}),
      ...(maxTokens !== undefined ? { maxTokens } : {}),
      ...(temperature !== undefined ? { temperature } : {}),
      ...(options.enableThinking !== undefined ? { enableThinking: options.enableThinking } : {}),
      ...(options.clearThinking !== undefined ? { clearThinking: options.clearThinking } : {}),
    });
    this.logger.debug?.(
      `[llm-client] ${this.label}: model=${this.options.model}, stream=${stream}, thinking=${options.enableThinking ?? false}, adapter=${this.adapter.family}`,
    );
    return body;
  }

  private normalizeOptions(options: ChatCallOptions): NormalizeOptions {
    return {
      adapter: this.adapter,
      logger: this.logger,
      ...(options.keepThinking !== undefined ? { keepThinking: options.keepThinking } : {}),
      ...(options.includeThinking !== undefined ? { includeThinking: options.includeThinking } : {}),
      ...(options.partialToolArguments !== undefined
        ? { partialToolArguments: options.partialToolArguments }
        : {}),
    };
  }

  private async *readChunks(chunks: AsyncIterable<unknown>): AsyncGenerator<unknown, void, undefined> {
    try {
      for await (const chunk of chunks) {
        yield chunk;
      }
    } catch (err) {
      throw this.toClientError(err);
    }
  }

  private toClientError(err: unknown): LlmClientError {
    if (isLlmClientError(err)) {
      return err;
    }
    const detail = err instanceof Error ? err.message : String(err);
    this.logger.error(`[llm-client] ${this.label}: ${detail}`);
    return new LlmClientError('client_error', `LLM API error: ${detail}`, err);
  }
}
