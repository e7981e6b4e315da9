import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import { isTerminalEvent, type CompletePayload, type NormalizedEvent } from '@streamnorm/shared';
import { noopLogger, type Logger } from '@streamnorm/stream-core';

import { loadModelsConfig, type ModelConfig, type ModelsConfig } from './config';
import { multimodalExtraBody, readMultimodalInput, type MultimodalBlock } from './embeddingInput';
import { isLlmClientError, LlmClientError } from './errors';
import { LlmClient, type ChatCallOptions, type ChatCompletionTransport } from './llmClient';

/** Call name the embedding helpers use when none is given and one is configured. */
export const DEFAULT_EMBEDDING_MODEL = 'embedding';

export interface LlmHandlerOptions {
  logger?: Logger;
  /** Builds the transport for a model. Defaults to an OpenAI SDK client. */
  createTransport?: (model: ModelConfig) => ChatCompletionTransport;
}

/** Outcome of one batch item; a failed item does not stop the others. */
export type BatchResult<T> = { ok: true; value: T } | { ok: false; error: LlmClientError };

export interface HandlerCallOptions extends ChatCallOptions {
  /** Call name of the model. Defaults to the handler's default model. */
  model?: string;
}

/**
 * Entry point over every configured model, addressed by call name.
 */
export class LlmHandler {
  private readonly clients = new Map<string, LlmClient>();

  readonly defaultModel: string;

  private readonly logger: Logger;

  constructor(config: ModelsConfig, options: LlmHandlerOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    const { createTransport } = options;

    for (const model of config.models) {
      const client = createTransport
        ? new LlmClient({
            model: model.name,
            label: model.callName,
            ...(model.adapter ? { adapter: model.adapter } : {}),
            ...(model.maxTokens !== undefined ? { maxTokens: model.maxTokens } : {}),
            ...(model.temperature !== undefined ? { temperature: model.temperature } : {}),
            transport: createTransport(model),
            logger: this.logger,
          })
        : LlmClient.fromConfig(model, this.logger);
      this.clients.set(model.callName, client);
    }

    const first = config.models[0];
    if (!first) {
      throw new LlmClientError('config_error', 'At least one model must be configured');
    }
    this.defaultModel = config.defaultModel ?? first.callName;

    this.logger.info(
      `[llm-handler] initialized with ${this.clients.size} models, default=${this.defaultModel}`,
    );
  }

  static fromFile(configPath: string, options: LlmHandlerOptions = {}): LlmHandler {
    return new LlmHandler(loadModelsConfig(configPath), options);
  }

  get modelNames(): string[] {
    return [...this.clients.keys()];
  }

  getClient(callName?: string): LlmClient {
    const name = callName ?? this.defaultModel;
    const client = this.clients.get(name);
    if (!client) {
      throw new LlmClientError('model_not_found', `Unknown model call name: ${name}`);
    }
    return client;
  }

  stream(
    messages: ChatCompletionMessageParam[],
    options: HandlerCallOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const client = this.getClient(options.model);
    this.logger.debug?.(`[llm-handler] streaming chat, model=${client.label}`);
    return client.stream(messages, options);
  }

  /**
   * Non-streaming call. Resolves with the `complete` payload; a terminal error
   * event rejects with a `stream_error`.
   */
  async complete(
    messages: ChatCompletionMessageParam[],
    options: HandlerCallOptions = {},
  ): Promise<CompletePayload> {
    const client = this.getClient(options.model);
    this.logger.debug?.(`[llm-handler] non-streaming chat, model=${client.label}`);
    const events = await client.complete(messages, options);

    const terminal = events.find(isTerminalEvent);
    if (!terminal) {
      throw new LlmClientError('stream_error', 'Response ended without a terminal event');
    }
    if (terminal.type === 'error') {
      throw new LlmClientError(
        'stream_error',
        `${terminal.payload.kind}: ${terminal.payload.message}`,
        terminal.payload,
      );
    }
    return terminal.payload;
  }

  /**
   * Runs requests one after another. Results keep the input order; an unknown
   * model rejects before any request is sent.
   */
  async completeBatch(
    messagesList: ChatCompletionMessageParam[][],
    options: HandlerCallOptions = {},
  ): Promise<BatchResult<CompletePayload>[]> {
    this.getClient(options.model);
    this.logger.debug?.(`[llm-handler] batch of ${messagesList.length} requests`);

    const results: BatchResult<CompletePayload>[] = [];
    for (const [index, messages] of messagesList.entries()) {
      try {
        results.push({ ok: true, value: await this.complete(messages, options) });
      } catch (err) {
        results.push(this.batchFailure(`batch request ${index}`, err));
      }
    }
    return results;
  }

  async embedText(text: string, model?: string): Promise<number[]> {
    return firstVector(await this.embeddingClient(model).embed([text]));
  }

  async embedTexts(texts: string[], model?: string): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return this.embeddingClient(model).embed(texts);
  }

  /** Embeds the text parts and images of one message as a single vector. */
  async embedMultimodal(block: MultimodalBlock, model?: string): Promise<number[]> {
    const client = this.embeddingClient(model);
    const input = readMultimodalInput(block);
    this.logger.debug?.(
      `[llm-handler] multimodal embedding, text_len=${input.text.length}, images=${input.images.length}`,
    );
    return firstVector(await client.embed([input.text], multimodalExtraBody(input)));
  }

  async embedMultimodalBatch(
    blocks: MultimodalBlock[],
    model?: string,
  ): Promise<BatchResult<number[]>[]> {
    this.embeddingClient(model);
    this.logger.debug?.(`[llm-handler] batch of ${blocks.length} multimodal embeddings`);

    const results: BatchResult<number[]>[] = [];
    for (const [index, block] of blocks.entries()) {
      try {
        results.push({ ok: true, value: await this.embedMultimodal(block, model) });
      } catch (err) {
        results.push(this.batchFailure(`multimodal embedding ${index}`, err));
      }
    }
    return results;
  }

  private batchFailure(item: string, err: unknown): { ok: false; error: LlmClientError } {
    const error = isLlmClientError(err)
      ? err
      : new LlmClientError('client_error', err instanceof Error ? err.message : String(err), err);
    this.logger.error(`[llm-handler] ${item} failed: ${error.message}`);
    return { ok: false, error };
  }

  private embeddingClient(model?: string): LlmClient {
    if (model !== undefined) {
      return this.getClient(model);
    }
    return this.getClient(
      this.clients.has(DEFAULT_EMBEDDING_MODEL) ? DEFAULT_EMBEDDING_MODEL : this.defaultModel,
    );
  }
}

function firstVector(vectors: number[][]): number[] {
  const [vector] = vectors;
  if (!vector) {
    throw new LlmClientError('client_error', 'Embedding response contained no vectors');
  }
  return vector;
}
