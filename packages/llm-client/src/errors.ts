export type LlmClientErrorCode =
  | 'model_not_found'
  | 'client_error'
  | 'config_error'
  | 'stream_error'
  | 'replay_error';

export class LlmClientError extends Error {
  code: LlmClientErrorCode;
  details?: unknown;

  constructor(code: LlmClientErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'LlmClientError';
    this.code = code;
    this.details = details;
  }
}

export function isLlmClientError(err: unknown): err is LlmClientError {
  return err instanceof LlmClientError;
}
