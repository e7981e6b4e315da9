import type { ErrorKind } from '@streamnorm/shared';

export class NormalizerError extends Error {
  kind: ErrorKind;
  index?: number;

  constructor(kind: ErrorKind, message: string, index?: number) {
    super(message);
    this.name = kind;
    this.kind = kind;
    if (index !== undefined) {
      this.index = index;
    }
  }
}

export class MalformedJsonError extends NormalizerError {
  /** Offset of the offending character in the parsed text. */
  offset: number;

  constructor(message: string, offset: number) {
    super('MalformedJsonError', `${message} at offset ${offset}`);
    this.offset = offset;
  }
}

/**
 * Raised by the strict parser when the text is a valid prefix but not a
 * complete JSON document.
 */
export class IncompleteJsonError extends NormalizerError {
  constructor(message: string) {
    super('IncompleteToolCallArguments', message);
  }
}

export class ProtocolViolationError extends NormalizerError {
  constructor(message: string, index?: number) {
    super('ProtocolViolation', message, index);
  }
}

export function isNormalizerError(err: unknown): err is NormalizerError {
  return err instanceof NormalizerError;
}
