import type { JsonContainer, JsonValue } from '@streamnorm/shared';

import { IncompleteJsonError, MalformedJsonError } from './errors';

export interface PartialJsonOptions {
  /**
   * Keep an unterminated string value, cut at its last complete character.
   * When false the whole value is dropped until its closing quote arrives.
   */
  partialStrings?: boolean;
  /** Value returned for empty or whitespace-only input. */
  emptyValue?: 'object' | 'array';
}

export interface PartialJsonResult {
  value: JsonContainer;
  /** True only when the input closed its top-level container. */
  complete: boolean;
  /** Offset up to which the returned value accounts for the input. */
  validLength: number;
}

type JsonObject = { [key: string]: JsonValue };

type Frame =
  | {
      kind: 'object';
      value: JsonObject;
      state: 'keyOrEnd' | 'key' | 'colon' | 'value' | 'commaOrEnd';
      key: string;
    }
  | {
      kind: 'array';
      value: JsonValue[];
      state: 'valueOrEnd' | 'value' | 'commaOrEnd';
    };

type StringScan =
  | { closed: true; value: string; end: number }
  | { closed: false; value: string; safeEnd: number };

type TokenScan = { done: true; value: JsonValue; end: number } | { done: false };

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

const LITERALS: Record<string, JsonValue> = {
  true: true,
  false: false,
  null: null,
};

const NUMBER_PATTERN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const HEX_DIGIT = /^[0-9a-fA-F]$/;

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t';
}

function isNumberChar(ch: string): boolean {
  return (ch >= '0' && ch <= '9') || ch === '-' || ch === '+' || ch === '.' || ch === 'e' || ch === 'E';
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function setProperty(target: JsonObject, key: string, value: JsonValue): void {
  if (key === '__proto__') {
    Object.defineProperty(target, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
    return;
  }
  target[key] = value;
}

function scanString(text: string, start: number): StringScan {
  let value = '';
  // Offset where a trailing high surrogate started; it is dropped if the text ends there.
  let pendingHighStart = -1;
  let pos = start + 1;

  const truncated = (safeEnd: number): StringScan => {
    if (pendingHighStart >= 0) {
      return { closed: false, value: value.slice(0, -1), safeEnd: pendingHighStart };
    }
    return { closed: false, value, safeEnd };
  };

  while (pos < text.length) {
    const ch = text.charAt(pos);

    if (ch === '"') {
      return { closed: true, value, end: pos + 1 };
    }

    if (ch === '\\') {
      if (pos + 1 >= text.length) {
        return truncated(pos);
      }
      const escape = text.charAt(pos + 1);
      const simple = SIMPLE_ESCAPES[escape];
      if (simple !== undefined) {
        value += simple;
        pendingHighStart = -1;
        pos += 2;
        continue;
      }
      if (escape !== 'u') {
        throw new MalformedJsonError(`Invalid escape sequence \\${escape}`, pos);
      }
      const hex = text.slice(pos + 2, pos + 6);
      for (let i = 0; i < hex.length; i += 1) {
        if (!HEX_DIGIT.test(hex.charAt(i))) {
          throw new MalformedJsonError('Invalid unicode escape', pos);
        }
      }
      if (hex.length < 4) {
        return truncated(pos);
      }
      const code = Number.parseInt(hex, 16);
      value += String.fromCharCode(code);
      pendingHighStart = isHighSurrogate(code) ? pos : -1;
      pos += 6;
      continue;
    }

    const code = ch.charCodeAt(0);
    if (code < 0x20) {
      throw new MalformedJsonError('Unescaped control character in string', pos);
    }
    value += ch;
    pendingHighStart = isHighSurrogate(code) ? pos : -1;
    pos += 1;
  }

  return truncated(pos);
}

function scanNumber(text: string, start: number): TokenScan {
  let end = start;
  while (end < text.length && isNumberChar(text.charAt(end))) {
    end += 1;
  }
  if (end >= text.length) {
    // More digits may follow.
    return { done: false };
  }
  const token = text.slice(start, end);
  if (!NUMBER_PATTERN.test(token)) {
    throw new MalformedJsonError(`Invalid number ${token}`, start);
  }
  return { done: true, value: Number(token), end };
}

function scanLiteral(text: string, start: number): TokenScan {
  let end = start;
  while (end < text.length && /[a-z]/.test(text.charAt(end))) {
    end += 1;
  }
  const word = text.slice(start, end);
  if (Object.prototype.hasOwnProperty.call(LITERALS, word)) {
    return { done: true, value: LITERALS[word] ?? null, end };
  }
  if (end >= text.length && Object.keys(LITERALS).some((literal) => literal.startsWith(word))) {
    return { done: false };
  }
  throw new MalformedJsonError(`Unexpected token ${word || text.charAt(start)}`, start);
}

class PartialJsonScanner {
  private readonly stack: Frame[] = [];

  private root: JsonContainer | undefined;

  private rootClosed = false;

  private validLength = 0;

  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly options: PartialJsonOptions,
  ) {}

  run(): PartialJsonResult {
    const { text } = this;

    while (this.pos < text.length) {
      const ch = text.charAt(this.pos);
      if (isWhitespace(ch)) {
        this.pos += 1;
        continue;
      }
      if (this.rootClosed) {
        throw new MalformedJsonError('Unexpected content after top-level value', this.pos);
      }

      const frame = this.stack[this.stack.length - 1];
      if (!frame) {
        if (ch !== '{' && ch !== '[') {
          throw new MalformedJsonError('Top-level value must be an object or array', this.pos);
        }
        this.openContainer(ch);
        continue;
      }

      const keepGoing = frame.kind === 'object' ? this.stepObject(frame, ch) : this.stepArray(frame, ch);
      if (!keepGoing) {
        break;
      }
    }

    return this.result();
  }

  private result(): PartialJsonResult {
    const empty: JsonContainer = this.options.emptyValue === 'array' ? [] : {};
    return {
      value: this.root ?? empty,
      complete: this.rootClosed,
      validLength: this.validLength,
    };
  }

  private stepObject(frame: Extract<Frame, { kind: 'object' }>, ch: string): boolean {
    switch (frame.state) {
      case 'keyOrEnd':
      case 'key': {
        if (ch === '}') {
          if (frame.state === 'key') {
            throw new MalformedJsonError('Trailing comma in object', this.pos);
          }
          this.closeContainer();
          return true;
        }
        if (ch !== '"') {
          throw new MalformedJsonError('Expected object key', this.pos);
        }
        const scan = scanString(this.text, this.pos);
        if (!scan.closed) {
          // A partial key is never exposed.
          this.pos = this.text.length;
          return false;
        }
        frame.key = scan.value;
        frame.state = 'colon';
        this.pos = scan.end;
        return true;
      }
      case 'colon':
        if (ch !== ':') {
          throw new MalformedJsonError("Expected ':' after object key", this.pos);
        }
        frame.state = 'value';
        this.pos += 1;
        return true;
      case 'value':
        return this.readValue(ch);
      case 'commaOrEnd':
        if (ch === ',') {
          frame.state = 'key';
          this.pos += 1;
          return true;
        }
        if (ch === '}') {
          this.closeContainer();
          return true;
        }
        throw new MalformedJsonError("Expected ',' or '}'", this.pos);
    }
  }

  private stepArray(frame: Extract<Frame, { kind: 'array' }>, ch: string): boolean {
    switch (frame.state) {
      case 'valueOrEnd':
      case 'value':
        if (ch === ']') {
          if (frame.state === 'value') {
            throw new MalformedJsonError('Trailing comma in array', this.pos);
          }
          this.closeContainer();
          return true;
        }
        return this.readValue(ch);
      case 'commaOrEnd':
        if (ch === ',') {
          frame.state = 'value';
          this.pos += 1;
          return true;
        }
        if (ch === ']') {
          this.closeContainer();
          return true;
        }
        throw new MalformedJsonError("Expected ',' or ']'", this.pos);
    }
  }

  /**
   * Reads one value in value position. Returns false when the input ends
   * inside the value.
   */
  private readValue(ch: string): boolean {
    if (ch === '{' || ch === '[') {
      this.openContainer(ch);
      return true;
    }

    if (ch === '"') {
      const scan = scanString(this.text, this.pos);
      if (scan.closed) {
        this.attach(scan.value);
        this.pos = scan.end;
        this.validLength = scan.end;
        return true;
      }
      if (this.options.partialStrings ?? true) {
        this.attach(scan.value);
        this.validLength = scan.safeEnd;
      }
      this.pos = this.text.length;
      return false;
    }

    let scan: TokenScan;
    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      scan = scanNumber(this.text, this.pos);
    } else if (ch === '}' || ch === ']') {
      throw new MalformedJsonError(`Unexpected '${ch}' where a value was expected`, this.pos);
    } else {
      scan = scanLiteral(this.text, this.pos);
    }

    if (!scan.done) {
      this.pos = this.text.length;
      return false;
    }
    this.attach(scan.value);
    this.pos = scan.end;
    this.validLength = scan.end;
    return true;
  }

  private attach(value: JsonValue): void {
    const parent = this.stack[this.stack.length - 1];
    if (!parent) {
      return;
    }
    if (parent.kind === 'object') {
      setProperty(parent.value, parent.key, value);
    } else {
      parent.value.push(value);
    }
    parent.state = 'commaOrEnd';
  }

  private openContainer(ch: '{' | '['): void {
    let frame: Frame;
    if (ch === '{') {
      frame = { kind: 'object', value: {}, state: 'keyOrEnd', key: '' };
    } else {
      frame = { kind: 'array', value: [], state: 'valueOrEnd' };
    }

    if (this.stack.length === 0) {
      this.root = frame.value;
    } else {
      this.attach(frame.value);
    }
    this.stack.push(frame);
    this.pos += 1;
    this.validLength = this.pos;
  }

  private closeContainer(): void {
    this.stack.pop();
    this.pos += 1;
    this.validLength = this.pos;
    if (this.stack.length === 0) {
      this.rootClosed = true;
    }
  }
}

/**
 * Parses a prefix of a JSON object or array, closing whatever is still open.
 * Throws MalformedJsonError only for errors that truncation cannot explain.
 */
export function parsePartialJson(text: string, options: PartialJsonOptions = {}): PartialJsonResult {
  return new PartialJsonScanner(text, options).run();
}

/**
 * Strict parse of a complete document. Whitespace-only text is an empty
 * argument object.
 */
export function parseCompleteJson(text: string): JsonContainer {
  if (text.trim().length === 0) {
    return {};
  }
  const result = parsePartialJson(text);
  if (!result.complete) {
    throw new IncompleteJsonError(
      `JSON text ends before its top-level value is closed (valid up to offset ${result.validLength})`,
    );
  }
  return result.value;
}

export function jsonEquals(left: JsonValue | undefined, right: JsonValue | undefined): boolean {
  if (left === right) {
    return true;
  }
  if (left === undefined || right === undefined || left === null || right === null) {
    return false;
  }
  if (typeof left !== 'object' || typeof right !== 'object') {
    return false;
  }
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
      return false;
    }
    return left.every((item, index) => jsonEquals(item, right[index]));
  }
  const leftKeys = Object.keys(left);
  if (leftKeys.length !== Object.keys(right).length) {
    return false;
  }
  return leftKeys.every(
    (key) => Object.prototype.hasOwnProperty.call(right, key) && jsonEquals(left[key], right[key]),
  );
}
