/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Order-preserving JSON codec for index documents

import { APPLICATION_JSON, type Payload } from '@composer-index/shared';
import { ParseError } from '../errors';
import { describeJson, type JsonMap, type JsonValue } from './value';

const STRING_TOKEN = /"(?:[^"\\\u0000-\u001f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/y;
const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const WHITESPACE = /[ \t\n\r]*/y;
const INTEGER_TOKEN = /^-?\d+$/;
const MAX_DEPTH = 512;

class JsonReader {
  private pos = 0;
  private depth = 0;

  constructor(private readonly text: string) {}

  readDocument(): JsonValue {
    const value = this.readValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      this.fail('Unexpected trailing content');
    }
    return value;
  }

  private readValue(): JsonValue {
    this.skipWhitespace();
    const ch = this.text[this.pos];
    switch (ch) {
      case '{':
        return this.readObject();
      case '[':
        return this.readArray();
      case '"':
        return this.readString();
      case 't':
        return this.readLiteral('true', true);
      case 'f':
        return this.readLiteral('false', false);
      case 'n':
        return this.readLiteral('null', null);
      default:
        if (ch === '-' || (ch !== undefined && ch >= '0' && ch <= '9')) {
          return this.readNumber();
        }
        return this.fail(ch === undefined ? 'Unexpected end of input' : `Unexpected character "${ch}"`);
    }
  }

  private readObject(): JsonMap {
    const result: JsonMap = new Map();
    this.enter();
    this.skipWhitespace();
    if (this.text[this.pos] === '}') {
      this.leave();
      return result;
    }

    for (;;) {
      this.skipWhitespace();
      if (this.text[this.pos] !== '"') {
        this.fail('Expected object key');
      }
      const key = this.readString();
      this.skipWhitespace();
      this.expect(':');
      result.set(key, this.readValue());
      this.skipWhitespace();

      const next = this.text[this.pos];
      if (next === '}') {
        this.leave();
        return result;
      }
      this.pos++;
      if (next !== ',') this.fail('Expected "," or "}" in object', this.pos - 1);
    }
  }

  private readArray(): JsonValue[] {
    const result: JsonValue[] = [];
    this.enter();
    this.skipWhitespace();
    if (this.text[this.pos] === ']') {
      this.leave();
      return result;
    }

    for (;;) {
      result.push(this.readValue());
      this.skipWhitespace();

      const next = this.text[this.pos];
      if (next === ']') {
        this.leave();
        return result;
      }
      this.pos++;
      if (next !== ',') this.fail('Expected "," or "]" in array', this.pos - 1);
    }
  }

  private readString(): string {
    const token = this.match(STRING_TOKEN, 'Invalid string');
    // Token is a validated JSON string literal, JSON.parse only decodes escapes
    const decoded: unknown = JSON.parse(token);
    return String(decoded);
  }

  /**
   * Integers outside the safe range stay exact as bigint
   */
  private readNumber(): number | bigint {
    const token = this.match(NUMBER_TOKEN, 'Invalid number');
    const value = Number(token);
    if (INTEGER_TOKEN.test(token) && !Number.isSafeInteger(value)) {
      return BigInt(token);
    }
    return value;
  }

  private enter(): void {
    if (this.depth >= MAX_DEPTH) {
      this.fail('Maximum nesting depth exceeded');
    }
    this.depth++;
    this.pos++;
  }

  private leave(): void {
    this.depth--;
    this.pos++;
  }

  private readLiteral<T extends JsonValue>(literal: string, value: T): T {
    if (!this.text.startsWith(literal, this.pos)) {
      this.fail(`Invalid literal, expected "${literal}"`);
    }
    this.pos += literal.length;
    return value;
  }

  private match(pattern: RegExp, message: string): string {
    pattern.lastIndex = this.pos;
    const found = pattern.exec(this.text);
    if (!found) {
      this.fail(message);
    }
    this.pos += found[0].length;
    return found[0];
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      this.fail(`Expected "${ch}"`);
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    WHITESPACE.lastIndex = this.pos;
    const found = WHITESPACE.exec(this.text);
    if (found) {
      this.pos += found[0].length;
    }
  }

  private fail(message: string, at: number = this.pos): never {
    throw new ParseError(`${message} at position ${at}`);
  }
}

function payloadText(input: Payload | string | Uint8Array): string {
  if (typeof input === 'string') {
    return input.replace(/^\uFEFF/, '');
  }
  if (input instanceof Uint8Array) {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(input);
    } catch (error) {
      throw new ParseError('Payload is not valid UTF-8', { cause: error });
    }
    return text.replace(/^\uFEFF/, '');
  }
  return payloadText(input.body);
}

/**
 * Parse any JSON text into an order-preserving tree
 */
export function parseJson(input: Payload | string | Uint8Array): JsonValue {
  return new JsonReader(payloadText(input)).readDocument();
}

/**
 * Parse an index document; the root must be a JSON object
 */
export function parseDocument(input: Payload | string | Uint8Array): JsonMap {
  const value = parseJson(input);
  if (!(value instanceof Map)) {
    throw new ParseError(`Document root must be an object, found ${describeJson(value)}`);
  }
  return value;
}

function writeValue(value: JsonValue): string {
  if (value instanceof Map) {
    const members: string[] = [];
    for (const [key, entry] of value) {
      members.push(`${JSON.stringify(key)}:${writeValue(entry)}`);
    }
    return `{${members.join(',')}}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(writeValue).join(',')}]`;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return JSON.stringify(value);
}

/**
 * Serialize a tree to compact JSON, keys in insertion order
 */
export function serializeDocument(document: JsonValue): string {
  return writeValue(document);
}

export function toPayload(document: JsonValue, contentType: string = APPLICATION_JSON): Payload {
  return { body: serializeDocument(document), contentType };
}
