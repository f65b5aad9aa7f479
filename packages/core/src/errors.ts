/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

export type ComposerIndexErrorCode =
  | 'parse_error'
  | 'type_mismatch'
  | 'malformed_name'
  | 'extraction_failure'
  | 'not_found';

/**
 * Base class for every failure raised while processing index documents
 */
export class ComposerIndexError extends Error {
  readonly code: ComposerIndexErrorCode;

  constructor(code: ComposerIndexErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ComposerIndexError';
    this.code = code;
  }
}

/**
 * Payload is not well-formed JSON, or its root is not an object
 */
export class ParseError extends ComposerIndexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse_error', message, options);
    this.name = 'ParseError';
  }
}

export class TypeMismatchError extends ComposerIndexError {
  readonly path: string;
  readonly expected: string;

  constructor(path: string, expected: string, actual: string) {
    super('type_mismatch', `Expected ${expected} at "${path}", found ${actual}`);
    this.name = 'TypeMismatchError';
    this.path = path;
    this.expected = expected;
  }
}

/**
 * Package name is not exactly `vendor/project`
 */
export class MalformedNameError extends ComposerIndexError {
  readonly packageName: string;

  constructor(packageName: string) {
    super('malformed_name', `Malformed package name "${packageName}", expected "vendor/project"`);
    this.name = 'MalformedNameError';
    this.packageName = packageName;
  }
}

export class ExtractionError extends ComposerIndexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction_failure', message, options);
    this.name = 'ExtractionError';
  }
}

export class NotFoundError extends ComposerIndexError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
