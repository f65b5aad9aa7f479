/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { describe, it, expect } from 'vitest';
import { parseDocument, parseJson, serializeDocument, toPayload } from '../json/codec';
import { expectMap, expectString, optionalMap, optionalString, toPlain } from '../json/value';
import { ParseError, TypeMismatchError } from '../errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('Document Codec', () => {
  describe('parseDocument', () => {
    it('should parse nested objects, arrays and scalars', () => {
      const doc = parseDocument('{"a":{"b":[1,2.5,-3e2,"x",true,false,null]}}');
      expect(toPlain(doc)).toEqual({ a: { b: [1, 2.5, -300, 'x', true, false, null] } });
    });

    it('should keep integer-like keys in document order', () => {
      const doc = parseDocument('{"2.0.0":1,"10":2,"1":3}');
      expect([...doc.keys()]).toEqual(['2.0.0', '10', '1']);
    });

    it('should decode string escapes', () => {
      const doc = parseDocument('{"ns":"Vendor\\\\Package\\\\","u":"\\u00e9\\n"}');
      expect(doc.get('ns')).toBe('Vendor\\Package\\');
      expect(doc.get('u')).toBe('é\n');
    });

    it('should accept a UTF-8 byte payload', () => {
      const body = new TextEncoder().encode('{"name":"acme/widget"}');
      const doc = parseDocument({ body, contentType: 'application/json' });
      expect(doc.get('name')).toBe('acme/widget');
    });

    it('should tolerate surrounding whitespace and a byte order mark', () => {
      const doc = parseDocument('\uFEFF \n {"a" : [ ] , "b" : { } } \n');
      expect(toPlain(doc)).toEqual({ a: [], b: {} });
    });

    it('should keep the last value for a repeated key at its first position', () => {
      const doc = parseDocument('{"a":1,"b":2,"a":3}');
      expect(serializeDocument(doc)).toBe('{"a":3,"b":2}');
    });

    it('should reject a non-object root', () => {
      expect(() => parseDocument('[1,2]')).toThrow(ParseError);
      expect(() => parseDocument('"text"')).toThrow('Document root must be an object, found string');
    });

    it('should reject malformed JSON', () => {
      expect(() => parseDocument('')).toThrow('Unexpected end of input at position 0');
      expect(() => parseDocument('{"a":1,}')).toThrow('Expected object key at position 7');
      expect(() => parseDocument('{"a":1} x')).toThrow('Unexpected trailing content at position 8');
      expect(() => parseDocument('{"a":tru}')).toThrow(ParseError);
      expect(() => parseDocument('{"a":01}')).toThrow(ParseError);
      expect(() => parseDocument('{"a":"\tb"}')).toThrow('Invalid string at position 5');
    });

    it('should parse scalar roots through parseJson', () => {
      expect(parseJson('42')).toBe(42);
      expect(parseJson('null')).toBeNull();
    });

    it('should reject bytes that are not valid UTF-8', () => {
      const encoder = new TextEncoder();
      const body = new Uint8Array([...encoder.encode('{"a":"'), 0xff, 0xfe, ...encoder.encode('"}')]);
      expect(() => parseDocument({ body, contentType: 'application/json' })).toThrow(
        'Payload is not valid UTF-8'
      );
      expect(() => parseDocument(body)).toThrow(ParseError);
    });

    it('should stop at the maximum nesting depth', () => {
      const nested = (arrays: number) => `{"extra":${'['.repeat(arrays)}${']'.repeat(arrays)}}`;

      expect(serializeDocument(parseDocument(nested(511)))).toBe(nested(511));

      const error = captureError(() => parseDocument(nested(20000)));
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError && error.message).toBe(
        'Maximum nesting depth exceeded at position 520'
      );
    });

    it('should keep integers beyond the safe range exact', () => {
      const text = '{"extra":{"id":9007199254740993,"neg":-9007199254740993,"max":9007199254740991,"f":-2.5}}';
      const extra = expectMap(parseDocument(text).get('extra'), 'extra');

      expect(extra.get('id')).toBe(9007199254740993n);
      expect(extra.get('neg')).toBe(-9007199254740993n);
      expect(extra.get('max')).toBe(9007199254740991);
      expect(serializeDocument(parseDocument(text))).toBe(text);
    });
  });

  describe('serializeDocument', () => {
    it('should write compact JSON in insertion order', () => {
      const doc = parseDocument('{ "z": 1, "a": { "y": null, "b": ["s", 2] } }');
      doc.set('m', 'new');
      expect(serializeDocument(doc)).toBe('{"z":1,"a":{"y":null,"b":["s",2]},"m":"new"}');
    });

    it('should escape strings', () => {
      const doc = parseDocument('{"q":"say \\"hi\\""}');
      expect(serializeDocument(doc)).toBe('{"q":"say \\"hi\\""}');
    });

    it('should wrap a document as an application/json payload', () => {
      const payload = toPayload(parseDocument('{"a":1}'));
      expect(payload).toEqual({ body: '{"a":1}', contentType: 'application/json' });
    });

    it('should keep a given content type', () => {
      const payload = toPayload(parseDocument('{}'), 'application/vnd.custom+json');
      expect(payload.contentType).toBe('application/vnd.custom+json');
    });
  });

  describe('accessors', () => {
    it('should report the path and shapes on mismatch', () => {
      const doc = parseDocument('{"packages":[]}');
      expect(() => expectMap(doc.get('packages'), 'packages')).toThrow(
        'Expected object at "packages", found array'
      );
      const error = captureError(() => expectString(doc.get('missing'), 'missing'));
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error instanceof TypeMismatchError && error.path).toBe('missing');
    });

    it('should treat null and absent values as optional', () => {
      const doc = parseDocument('{"a":null}');
      expect(optionalMap(doc.get('a'), 'a')).toBeUndefined();
      expect(optionalMap(doc.get('b'), 'b')).toBeUndefined();
      expect(optionalString(doc.get('a'), 'a')).toBeNull();
      expect(() => optionalString(parseDocument('{"a":1}').get('a'), 'a')).toThrow(TypeMismatchError);
    });
  });
});
