import { describe, it, expect } from 'vitest';
import {
  isValid,
  parseRequest,
  parseRequestsBatch,
  parseResponse,
  toNativeId,
  toNativeRequest,
  toNativeResponse,
} from './bridge.js';
import { ParseError } from './errors.js';
import { decodeRequest } from './request-decoder.js';
import { decodeResponse } from './response-decoder.js';
import { expectOk } from './testing/result-helpers.js';

describe('bridge', () => {
  describe('parseRequest', () => {
    it('returns a plain request object', () => {
      expect(parseRequest('{"jsonrpc":"2.0","id":1,"method":"tools/list"}')).toEqual({
        jsonrpc: '2.0',
        id: 1,
        method: 'tools/list',
        params: null,
      });
    });

    it('exposes params as a plain object', () => {
      const request = parseRequest('{"jsonrpc":"2.0","id":"abc","method":"tools/call","params":{"name":"get_posts"}}');
      expect(request.id).toBe('abc');
      expect(request.params).toEqual({ name: 'get_posts' });
    });

    it('throws ParseError naming the missing field', () => {
      expect(() => parseRequest('{"invalid": "json-rpc"}')).toThrow(ParseError);
      expect(() => parseRequest('{"jsonrpc":"2.0","id":1}')).toThrow('Missing required field: method');
    });

    it('throws ParseError for syntax errors', () => {
      let caught: unknown;
      try {
        parseRequest('not valid json');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      if (caught instanceof ParseError) {
        expect(caught.decodeError.kind).toBe('invalid_json');
        expect(caught.message.startsWith('Invalid JSON: ')).toBe(true);
      }
    });
  });

  describe('parseResponse', () => {
    it('returns a plain response object', () => {
      expect(parseResponse('{"jsonrpc":"2.0","id":1,"result":{"tools":[]}}')).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: { tools: [] },
      });
    });

    it('maps a missing id to null', () => {
      expect(parseResponse('{"jsonrpc":"2.0","result":true}').id).toBeNull();
    });

    it('throws for a missing result', () => {
      expect(() => parseResponse('{"jsonrpc":"2.0","id":1}')).toThrow('Missing required field: result');
    });
  });

  describe('parseRequestsBatch', () => {
    it('parses every input in order', () => {
      const requests = parseRequestsBatch([
        '{"jsonrpc":"2.0","id":1,"method":"a"}',
        '{"jsonrpc":"2.0","id":2,"method":"b"}',
      ]);
      expect(requests.map(r => r.method)).toEqual(['a', 'b']);
    });

    it('throws for the first invalid input', () => {
      expect(() =>
        parseRequestsBatch([
          '{"jsonrpc":"2.0","id":1,"method":"a"}',
          '{"jsonrpc":"1.0","id":2,"method":"b"}',
          '{"jsonrpc":"2.0","method":"c"}',
        ])
      ).toThrow("Invalid JSON-RPC version: expected '2.0', got '1.0'");
    });
  });

  describe('native projections', () => {
    it('gives the caller its own params object', () => {
      const request = expectOk(decodeRequest('{"jsonrpc":"2.0","id":1,"method":"m","params":{"a":{"b":1}}}'));
      const native = toNativeRequest(request);

      native.params = native.params ?? {};
      native.params.a = 'changed';

      expect(request.params).toEqual({ a: { b: 1 } });
      expect(toNativeRequest(request).params).toEqual({ a: { b: 1 } });
    });

    it('gives the caller its own result value', () => {
      const response = expectOk(decodeResponse('{"jsonrpc":"2.0","id":1,"result":{"items":[1]}}'));
      const native = toNativeResponse(response);
      const { result } = native;

      if (typeof result === 'object' && result !== null && !Array.isArray(result)) {
        result.items = [];
      }

      expect(response.result).toEqual({ items: [1] });
    });
  });

  it('toNativeId maps each identifier kind', () => {
    expect(toNativeId({ kind: 'string', value: 's' })).toBe('s');
    expect(toNativeId({ kind: 'number', value: 3 })).toBe(3);
    expect(toNativeId({ kind: 'number', value: 9223372036854775807n })).toBe(9223372036854775807n);
    expect(toNativeId({ kind: 'null' })).toBeNull();
  });

  it('isValid delegates to the fast filter', () => {
    expect(isValid('{"jsonrpc":"2.0","id":1,"method":"tools/list"}')).toBe(true);
    expect(isValid('{"id":1,"method":"test"}')).toBe(false);
  });
});
