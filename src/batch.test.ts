import { describe, it, expect } from 'vitest';
import { decodeRequestBatch } from './batch.js';
import { FIELD } from './constants.js';

const valid = [
  '{"jsonrpc":"2.0","id":1,"method":"initialize"}',
  '{"jsonrpc":"2.0","id":"two","method":"tools/list"}',
  '{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"get_posts"}}',
];

describe('decodeRequestBatch', () => {
  it('returns every request in input order', () => {
    const result = decodeRequestBatch(valid);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(r => r.method)).toEqual(['initialize', 'tools/list', 'tools/call']);
    expect(result.value.map(r => r.id)).toEqual([
      { kind: 'number', value: 1 },
      { kind: 'string', value: 'two' },
      { kind: 'number', value: 3 },
    ]);
  });

  it('returns an empty list for no inputs', () => {
    expect(decodeRequestBatch([])).toEqual({ ok: true, value: [] });
  });

  it('reports the first failure in order with its index', () => {
    const inputs = [
      valid[0],
      '{"jsonrpc":"2.0","id":2}',
      'not json',
      valid[1],
    ];

    expect(decodeRequestBatch(inputs)).toEqual({
      ok: false,
      error: { kind: 'missing_field', field: FIELD.METHOD },
      index: 1,
    });
  });

  it('stops consuming inputs after the first failure', () => {
    const consumed: number[] = [];
    function* inputs(): Generator<string> {
      for (let i = 0; i < 5; i++) {
        consumed.push(i);
        yield i === 2 ? '{"jsonrpc":"1.0","id":2,"method":"m"}' : `{"jsonrpc":"2.0","id":${i},"method":"m"}`;
      }
    }

    const result = decodeRequestBatch(inputs());

    expect(result).toEqual({ ok: false, error: { kind: 'invalid_version', found: '1.0' }, index: 2 });
    expect(consumed).toEqual([0, 1, 2]);
  });
});
