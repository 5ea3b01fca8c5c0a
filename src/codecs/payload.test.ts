import { describe, it, expect } from 'vitest';
import { thrownBy } from '../test-support/errors.js';
import { MAX_JSON_DEPTH, decodeJsonPayload, decodeTextPayload } from './payload.js';

describe('decodeTextPayload', () => {
  it('decodes UTF-8 text', () => {
    expect(decodeTextPayload(Buffer.from('21.5 °C'))).toBe('21.5 °C');
  });

  it('rejects invalid UTF-8', () => {
    expect(thrownBy(() => decodeTextPayload(Buffer.from([0x31, 0xff, 0xfe])))).toMatchObject({
      kind: 'InvalidPayloadEncoding',
    });
  });
});

describe('decodeJsonPayload', () => {
  it('parses JSON documents', () => {
    expect(decodeJsonPayload(Buffer.from('{"temp": 21.5, "ok": true, "tags": ["a", null]}'))).toEqual(
      new Map<string, unknown>([
        ['temp', 21.5],
        ['ok', true],
        ['tags', ['a', null]],
      ])
    );
    expect(decodeJsonPayload(Buffer.from('"\\u00e9t\\u00e9"'))).toBe('été');
  });

  it('keeps object members in payload order', () => {
    const doc = decodeJsonPayload(Buffer.from('{"b": 1, "10": 2, "a": 3, "2": 4}'));
    expect(doc instanceof Map ? Array.from(doc.keys()) : doc).toEqual(['b', '10', 'a', '2']);
  });

  it('reads pretty-printed documents', () => {
    const text = JSON.stringify({ outer: { inner: [1, 2.5] } }, null, 2);
    expect(decodeJsonPayload(Buffer.from(text))).toEqual(
      new Map([['outer', new Map([['inner', [1n, 2.5]]])]])
    );
  });

  it('keeps integers exact and floats as numbers', () => {
    expect(decodeJsonPayload(Buffer.from('42'))).toBe(42n);
    expect(decodeJsonPayload(Buffer.from('-9223372036854775808'))).toBe(-9223372036854775808n);
    expect(decodeJsonPayload(Buffer.from('18446744073709551616'))).toBe(18446744073709551616n);
    expect(decodeJsonPayload(Buffer.from('2.5e3'))).toBe(2500);
  });

  it('takes the last value of a repeated key', () => {
    expect(decodeJsonPayload(Buffer.from('{"v": 1, "v": 2}'))).toEqual(new Map([['v', 2n]]));
  });

  it('rejects documents nested too deeply', () => {
    const depth = MAX_JSON_DEPTH + 1;
    const err = thrownBy(() => decodeJsonPayload(Buffer.from('['.repeat(depth) + ']'.repeat(depth))));
    expect(err).toMatchObject({
      kind: 'MalformedPayload',
      message: `Failed to parse payload as JSON: nested deeper than ${MAX_JSON_DEPTH} levels`,
    });
    const ok = '['.repeat(MAX_JSON_DEPTH) + ']'.repeat(MAX_JSON_DEPTH);
    expect(Array.isArray(decodeJsonPayload(Buffer.from(ok)))).toBe(true);
  });

  it('ignores brackets inside strings when measuring depth', () => {
    const text = JSON.stringify({ s: '['.repeat(500) + '\\"' });
    expect(decodeJsonPayload(Buffer.from(text))).toEqual(new Map([['s', '['.repeat(500) + '\\"']]));
  });

  it('reports malformed documents', () => {
    expect(thrownBy(() => decodeJsonPayload(Buffer.from('{"temp": ')))).toMatchObject({
      kind: 'MalformedPayload',
    });
    expect(thrownBy(() => decodeJsonPayload(Buffer.from([0x7b, 0xff])))).toMatchObject({
      kind: 'MalformedPayload',
    });
  });
});
