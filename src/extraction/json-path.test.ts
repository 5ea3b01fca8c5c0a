import { describe, it, expect } from 'vitest';
import { decodeJsonPayload } from '../codecs/payload.js';
import { JsonValue } from '../codecs/types.js';
import { ConfigError } from '../errors.js';
import { thrownBy } from '../test-support/errors.js';
import { compileJsonPath, queryJsonPath } from './json-path.js';

const json = (text: string): JsonValue => decodeJsonPayload(Buffer.from(text));

const doc = json(
  '{"sensor": {"temp": 21.5, "readings": [1, 2, 3], "meta": {"ts": 1000}}, "odd key": "x", "items": [{"v": 1}, {"v": 2}]}'
);

const query = (expr: string) => queryJsonPath(compileJsonPath(expr), doc);

describe('compileJsonPath', () => {
  it('parses dotted and bracketed segments', () => {
    expect(compileJsonPath("$.a['b'][2]..c[*]").segments).toEqual([
      { descendant: false, selectors: [{ kind: 'name', name: 'a' }] },
      { descendant: false, selectors: [{ kind: 'name', name: 'b' }] },
      { descendant: false, selectors: [{ kind: 'index', index: 2 }] },
      { descendant: true, selectors: [{ kind: 'name', name: 'c' }] },
      { descendant: false, selectors: [{ kind: 'wildcard' }] },
    ]);
  });

  it('unescapes quoted names', () => {
    expect(compileJsonPath("$['it\\'s']").segments[0].selectors).toEqual([{ kind: 'name', name: "it's" }]);
  });

  it.each([
    'sensor.temp',
    '$.',
    '$..',
    '$x',
    '$[',
    '$[0',
    "$['unterminated",
    '$[?(@.v > 1)]',
    '$[1:2]',
    '$.a b',
  ])('rejects %j', (expr) => {
    const err = thrownBy(() => compileJsonPath(expr));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ kind: 'InvalidPathExpression' });
  });
});

describe('queryJsonPath', () => {
  it('selects the root', () => {
    expect(query('$')).toEqual([doc]);
  });

  it('selects members and indices', () => {
    expect(query('$.sensor.temp')).toEqual([21.5]);
    expect(query("$['odd key']")).toEqual(['x']);
    expect(query('$.sensor.readings[1]')).toEqual([2n]);
    expect(query('$.sensor.readings[-1]')).toEqual([3n]);
  });

  it('selects with wildcards in document order', () => {
    expect(query('$.items[*].v')).toEqual([1n, 2n]);
    expect(query('$.sensor.*')).toEqual([21.5, [1n, 2n, 3n], new Map([['ts', 1000n]])]);
  });

  it('keeps member order for numeric-looking keys', () => {
    const ordered = json('{"b": "first", "10": "second", "a": {"z": 1, "2": 2}}');
    expect(queryJsonPath(compileJsonPath('$.*'), ordered)[0]).toBe('first');
    expect(queryJsonPath(compileJsonPath('$..*'), ordered)).toEqual([
      'first',
      'second',
      new Map([
        ['z', 1n],
        ['2', 2n],
      ]),
      1n,
      2n,
    ]);
  });

  it('descends recursively', () => {
    expect(query('$..v')).toEqual([1n, 2n]);
    expect(query("$..['ts']")).toEqual([1000n]);
  });

  it('walks very large and very deep documents', () => {
    const wide: JsonValue = Array.from({ length: 300_000 }, (_, i) => BigInt(i));
    expect(queryJsonPath(compileJsonPath('$[*]'), wide)).toHaveLength(300_000);

    let deep: JsonValue = new Map([['v', 'bottom']]);
    for (let i = 0; i < 20_000; i++) deep = [deep];
    expect(queryJsonPath(compileJsonPath('$..v'), deep)).toEqual(['bottom']);
  });

  it('supports unions', () => {
    expect(query('$.sensor.readings[0,2]')).toEqual([1n, 3n]);
    expect(query("$['odd key','items'][0]")).toEqual([new Map([['v', 1n]])]);
  });

  it('returns nothing for missing paths', () => {
    expect(query('$.missing')).toEqual([]);
    expect(query('$.sensor.temp.deeper')).toEqual([]);
    expect(query('$.sensor.readings[5]')).toEqual([]);
    expect(query('$.sensor[0]')).toEqual([]);
  });

  it('does not read inherited properties', () => {
    expect(query('$.sensor.toString')).toEqual([]);
  });
});
