import { describe, it, expect } from 'vitest';
import { URLSearchParams } from '../src/search-params';
import { parseUrlEncoded, serializeUrlEncoded } from '../src/urlencode';

describe('parseUrlEncoded', () => {
  it('splits on & and the first =', () => {
    expect(parseUrlEncoded('a=1&b=2=3&c')).toEqual([['a', '1'], ['b', '2=3'], ['c', '']]);
  });

  it('skips empty sequences', () => {
    expect(parseUrlEncoded('&&a=1&&')).toEqual([['a', '1']]);
  });

  it('decodes plus signs and percent escapes', () => {
    expect(parseUrlEncoded('q=a+b%20c&x=%zz&%C3%A9=%2B')).toEqual([['q', 'a b c'], ['x', '%zz'], ['é', '+']]);
  });
});

describe('serializeUrlEncoded', () => {
  it('encodes with the form set and writes spaces as plus', () => {
    expect(serializeUrlEncoded([['a b', 'c&d=é~'], ['*-._', '']])).toBe('a+b=c%26d%3D%C3%A9%7E&*-._=');
  });

  it('serializes an empty list as an empty string', () => {
    expect(serializeUrlEncoded([])).toBe('');
  });
});

describe('URLSearchParams', () => {
  it('parses a string, dropping one leading ?', () => {
    const params = new URLSearchParams('?a=1&b=2&a=3');
    expect(params.get('a')).toBe('1');
    expect(params.getAll('a')).toEqual(['1', '3']);
    expect(params.get('missing')).toBe(null);
    expect(params.getAll('missing')).toEqual([]);
    expect(params.size).toBe(3);
  });

  it('accepts a sequence of pairs', () => {
    expect(new URLSearchParams([['a', '1'], ['b', '2']]).toString()).toBe('a=1&b=2');
  });

  it('rejects a pair without exactly two items', () => {
    expect(() => new URLSearchParams([['a']])).toThrow(TypeError);
    expect(() => new URLSearchParams([['a', 'b', 'c']])).toThrow(TypeError);
  });

  it('accepts a record', () => {
    expect(new URLSearchParams({ x: '1', y: '2' }).toString()).toBe('x=1&y=2');
  });

  it('accepts another URLSearchParams', () => {
    const source = new URLSearchParams('a=1&a=2');
    expect(new URLSearchParams(source).getAll('a')).toEqual(['1', '2']);
  });

  it('starts empty without init', () => {
    const params = new URLSearchParams();
    expect(params.size).toBe(0);
    expect(params.toString()).toBe('');
  });

  it('appends duplicates', () => {
    const params = new URLSearchParams('a=1');
    params.append('a', '2');
    expect(params.toString()).toBe('a=1&a=2');
  });

  it('sets the first occurrence in place and removes the rest', () => {
    const params = new URLSearchParams('a=1&b=2&a=3');
    params.set('a', '9');
    expect(params.toString()).toBe('a=9&b=2');
    params.set('c', '4');
    expect(params.toString()).toBe('a=9&b=2&c=4');
  });

  it('deletes by name, or by name and value', () => {
    const params = new URLSearchParams('a=1&a=2&b=3');
    params.delete('a', '2');
    expect(params.toString()).toBe('a=1&b=3');
    params.delete('a');
    expect(params.toString()).toBe('b=3');
  });

  it('checks presence by name, or by name and value', () => {
    const params = new URLSearchParams('a=1');
    expect(params.has('a')).toBe(true);
    expect(params.has('a', '1')).toBe(true);
    expect(params.has('a', '2')).toBe(false);
    expect(params.has('b')).toBe(false);
  });

  it('sorts by name and keeps the order of equal names', () => {
    const params = new URLSearchParams('z=1&a=2&z=0&a=1');
    params.sort();
    expect(params.toString()).toBe('a=2&a=1&z=1&z=0');
  });

  it('sorts by UTF-16 code units', () => {
    const params = new URLSearchParams([['ﬃ', '1'], ['🌈', '2']]);
    params.sort();
    expect(Array.from(params.keys())).toEqual(['🌈', 'ﬃ']);
  });

  it('visits every pair with forEach', () => {
    const seen: string[] = [];
    new URLSearchParams('a=1&b=2').forEach((value, name) => seen.push(`${name}:${value}`));
    expect(seen).toEqual(['a:1', 'b:2']);
  });

  it('iterates entries, keys and values', () => {
    const params = new URLSearchParams('a=1&b=2');
    expect(Array.from(params)).toEqual([['a', '1'], ['b', '2']]);
    expect(Array.from(params.entries())).toEqual([['a', '1'], ['b', '2']]);
    expect(Array.from(params.keys())).toEqual(['a', 'b']);
    expect(Array.from(params.values())).toEqual(['1', '2']);
  });

  it('iterates over a snapshot', () => {
    const params = new URLSearchParams('a=1&b=2');
    const keys = params.keys();
    params.append('c', '3');
    params.delete('a');
    expect(Array.from(keys)).toEqual(['a', 'b']);
  });

  it('reports done once exhausted', () => {
    const values = new URLSearchParams('a=1').values();
    expect(values.next()).toEqual({ done: false, value: '1' });
    expect(values.next()).toEqual({ done: true, value: undefined });
  });
});
