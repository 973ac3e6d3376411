import { describe, it, expect } from 'vitest';
import {
  isComponentPercentEncode,
  isFormUrlencodedPercentEncode,
  isFragmentPercentEncode,
  isPathPercentEncode,
  isSpecialQueryPercentEncode,
  isUserinfoPercentEncode,
  percentEncode,
  stringPercentDecode,
  utf8DecodeWithoutBOM,
  utf8PercentEncodeCodePoint,
  utf8PercentEncodeString,
  utf8StringPercentDecode
} from '../src/encode';

const code = (c: string) => c.charCodeAt(0);

describe('percentEncode', () => {
  it('uses two upper-case hex digits', () => {
    expect(percentEncode(0x0A)).toBe('%0A');
    expect(percentEncode(0xFF)).toBe('%FF');
    expect(percentEncode(0x20)).toBe('%20');
  });
});

describe('percent-decode', () => {
  it('replaces %XX with the byte', () => {
    expect(Array.from(stringPercentDecode('%41b'))).toEqual([0x41, 0x62]);
  });

  it('leaves a malformed % untouched', () => {
    expect(utf8StringPercentDecode('%zz%4')).toBe('%zz%4');
    expect(utf8StringPercentDecode('100%')).toBe('100%');
  });

  it('decodes multi-byte UTF-8 sequences', () => {
    expect(utf8StringPercentDecode('%C3%A9t%C3%A9')).toBe('été');
  });

  it('replaces invalid UTF-8 instead of throwing', () => {
    expect(utf8StringPercentDecode('%FF')).toBe('\uFFFD');
  });

  it('keeps a leading byte order mark', () => {
    expect(utf8DecodeWithoutBOM(new Uint8Array([0xEF, 0xBB, 0xBF, 0x61]))).toBe('\uFEFFa');
  });
});

describe('encode sets', () => {
  it('nests each set inside the next', () => {
    expect(isFragmentPercentEncode(code('`'))).toBe(true);
    expect(isSpecialQueryPercentEncode(code("'"))).toBe(true);
    expect(isSpecialQueryPercentEncode(code('?'))).toBe(false);
    expect(isPathPercentEncode(code('?'))).toBe(true);
    expect(isPathPercentEncode(code('^'))).toBe(true);
    expect(isPathPercentEncode(code('/'))).toBe(false);
    expect(isUserinfoPercentEncode(code('/'))).toBe(true);
    expect(isUserinfoPercentEncode(code('|'))).toBe(true);
    expect(isUserinfoPercentEncode(code('&'))).toBe(false);
    expect(isComponentPercentEncode(code('&'))).toBe(true);
    expect(isComponentPercentEncode(code('!'))).toBe(false);
    expect(isFormUrlencodedPercentEncode(code('!'))).toBe(true);
    expect(isFormUrlencodedPercentEncode(code('~'))).toBe(true);
  });

  it('leaves ASCII alphanumerics and * - . _ alone in form encoding', () => {
    for (const c of 'aZ09*-._') {
      expect(isFormUrlencodedPercentEncode(code(c))).toBe(false);
    }
  });
});

describe('UTF-8 percent-encode', () => {
  it('escapes every byte of a non-ASCII code point', () => {
    expect(utf8PercentEncodeCodePoint('é', isFragmentPercentEncode)).toBe('%C3%A9');
    expect(utf8PercentEncodeCodePoint('😀', isFragmentPercentEncode)).toBe('%F0%9F%98%80');
  });

  it('escapes ASCII only when it is in the set', () => {
    expect(utf8PercentEncodeString('a b"<>`', isFragmentPercentEncode)).toBe('a%20b%22%3C%3E%60');
    expect(utf8PercentEncodeString('a/b', isPathPercentEncode)).toBe('a/b');
  });

  it('can write spaces as plus signs', () => {
    expect(utf8PercentEncodeString('a b*~', isFormUrlencodedPercentEncode, true)).toBe('a+b*%7E');
  });
});
