import stable from 'stable';

export type Tuple8<T> = [T, T, T, T, T, T, T, T];

export function isASCIIDigit(codePoint: number): boolean {
  return codePoint >= 0x30 && codePoint <= 0x39; // 0 to 9
}

export function isASCIIAlpha(codePoint: number): boolean {
  return (codePoint >= 0x41 && codePoint <= 0x5A) // A to Z
      || (codePoint >= 0x61 && codePoint <= 0x7A); // a to z
}

export function isASCIIAlphanumeric(codePoint: number): boolean {
  return isASCIIAlpha(codePoint) || isASCIIDigit(codePoint);
}

export function isHexDigit(codePoint: number): boolean {
  return isASCIIDigit(codePoint)
      || (codePoint >= 0x41 && codePoint <= 0x46) // A to F
      || (codePoint >= 0x61 && codePoint <= 0x66); // a to f
}

export function parseHexDigit(codePoint: number): number {
  if (codePoint >= 0x30 && codePoint <= 0x39) { // 0 to 9
    return codePoint - 0x30;
  } else if (codePoint >= 0x41 && codePoint <= 0x46) { // A to F
    return codePoint - 0x41 + 0xA;
  } else if (codePoint >= 0x61 && codePoint <= 0x66) { // a to f
    return codePoint - 0x61 + 0xA;
  }
  return -1;
}

// Code point of a single-code-point string, or -1 for EOF.
export function codePointOf(c: string | undefined): number {
  return c === undefined ? -1 : c.codePointAt(0) ?? -1;
}

export function isSequence<T>(x: unknown): x is Iterable<T> {
  if (x === null || typeof x !== 'object') {
    return false;
  }
  return Array.isArray(x) || (Symbol.iterator in x && typeof x[Symbol.iterator] === 'function');
}

export function swap<T>(array: T[], i: number, j: number): void {
  const temp = array[i];
  array[i] = array[j];
  array[j] = temp;
}

// `stable.inplace` keeps the relative order of elements that compare equal.
export function stableSort<T>(array: T[], compare: (a: T, b: T) => number): T[] {
  return stable.inplace(array, compare);
}
