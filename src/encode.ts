import { isASCIIAlphanumeric, isHexDigit, parseHexDigit } from "./util";

export type PercentEncodeSet = (code: number) => boolean;

const utf8Encoder = new TextEncoder();
// "UTF-8 decode without BOM": keep a leading U+FEFF, replace invalid sequences with U+FFFD.
const utf8Decoder = new TextDecoder('utf-8', { ignoreBOM: true });

export function utf8Encode(input: string): Uint8Array {
  return utf8Encoder.encode(input);
}

export function utf8DecodeWithoutBOM(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

// https://url.spec.whatwg.org/#percent-encode
export function percentEncode(byte: number): string {
  return `%${byte <= 0xF ? '0' : ''}${byte.toString(16).toUpperCase()}`;
}

// https://url.spec.whatwg.org/#percent-decode
export function percentDecode(input: Uint8Array): Uint8Array {
  // 1. Let output be an empty byte sequence.
  const output = new Uint8Array(input.length);
  let length = 0;
  const size = input.length;
  // 2. For each byte in input:
  for (let index = 0; index < size; index++) {
    const byte = input[index];
    // 1-2. A % that is not followed by two hex digits is appended as it is.
    // 3. Otherwise, append the byte the two hex digits stand for and skip the next two bytes.
    if (0x25 === byte && index + 2 < size && isHexDigit(input[index + 1]) && isHexDigit(input[index + 2])) {
      output[length++] = parseHexDigit(input[index + 1]) << 4 | parseHexDigit(input[index + 2]);
      index += 2;
    } else {
      output[length++] = byte;
    }
  }
  // 3. Return output.
  return output.subarray(0, length);
}

// https://url.spec.whatwg.org/#string-percent-decode
export function stringPercentDecode(input: string): Uint8Array {
  return percentDecode(utf8Encode(input));
}

export function utf8StringPercentDecode(input: string): string {
  return utf8DecodeWithoutBOM(stringPercentDecode(input));
}

// https://infra.spec.whatwg.org/#c0-control
export function isC0Control(code: number): boolean {
  return code >= 0x00 // U+0000 NULL
      && code <= 0x1F; // U+001F INFORMATION SEPARATOR ONE
}

// https://url.spec.whatwg.org/#c0-control-percent-encode-set
export function isC0ControlPercentEncode(code: number): boolean {
  return isC0Control(code)
      || code > 0x7E; // U+007E (~)
}

// https://url.spec.whatwg.org/#fragment-percent-encode-set
export function isFragmentPercentEncode(code: number): boolean {
  return isC0ControlPercentEncode(code)
      || code === 0x20 // U+0020 SPACE
      || code === 0x22 // U+0022 (")
      || code === 0x3C // U+003C (<)
      || code === 0x3E // U+003E (>)
      || code === 0x60; // U+0060 (`)
}

// https://url.spec.whatwg.org/#query-percent-encode-set
export function isQueryPercentEncode(code: number): boolean {
  return isC0ControlPercentEncode(code)
      || code === 0x20 // U+0020 SPACE
      || code === 0x22 // U+0022 (")
      || code === 0x23 // U+0023 (#)
      || code === 0x3C // U+003C (<)
      || code === 0x3E; // U+003E (>)
}

// https://url.spec.whatwg.org/#special-query-percent-encode-set
export function isSpecialQueryPercentEncode(code: number): boolean {
  return isQueryPercentEncode(code)
      || code === 0x27; // U+0027 (')
}

// https://url.spec.whatwg.org/#path-percent-encode-set
export function isPathPercentEncode(code: number): boolean {
  return isQueryPercentEncode(code)
      || code === 0x3F // U+003F (?)
      || code === 0x5E // U+005E (^)
      || code === 0x60 // U+0060 (`)
      || code === 0x7B // U+007B ({)
      || code === 0x7D; // U+007D (})
}

// https://url.spec.whatwg.org/#userinfo-percent-encode-set
export function isUserinfoPercentEncode(code: number): boolean {
  return isPathPercentEncode(code)
      || code === 0x2F // U+002F (/)
      || code === 0x3A // U+003A (:)
      || code === 0x3B // U+003B (;)
      || code === 0x3D // U+003D (=)
      || code === 0x40 // U+0040 (@)
      || (code >= 0x5B && code <= 0x5D) // U+005B ([), U+005C (\), U+005D (])
      || code === 0x7C; // U+007C (|)
}

// https://url.spec.whatwg.org/#component-percent-encode-set
export function isComponentPercentEncode(code: number): boolean {
  return isUserinfoPercentEncode(code)
      || (code >= 0x24 && code <= 0x26) // U+0024 ($), U+0025 (%), U+0026 (&)
      || code === 0x2B // U+002B (+)
      || code === 0x2C; // U+002C (,)
}

// https://url.spec.whatwg.org/#application-x-www-form-urlencoded-percent-encode-set
// Equivalent to leaving only ASCII alphanumerics and * - . _ unescaped.
export function isFormUrlencodedPercentEncode(code: number): boolean {
  return !(isASCIIAlphanumeric(code)
      || code === 0x2A // U+002A (*)
      || code === 0x2D // U+002D (-)
      || code === 0x2E // U+002E (.)
      || code === 0x5F); // U+005F (_)
}

// https://url.spec.whatwg.org/#utf-8-percent-encode
export function utf8PercentEncodeCodePoint(codePoint: string, percentEncodeSet: PercentEncodeSet): string {
  const code = codePoint.codePointAt(0) ?? 0;
  // Every encode set contains all code points above U+007E.
  if (code < 0x80) {
    return percentEncodeSet(code) ? percentEncode(code) : codePoint;
  }
  let output = '';
  for (const byte of utf8Encode(codePoint)) {
    output += percentEncode(byte);
  }
  return output;
}

// https://url.spec.whatwg.org/#string-percent-encode-after-encoding
export function utf8PercentEncodeString(
    input: string,
    percentEncodeSet: PercentEncodeSet,
    spaceAsPlus: boolean = false
): string {
  // 1-2. Only UTF-8 is supported, so there is no encoder to set up.
  // 3. Let output be the empty string.
  let output = '';
  // 4. For each code point of input:
  for (const codePoint of input) {
    // 1. If spaceAsPlus is true and codePoint is U+0020 SPACE, then append U+002B (+) to output and continue.
    if (spaceAsPlus && ' ' === codePoint) {
      output += '+';
    // 2-4. Otherwise, percent-encode the UTF-8 bytes of codePoint that are in percentEncodeSet.
    } else {
      output += utf8PercentEncodeCodePoint(codePoint, percentEncodeSet);
    }
  }
  // 5. Return output.
  return output;
}
