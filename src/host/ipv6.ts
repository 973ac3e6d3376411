import { InvalidHostError } from "../errors";
import { isASCIIDigit, isHexDigit, parseHexDigit, swap } from "../util";
import type { Tuple8 } from "../util";

// https://url.spec.whatwg.org/#concept-ipv6
export type IPv6Address = Tuple8<number>; // eight 16-bit unsigned integers

// https://url.spec.whatwg.org/#concept-ipv6-parser
export function parseIPv6(input: string): IPv6Address {
  const fail = (reason: string) => new InvalidHostError(`[${input}]`, reason);
  const size = input.length;
  const code = (index: number) => index < size ? input.charCodeAt(index) : -1;
  // 1. Let address be a new IPv6 address whose pieces are all 0.
  const address: IPv6Address = [0, 0, 0, 0, 0, 0, 0, 0];
  // 2. Let pieceIndex be 0.
  // 3. Let compress be null.
  // 4. Let pointer be a pointer for input.
  let pieceIndex = 0;
  let compress: number | null = null;
  let pointer = 0;
  // 5. If c is U+003A (:), then:
  if (':' === input[pointer]) {
    // 1. If remaining does not start with U+003A (:), IPv6-invalid-compression validation error, return failure.
    if (':' !== input[pointer + 1]) {
      throw fail('unexpected leading colon');
    }
    // 2. Increase pointer by 2.
    // 3. Increase pieceIndex by 1 and then set compress to pieceIndex.
    pointer += 2;
    pieceIndex += 1;
    compress = pieceIndex;
  }
  // 6. While c is not the EOF code point:
  while (pointer < size) {
    // 1. If pieceIndex is 8, IPv6-too-many-pieces validation error, return failure.
    if (pieceIndex === 8) {
      throw fail('too many pieces');
    }
    // 2. If c is U+003A (:), then:
    if (':' === input[pointer]) {
      // 1. If compress is non-null, IPv6-multiple-compression validation error, return failure.
      if (null !== compress) {
        throw fail('multiple compressions');
      }
      pointer += 1;
      pieceIndex += 1;
      compress = pieceIndex;
      continue;
    }
    // 3. Let value and length be 0.
    let value = 0;
    let length = 0;
    // 4. While length is less than 4 and c is an ASCII hex digit, accumulate value.
    while (length < 4 && isHexDigit(code(pointer))) {
      value = value * 0x10 + parseHexDigit(code(pointer));
      pointer += 1;
      length += 1;
    }
    // 5. If c is U+002E (.), then:
    if ('.' === input[pointer]) {
      // IPv4-mapped IPv6 address, e.g. ::ffff:192.168.0.1
      // 1. If length is 0, IPv4-in-IPv6-invalid-code-point validation error, return failure.
      if (length === 0) {
        throw fail('invalid IPv4 in IPv6');
      }
      // 2. Decrease pointer by length.
      pointer -= length;
      // 3. If pieceIndex is greater than 6, IPv4-in-IPv6-too-many-pieces validation error, return failure.
      if (pieceIndex > 6) {
        throw fail('too many pieces before IPv4 in IPv6');
      }
      // 4. Let numbersSeen be 0.
      let numbersSeen = 0;
      // 5. While c is not the EOF code point:
      while (pointer < size) {
        let ipv4Piece: number | null = null;
        if (numbersSeen > 0) {
          if ('.' === input[pointer] && numbersSeen < 4) {
            pointer += 1;
          } else {
            throw fail('invalid IPv4 in IPv6');
          }
        }
        if (!isASCIIDigit(code(pointer))) {
          throw fail('invalid IPv4 in IPv6');
        }
        while (isASCIIDigit(code(pointer))) {
          const number = code(pointer) - 0x30;
          if (ipv4Piece === null) {
            ipv4Piece = number;
          } else if (ipv4Piece === 0) {
            throw fail('leading zero in IPv4 in IPv6');
          } else {
            ipv4Piece = ipv4Piece * 10 + number;
          }
          if (ipv4Piece > 255) {
            throw fail('IPv4 part out of range in IPv6');
          }
          pointer += 1;
        }
        // 6. Set address[pieceIndex] to address[pieceIndex] × 0x100 + ipv4Piece.
        address[pieceIndex] = address[pieceIndex] * 0x100 + (ipv4Piece ?? 0);
        numbersSeen += 1;
        if (numbersSeen === 2 || numbersSeen === 4) {
          pieceIndex += 1;
        }
      }
      // 6. If numbersSeen is not 4, IPv4-in-IPv6-too-few-parts validation error, return failure.
      if (numbersSeen !== 4) {
        throw fail('too few IPv4 parts in IPv6');
      }
      break;
    // 6. Otherwise, if c is U+003A (:), increase pointer by 1.
    } else if (':' === input[pointer]) {
      pointer += 1;
      if (pointer === size) {
        throw fail('unexpected trailing colon');
      }
    // 7. Otherwise, if c is not the EOF code point, IPv6-invalid-code-point validation error, return failure.
    } else if (pointer < size) {
      throw fail(`invalid code point "${input[pointer]}"`);
    }
    // 8. Set address[pieceIndex] to value.
    // 9. Increase pieceIndex by 1.
    address[pieceIndex] = value;
    pieceIndex += 1;
  }
  // 7. If compress is non-null, move the pieces after compress to the end of address.
  if (compress !== null) {
    let swaps = pieceIndex - compress;
    pieceIndex = 7;
    while (pieceIndex !== 0 && swaps > 0) {
      swap(address, pieceIndex, compress + swaps - 1);
      pieceIndex -= 1;
      swaps -= 1;
    }
  // 8. Otherwise, if pieceIndex is not 8, IPv6-too-few-pieces validation error, return failure.
  } else if (pieceIndex !== 8) {
    throw fail('too few pieces');
  }
  // 9. Return address.
  return address;
}

// https://url.spec.whatwg.org/#concept-ipv6-serializer
export function serializeIPv6(address: IPv6Address): string {
  // 1. Let output be the empty string.
  // 2. Let compress be the first piece of the first longest run of zero pieces.
  // 3. A run of a single zero piece is not compressed.
  const run = findCompressedRun(address);
  // 5. Each remaining piece is written in its shortest lowercase hexadecimal form,
  //    with ":" between pieces.
  const hex = (pieces: readonly number[]) => pieces.map(piece => piece.toString(16)).join(':');
  if (run === null) {
    return hex(address);
  }
  // 5.3. The compressed run becomes "::", which also stands in for the separators around it.
  return `${hex(address.slice(0, run.start))}::${hex(address.slice(run.start + run.length))}`;
}

interface ZeroRun {
  readonly start: number;
  readonly length: number;
}

function findCompressedRun(address: IPv6Address): ZeroRun | null {
  let longest: ZeroRun | null = null;
  let start = -1;
  // One step past the last piece closes a trailing run.
  for (let pieceIndex = 0; pieceIndex <= 8; pieceIndex++) {
    if (pieceIndex < 8 && address[pieceIndex] === 0) {
      if (start < 0) {
        start = pieceIndex;
      }
      continue;
    }
    if (start >= 0) {
      const length = pieceIndex - start;
      // Ties keep the earlier run.
      if (length > 1 && (longest === null || length > longest.length)) {
        longest = { start, length };
      }
      start = -1;
    }
  }
  return longest;
}
