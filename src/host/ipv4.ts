// https://url.spec.whatwg.org/#concept-ipv4
import { InvalidHostError } from "../errors";
import { reportValidationError } from "../validation";

export type IPv4Address = number; // 32-bit unsigned integer

const ONLY_DEC = /^[0-9]+$/;
const ONLY_HEX = /^[0-9a-fA-F]+$/;
const ONLY_OCT = /^[0-7]+$/;

interface IPv4Number {
  value: number;
  validationError: boolean;
}

// https://url.spec.whatwg.org/#ends-in-a-number-checker
export function endsInANumber(input: string): boolean {
  // 1. Let parts be the result of strictly splitting input on U+002E (.).
  const parts = input.split('.');
  // 2. If the last item in parts is the empty string, then:
  if (parts[parts.length - 1] === '') {
    // 1. If parts's size is 1, then return false.
    if (parts.length === 1) {
      return false;
    }
    // 2. Remove the last item from parts.
    parts.pop();
  }
  // 3. Let last be the last item in parts.
  const last = parts[parts.length - 1];
  // 4. If last is non-empty and contains only ASCII digits, then return true.
  if (last !== '' && ONLY_DEC.test(last)) {
    return true;
  }
  // 5. If parsing last as an IPv4 number does not return failure, then return true.
  // 6. Return false.
  return parseIPv4Number(last) !== undefined;
}

// https://url.spec.whatwg.org/#concept-ipv4-parser
export function parseIPv4(input: string): IPv4Address {
  // 1. Let parts be the result of strictly splitting input on U+002E (.).
  const parts = input.split('.');
  // 2. If the last item in parts is the empty string, then:
  if (parts[parts.length - 1] === '') {
    // 1. IPv4-empty-part validation error.
    reportValidationError('IPv4-empty-part', input);
    // 2. If parts's size is greater than 1, then remove the last item from parts.
    if (parts.length > 1) {
      parts.pop();
    }
  }
  // 3. If parts's size is greater than 4, IPv4-too-many-parts validation error, return failure.
  if (parts.length > 4) {
    throw new InvalidHostError(input, 'too many IPv4 parts');
  }
  // 4. Let numbers be an empty list.
  const numbers: number[] = [];
  // 5. For each part of parts:
  for (const part of parts) {
    // 1. Let result be the result of parsing part.
    // 2. If result is failure, IPv4-non-numeric-part validation error, return failure.
    const result = parseIPv4Number(part);
    if (result === undefined) {
      throw new InvalidHostError(input, `invalid IPv4 part "${part}"`);
    }
    // 3. If result[1] is true, IPv4-non-decimal-part validation error.
    if (result.validationError) {
      reportValidationError('IPv4-non-decimal-part', input);
    }
    // 4. Append result[0] to numbers.
    numbers.push(result.value);
  }
  // 6. If any item in numbers is greater than 255, IPv4-out-of-range-part validation error.
  if (numbers.some(n => n > 255)) {
    reportValidationError('IPv4-out-of-range-part', input);
  }
  // 7. If any but the last item in numbers is greater than 255, then return failure.
  for (let i = 0; i < numbers.length - 1; i++) {
    if (numbers[i] > 255) {
      throw new InvalidHostError(input, 'IPv4 part out of range');
    }
  }
  // 8. If the last item in numbers is at least 256^(5 - numbers's size), then return failure.
  let ipv4 = numbers[numbers.length - 1];
  if (ipv4 >= 256 ** (5 - numbers.length)) {
    throw new InvalidHostError(input, 'IPv4 address out of range');
  }
  // 9-13. The last number fills the remaining bytes; each earlier one is one byte from the top.
  for (let counter = 0; counter < numbers.length - 1; counter++) {
    ipv4 += numbers[counter] * (256 ** (3 - counter));
  }
  // 14. Return ipv4.
  return ipv4;
}

// https://url.spec.whatwg.org/#ipv4-number-parser
function parseIPv4Number(input: string): IPv4Number | undefined {
  // 1. If input is the empty string, then return failure.
  if ('' === input) {
    return undefined;
  }
  // 2. Let validationError be false.
  // 3. Let R be 10.
  let validationError = false;
  let R = 10;
  let test = ONLY_DEC;
  // 4. A leading "0x" or "0X" switches to hexadecimal.
  if (input.length >= 2 && '0' === input[0] && ('x' === input[1] || 'X' === input[1])) {
    validationError = true;
    input = input.slice(2);
    R = 16;
    test = ONLY_HEX;
  // 5. Otherwise a leading "0" switches to octal.
  } else if (input.length >= 2 && '0' === input[0]) {
    validationError = true;
    input = input.slice(1);
    R = 8;
    test = ONLY_OCT;
  }
  // 6. If input is the empty string, then return (0, true).
  if ('' === input) {
    return { value: 0, validationError: true };
  }
  // 7. If input contains a code point that is not a radix-R digit, then return failure.
  if (!test.test(input)) {
    return undefined;
  }
  // 8-9. Return the mathematical integer value input represents in radix-R, with validationError.
  return { value: parseInt(input, R), validationError };
}

// https://url.spec.whatwg.org/#concept-ipv4-serializer
export function serializeIPv4(address: IPv4Address): string {
  // 1. Let output be the empty string.
  // 2. Let n be the value of address.
  const output: string[] = [];
  let n = address;
  // 3. For each i in the range 1 to 4, inclusive:
  for (let i = 1; i <= 4; i++) {
    // 1. Prepend n % 256, serialized, to output.
    output.unshift(`${n % 256}`);
    // 2. If i is not 4, then prepend U+002E (.) to output.
    // 3. Set n to floor(n / 256).
    n = Math.floor(n / 256);
  }
  // 4. Return output.
  return output.join('.');
}
