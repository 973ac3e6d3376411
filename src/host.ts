import { isC0ControlPercentEncode, utf8PercentEncodeString, utf8StringPercentDecode } from "./encode";
import { getUrlConfig } from "./config";
import { IdnaError, InvalidHostError } from "./errors";
import { parseIPv6, serializeIPv6 } from "./host/ipv6";
import type { IPv6Address } from "./host/ipv6";
import { endsInANumber, parseIPv4, serializeIPv4 } from "./host/ipv4";
import type { IPv4Address } from "./host/ipv4";
import { toAscii } from "./idna";
import { reportValidationError } from "./validation";

export const enum HostType {
  DOMAIN,
  IPV4,
  IPV6,
  OPAQUE,
  EMPTY
}

export interface DomainHost {
  readonly _type: HostType.DOMAIN;
  readonly _domain: string;
}

export interface IPv4Host {
  readonly _type: HostType.IPV4;
  readonly _address: IPv4Address;
}

export interface IPv6Host {
  readonly _type: HostType.IPV6;
  readonly _address: IPv6Address;
}

export interface OpaqueHost {
  readonly _type: HostType.OPAQUE;
  readonly _data: string;
}

export interface EmptyHost {
  readonly _type: HostType.EMPTY;
}

export const EMPTY_HOST: EmptyHost = {
  _type: HostType.EMPTY
};

export type Host = DomainHost | IPv4Host | IPv6Host | OpaqueHost | EmptyHost;

// https://url.spec.whatwg.org/#forbidden-host-code-point
// U+0000 NULL, U+0009 TAB, U+000A LF, U+000D CR, U+0020 SPACE, U+0023 (#), U+002F (/), U+003A (:), U+003C (<),
// U+003E (>), U+003F (?), U+0040 (@), U+005B ([), U+005C (\), U+005D (]), U+005E (^), or U+007C (|).
const FORBIDDEN_HOST_CODE_POINT = /[\0\t\n\r #/:<>?@[\\\]^|]/;
// https://url.spec.whatwg.org/#forbidden-domain-code-point
// A forbidden host code point, a C0 control, U+0025 (%), or U+007F DELETE.
const FORBIDDEN_DOMAIN_CODE_POINT = /[\0-\x20#%/:<>?@[\\\]^|\x7F]/;
const NON_ASCII = /[^\0-\x7F]/;

export function isEmptyHost(host: Host | null): boolean {
  return host !== null && host._type === HostType.EMPTY;
}

// https://url.spec.whatwg.org/#concept-host-parser
export function parseHost(input: string, isOpaque: boolean): Host {
  // 1. If input starts with U+005B ([), then:
  if ('[' === input[0]) {
    // 1. If input does not end with U+005D (]), IPv6-unclosed validation error, return failure.
    if (']' !== input[input.length - 1]) {
      throw new InvalidHostError(input, 'unclosed IPv6 address');
    }
    // 2. Return the result of IPv6 parsing input with its brackets removed.
    return {
      _type: HostType.IPV6,
      _address: parseIPv6(input.slice(1, -1))
    };
  }
  // 2. If isOpaque is true, then return the result of opaque-host parsing input.
  if (isOpaque) {
    return parseOpaqueHost(input);
  }
  // 3. Assert: input is not the empty string.
  // 4. Let domain be the result of running UTF-8 decode without BOM on the percent-decoding of input.
  const domain = utf8StringPercentDecode(input);
  // 5. Let asciiDomain be the result of running domain to ASCII with domain and false.
  // 6. If asciiDomain is failure, then return failure.
  const asciiDomain = domainToAscii(domain);
  // 7. If asciiDomain ends in a number, then return the result of IPv4 parsing asciiDomain.
  if (endsInANumber(asciiDomain)) {
    return {
      _type: HostType.IPV4,
      _address: parseIPv4(asciiDomain)
    };
  }
  // 8. Return asciiDomain.
  return {
    _type: HostType.DOMAIN,
    _domain: asciiDomain
  };
}

// https://url.spec.whatwg.org/#concept-domain-to-ascii
export function domainToAscii(domain: string): string {
  // 1. Let result be the result of running UTS #46's ToASCII with domain.
  let result: string;
  // Fast path: without beStrict, ASCII input with no punycode labels only needs lowercasing.
  if (!getUrlConfig().strictDomains && !NON_ASCII.test(domain) && !domain.split('.').some(label => /^xn--/i.test(label))) {
    result = domain.toLowerCase();
  } else {
    try {
      result = toAscii(domain);
    } catch (e) {
      if (e instanceof IdnaError) {
        reportValidationError('domain-to-ASCII', domain);
        throw new InvalidHostError(domain, 'IDNA conversion failed');
      }
      throw e;
    }
  }
  // 2. If result is a failure value or the empty string, domain-to-ASCII validation error, return failure.
  if ('' === result) {
    reportValidationError('domain-to-ASCII', domain);
    throw new InvalidHostError(domain, 'empty domain');
  }
  // 3. If result contains a forbidden domain code point, domain-invalid-code-point validation error, return failure.
  if (FORBIDDEN_DOMAIN_CODE_POINT.test(result)) {
    reportValidationError('domain-invalid-code-point', domain);
    throw new InvalidHostError(domain, 'forbidden code point in domain');
  }
  // 4. Return result.
  return result;
}

// https://url.spec.whatwg.org/#concept-opaque-host-parser
function parseOpaqueHost(input: string): OpaqueHost | EmptyHost {
  // 1. If input contains a forbidden host code point, host-invalid-code-point validation error, return failure.
  if (FORBIDDEN_HOST_CODE_POINT.test(input)) {
    reportValidationError('host-invalid-code-point', input);
    throw new InvalidHostError(input, 'forbidden code point in opaque host');
  }
  // 2. Invalid URL units and stray U+0025 (%) are validation errors only.
  // 3. Return the result of running UTF-8 percent-encode on input using the C0 control percent-encode set.
  const output = utf8PercentEncodeString(input, isC0ControlPercentEncode);
  return output === '' ? EMPTY_HOST : {
    _type: HostType.OPAQUE,
    _data: output
  };
}

// https://url.spec.whatwg.org/#concept-host-serializer
export function serializeHost(host: Host): string {
  switch (host._type) {
    case HostType.DOMAIN:
      return host._domain;
    case HostType.IPV4:
      return serializeIPv4(host._address);
    case HostType.IPV6:
      return `[${serializeIPv6(host._address)}]`;
    case HostType.OPAQUE:
      return host._data;
    case HostType.EMPTY:
      return '';
  }
}
