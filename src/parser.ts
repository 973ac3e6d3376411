/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import {
  isC0ControlPercentEncode,
  isFragmentPercentEncode,
  isPathPercentEncode,
  isQueryPercentEncode,
  isSpecialQueryPercentEncode,
  isUserinfoPercentEncode,
  utf8PercentEncodeCodePoint,
  utf8PercentEncodeString
} from "./encode";
import { InvalidHostError, InvalidPortError, InvalidUrlError } from "./errors";
import { EMPTY_HOST, HostType, isEmptyHost, parseHost } from "./host";
import {
  defaultPort,
  includesCredentials,
  isSpecial,
  isSpecialScheme,
  UrlRecord
} from "./record";
import { codePointOf, isASCIIAlpha, isASCIIAlphanumeric, isASCIIDigit, isHexDigit } from "./util";
import { reportValidationError } from "./validation";
import type { ValidationErrorType } from "./validation";

export const enum ParserState {
  SCHEME_START,
  SCHEME,
  NO_SCHEME,
  SPECIAL_RELATIVE_OR_AUTHORITY,
  PATH_OR_AUTHORITY,
  RELATIVE,
  RELATIVE_SLASH,
  SPECIAL_AUTHORITY_SLASHES,
  SPECIAL_AUTHORITY_IGNORE_SLASHES,
  AUTHORITY,
  HOST,
  HOSTNAME,
  PORT,
  FILE,
  FILE_SLASH,
  FILE_HOST,
  PATH_START,
  PATH,
  OPAQUE_PATH,
  QUERY,
  FRAGMENT
}

const LEADING_OR_TRAILING_C0_CONTROL_OR_SPACE = /^[\x00-\x20]+|[\x00-\x20]+$/g;
const TAB_OR_NEWLINE = /[\t\n\r]/g;
const SINGLE_DOT = /^(?:\.|%2e)$/i;
const DOUBLE_DOT = /^(?:\.|%2e){2}$/i;
const URL_PUNCTUATION = "!$&'()*+,-./:;=?@_~";

function isSingleDotPathSegment(input: string): boolean {
  return SINGLE_DOT.test(input);
}

function isDoubleDotPathSegment(input: string): boolean {
  return DOUBLE_DOT.test(input);
}

// https://url.spec.whatwg.org/#url-code-points
function isURLCodePoint(c: string): boolean {
  const code = codePointOf(c);
  if (code < 0x80) {
    return isASCIIAlphanumeric(code) || URL_PUNCTUATION.includes(c);
  }
  if (code < 0xA0 || code > 0x10FFFD || (code >= 0xD800 && code <= 0xDFFF)) {
    return false;
  }
  // Noncharacters
  return !((code >= 0xFDD0 && code <= 0xFDEF) || (code & 0xFFFE) === 0xFFFE);
}

// https://url.spec.whatwg.org/#windows-drive-letter
function isWindowsDriveLetter(input: string): boolean {
  return input.length === 2
      && isASCIIAlpha(input.charCodeAt(0))
      && (':' === input[1] || '|' === input[1]);
}

function isNormalizedWindowsDriveLetter(input: string): boolean {
  return isWindowsDriveLetter(input) && ':' === input[1];
}

// https://url.spec.whatwg.org/#start-with-a-windows-drive-letter
function startsWithWindowsDriveLetter(codePoints: readonly string[], pointer: number): boolean {
  if (codePoints.length - pointer < 2) {
    return false;
  }
  if (!isWindowsDriveLetter(codePoints[pointer] + codePoints[pointer + 1])) {
    return false;
  }
  if (codePoints.length - pointer === 2) {
    return true;
  }
  const c = codePoints[pointer + 2];
  return '/' === c || '\\' === c || '?' === c || '#' === c;
}

function pathSegments(url: UrlRecord): string[] {
  if (typeof url._path === 'string') {
    throw new TypeError('URL has an opaque path');
  }
  return url._path;
}

// https://url.spec.whatwg.org/#shorten-a-urls-path
function shortenPath(url: UrlRecord): void {
  const path = pathSegments(url);
  if ('file' === url._scheme && path.length === 1 && isNormalizedWindowsDriveLetter(path[0])) {
    return;
  }
  path.pop();
}

function copyAuthority(url: UrlRecord, base: UrlRecord): void {
  url._username = base._username;
  url._password = base._password;
  url._host = base._host;
  url._port = base._port;
}

function copyPath(base: UrlRecord): string | string[] {
  return typeof base._path === 'string' ? base._path : base._path.slice();
}

/**
 * The basic URL parser.
 *
 * Without a state override it returns a new record or throws.
 * With a state override it modifies `url` in place and returns whether the value was applied;
 * `false` means the URL Standard returned early and left `url` as it was.
 * Fatal errors (host, port, scheme) are thrown in both modes.
 */
export function basicParse(input: string, base: UrlRecord | null): UrlRecord;
export function basicParse(input: string, base: UrlRecord | null, url: UrlRecord, stateOverride: ParserState): boolean;
export function basicParse(
    rawInput: string,
    base: UrlRecord | null,
    urlToModify: UrlRecord | null = null,
    stateOverride: ParserState | null = null
): UrlRecord | boolean {
  const err = (type: ValidationErrorType) => reportValidationError(type, rawInput);
  const fail = () => new InvalidUrlError(rawInput);
  const requireBase = (): UrlRecord => {
    if (base === null) {
      throw fail();
    }
    return base;
  };

  let input = rawInput;
  const url = urlToModify ?? new UrlRecord();
  if (urlToModify === null) {
    const trimmed = input.replace(LEADING_OR_TRAILING_C0_CONTROL_OR_SPACE, '');
    if (trimmed !== input) {
      err('leading-or-trailing-control-or-space');
      input = trimmed;
    }
  }
  const withoutTabs = input.replace(TAB_OR_NEWLINE, '');
  if (withoutTabs !== input) {
    err('tab-or-newline');
    input = withoutTabs;
  }

  const codePoints = Array.from(input);
  const length = codePoints.length;
  const remainingStartsWith = (pointer: number, c: string) => codePoints[pointer + 1] === c;
  const checkPercentEscape = (pointer: number, c: string) => {
    if ('%' === c) {
      if (!(isHexDigit(codePointOf(codePoints[pointer + 1])) && isHexDigit(codePointOf(codePoints[pointer + 2])))) {
        err('invalid-URL-unit');
      }
    } else if (!isURLCodePoint(c)) {
      err('invalid-URL-unit');
    }
  };

  let state: ParserState = stateOverride ?? ParserState.SCHEME_START;
  let buffer = '';
  let atSignSeen = false;
  let insideBrackets = false;
  let passwordTokenSeen = false;
  let pointer = 0;

  // After each run: stop if pointer is at EOF, otherwise advance it by one.
  for (;;) {
    const c: string | undefined = codePoints[pointer];
    switch (state) {
      case ParserState.SCHEME_START:
        // 1. If c is an ASCII alpha, append c, lowercased, to buffer, and set state to scheme state.
        if (c !== undefined && isASCIIAlpha(codePointOf(c))) {
          buffer += c.toLowerCase();
          state = ParserState.SCHEME;
        // 2. Otherwise, if state override is not given, set state to no scheme state and decrease pointer by 1.
        } else if (stateOverride === null) {
          state = ParserState.NO_SCHEME;
          pointer -= 1;
        // 3. Otherwise, return failure.
        } else {
          throw fail();
        }
        break;

      case ParserState.SCHEME:
        // 1. If c is an ASCII alphanumeric, U+002B (+), U+002D (-), or U+002E (.), append c, lowercased, to buffer.
        if (c !== undefined && (isASCIIAlphanumeric(codePointOf(c)) || '+' === c || '-' === c || '.' === c)) {
          buffer += c.toLowerCase();
        // 2. Otherwise, if c is U+003A (:), then:
        } else if (':' === c) {
          // 1. If state override is given, then:
          if (stateOverride !== null) {
            // 1-2. A special scheme can only be swapped for another special scheme, and likewise for the rest.
            if (isSpecialScheme(url._scheme) !== isSpecialScheme(buffer)) {
              return false;
            }
            // 3. If url includes credentials or has a non-null port, and buffer is "file", then return.
            if ((includesCredentials(url) || url._port !== null) && 'file' === buffer) {
              return false;
            }
            // 4. If url's scheme is "file" and its host is an empty host, then return.
            if ('file' === url._scheme && isEmptyHost(url._host)) {
              return false;
            }
          }
          // 2. Set url's scheme to buffer.
          url._scheme = buffer;
          // 3. If state override is given, then:
          if (stateOverride !== null) {
            // 1. If url's port is url's scheme's default port, then set url's port to null.
            if (url._port === defaultPort(url._scheme)) {
              url._port = null;
            }
            // 2. Return.
            return true;
          }
          // 4. Set buffer to the empty string.
          buffer = '';
          // 5. If url's scheme is "file", then:
          if ('file' === url._scheme) {
            // 1. If remaining does not start with "//", special-scheme-missing-following-solidus validation error.
            if (!(remainingStartsWith(pointer, '/') && codePoints[pointer + 2] === '/')) {
              err('special-scheme-missing-following-solidus');
            }
            // 2. Set state to file state.
            state = ParserState.FILE;
          // 6. Otherwise, if url is special, base is non-null, and base's scheme is url's scheme:
          } else if (isSpecial(url) && base !== null && base._scheme === url._scheme) {
            state = ParserState.SPECIAL_RELATIVE_OR_AUTHORITY;
          // 7. Otherwise, if url is special, set state to special authority slashes state.
          } else if (isSpecial(url)) {
            state = ParserState.SPECIAL_AUTHORITY_SLASHES;
          // 8. Otherwise, if remaining starts with an U+002F (/), set state to path or authority state
          //    and increase pointer by 1.
          } else if (remainingStartsWith(pointer, '/')) {
            state = ParserState.PATH_OR_AUTHORITY;
            pointer += 1;
          // 9. Otherwise, set url's path to the empty string and set state to opaque path state.
          } else {
            url._path = '';
            state = ParserState.OPAQUE_PATH;
          }
        // 3. Otherwise, if state override is not given, set buffer to the empty string,
        //    state to no scheme state, and start over (from the first code point in input).
        } else if (stateOverride === null) {
          // Not a scheme after all: start over from the first code point.
          buffer = '';
          state = ParserState.NO_SCHEME;
          pointer = -1;
        // 4. Otherwise, return failure.
        } else {
          throw fail();
        }
        break;

      case ParserState.NO_SCHEME: {
        // 1. If base is null, or base has an opaque path and c is not U+0023 (#),
        //    missing-scheme-non-relative-URL validation error, return failure.
        if (base === null || (typeof base._path === 'string' && '#' !== c)) {
          err('missing-scheme-non-relative-URL');
          throw fail();
        // 2. Otherwise, if base has an opaque path and c is U+0023 (#), copy base's scheme, path and query,
        //    set url's fragment to the empty string, and set state to fragment state.
        } else if (typeof base._path === 'string' && '#' === c) {
          url._scheme = base._scheme;
          url._path = base._path;
          url._query = base._query;
          url._fragment = '';
          state = ParserState.FRAGMENT;
        // 3. Otherwise, if base's scheme is not "file", set state to relative state and decrease pointer by 1.
        } else if ('file' !== base._scheme) {
          state = ParserState.RELATIVE;
          pointer -= 1;
        // 4. Otherwise, set state to file state and decrease pointer by 1.
        } else {
          state = ParserState.FILE;
          pointer -= 1;
        }
        break;
      }

      case ParserState.SPECIAL_RELATIVE_OR_AUTHORITY:
        // 1. If c is U+002F (/) and remaining starts with U+002F (/), then set state to
        //    special authority ignore slashes state and increase pointer by 1.
        // 2. Otherwise, special-scheme-missing-following-solidus validation error,
        //    set state to relative state and decrease pointer by 1.
        if ('/' === c && remainingStartsWith(pointer, '/')) {
          state = ParserState.SPECIAL_AUTHORITY_IGNORE_SLASHES;
          pointer += 1;
        } else {
          err('special-scheme-missing-following-solidus');
          state = ParserState.RELATIVE;
          pointer -= 1;
        }
        break;

      case ParserState.PATH_OR_AUTHORITY:
        // 1. If c is U+002F (/), then set state to authority state.
        // 2. Otherwise, set state to path state, and decrease pointer by 1.
        if ('/' === c) {
          state = ParserState.AUTHORITY;
        } else {
          state = ParserState.PATH;
          pointer -= 1;
        }
        break;

      case ParserState.RELATIVE: {
        // 1. Assert: base's scheme is not "file".
        // 2. Set url's scheme to base's scheme.
        const baseUrl = requireBase();
        url._scheme = baseUrl._scheme;
        // 3. If c is U+002F (/), then set state to relative slash state.
        if ('/' === c) {
          state = ParserState.RELATIVE_SLASH;
        // 4. Otherwise, if url is special and c is U+005C (\), invalid-reverse-solidus validation error,
        //    set state to relative slash state.
        } else if (isSpecial(url) && '\\' === c) {
          err('invalid-reverse-solidus');
          state = ParserState.RELATIVE_SLASH;
        // 5. Otherwise:
        } else {
          // 1. Set url's username, password, host, port, path and query to those of base.
          copyAuthority(url, baseUrl);
          url._path = copyPath(baseUrl);
          url._query = baseUrl._query;
          // 2. If c is U+003F (?), then set url's query to the empty string, and state to query state.
          // 3. Otherwise, if c is U+0023 (#), set url's fragment to the empty string and state to fragment state.
          if ('?' === c) {
            url._query = '';
            state = ParserState.QUERY;
          } else if ('#' === c) {
            url._fragment = '';
            state = ParserState.FRAGMENT;
          // 4. Otherwise, if c is not the EOF code point: set url's query to null, shorten url's path,
          //    set state to path state and decrease pointer by 1.
          } else if (c !== undefined) {
            url._query = null;
            shortenPath(url);
            state = ParserState.PATH;
            pointer -= 1;
          }
        }
        break;
      }

      case ParserState.RELATIVE_SLASH:
        // 1. If url is special and c is U+002F (/) or U+005C (\), then set state to special authority ignore slashes state.
        if (isSpecial(url) && ('/' === c || '\\' === c)) {
          if ('\\' === c) {
            err('invalid-reverse-solidus');
          }
          state = ParserState.SPECIAL_AUTHORITY_IGNORE_SLASHES;
        // 2. Otherwise, if c is U+002F (/), then set state to authority state.
        } else if ('/' === c) {
          state = ParserState.AUTHORITY;
        // 3. Otherwise, take base's authority, set state to path state, and decrease pointer by 1.
        } else {
          copyAuthority(url, requireBase());
          state = ParserState.PATH;
          pointer -= 1;
        }
        break;

      case ParserState.SPECIAL_AUTHORITY_SLASHES:
        // 1. If c is U+002F (/) and remaining starts with U+002F (/), then set state to
        //    special authority ignore slashes state and increase pointer by 1.
        // 2. Otherwise, special-scheme-missing-following-solidus validation error,
        //    set state to special authority ignore slashes state and decrease pointer by 1.
        if ('/' === c && remainingStartsWith(pointer, '/')) {
          state = ParserState.SPECIAL_AUTHORITY_IGNORE_SLASHES;
          pointer += 1;
        } else {
          err('special-scheme-missing-following-solidus');
          state = ParserState.SPECIAL_AUTHORITY_IGNORE_SLASHES;
          pointer -= 1;
        }
        break;

      case ParserState.SPECIAL_AUTHORITY_IGNORE_SLASHES:
        // 1. If c is neither U+002F (/) nor U+005C (\), then set state to authority state and decrease pointer by 1.
        // 2. Otherwise, special-scheme-missing-following-solidus validation error.
        if ('/' !== c && '\\' !== c) {
          state = ParserState.AUTHORITY;
          pointer -= 1;
        } else {
          err('special-scheme-missing-following-solidus');
        }
        break;

      case ParserState.AUTHORITY:
        // 1. If c is U+0040 (@), then:
        if ('@' === c) {
          // 1. Invalid-credentials validation error.
          err('invalid-credentials');
          // 2. If atSignSeen is true, then prepend "%40" to buffer.
          if (atSignSeen) {
            buffer = '%40' + buffer;
          }
          // 3. Set atSignSeen to true.
          atSignSeen = true;
          // 4. For each codePoint in buffer:
          for (const codePoint of buffer) {
            // 1. If codePoint is U+003A (:) and passwordTokenSeen is false, then set passwordTokenSeen to true and continue.
            if (':' === codePoint && !passwordTokenSeen) {
              passwordTokenSeen = true;
              continue;
            }
            // 2. Let encodedCodePoints be the result of running UTF-8 percent-encode codePoint
            //    using the userinfo percent-encode set.
            // 3. Append encodedCodePoints to url's password if passwordTokenSeen is true, to its username otherwise.
            const encodedCodePoints = utf8PercentEncodeCodePoint(codePoint, isUserinfoPercentEncode);
            if (passwordTokenSeen) {
              url._password += encodedCodePoints;
            } else {
              url._username += encodedCodePoints;
            }
          }
          // 5. Set buffer to the empty string.
          buffer = '';
        // 2. Otherwise, if c is the EOF code point, U+002F (/), U+003F (?), or U+0023 (#),
        //    or url is special and c is U+005C (\), then:
        } else if (
            (c === undefined || '/' === c || '?' === c || '#' === c) ||
            (isSpecial(url) && '\\' === c)
        ) {
          // 1. If atSignSeen is true and buffer is the empty string, host-missing validation error, return failure.
          if (atSignSeen && '' === buffer) {
            // e.g. http://user@/foo
            err('host-missing');
            throw new InvalidHostError('', 'missing host after credentials');
          }
          // 2. Decrease pointer by buffer's code point length + 1, set buffer to the empty string,
          //    and set state to host state.
          pointer -= Array.from(buffer).length + 1;
          buffer = '';
          state = ParserState.HOST;
        // 3. Otherwise, append c to buffer.
        } else {
          buffer += c;
        }
        break;

      case ParserState.HOST:
      case ParserState.HOSTNAME:
        // 1. If state override is given and url's scheme is "file", then decrease pointer by 1
        //    and set state to file host state.
        if (stateOverride !== null && 'file' === url._scheme) {
          pointer -= 1;
          state = ParserState.FILE_HOST;
        // 2. Otherwise, if c is U+003A (:) and insideBrackets is false, then:
        } else if (':' === c && !insideBrackets) {
          // 1. If buffer is the empty string, host-missing validation error, return failure.
          if ('' === buffer) {
            err('host-missing');
            throw new InvalidHostError('', 'missing host before port');
          }
          // 2. If state override is given and state override is hostname state, then return.
          if (stateOverride === ParserState.HOSTNAME) {
            return false;
          }
          // 3-5. Host-parse buffer, set url's host, clear buffer, and set state to port state.
          url._host = parseHost(buffer, !isSpecial(url));
          buffer = '';
          state = ParserState.PORT;
        } else if (
            (c === undefined || '/' === c || '?' === c || '#' === c) ||
            (isSpecial(url) && '\\' === c)
        ) {
          // 1. Decrease pointer by 1.
          pointer -= 1;
          // 2. If url is special and buffer is the empty string, host-missing validation error, return failure.
          if (isSpecial(url) && '' === buffer) {
            err('host-missing');
            throw new InvalidHostError('', 'special URLs need a host');
          // 3. Otherwise, if state override is given, buffer is the empty string, and either url includes
          //    credentials or url's port is non-null, return.
          } else if (stateOverride !== null && '' === buffer && (includesCredentials(url) || url._port !== null)) {
            return false;
          }
          // 4-6. Host-parse buffer, set url's host, clear buffer, and set state to path start state.
          url._host = parseHost(buffer, !isSpecial(url));
          buffer = '';
          state = ParserState.PATH_START;
          // 7. If state override is given, then return.
          if (stateOverride !== null) {
            return true;
          }
        // 4. Otherwise: track brackets and append c to buffer.
        } else {
          if ('[' === c) {
            insideBrackets = true;
          } else if (']' === c) {
            insideBrackets = false;
          }
          buffer += c;
        }
        break;

      case ParserState.PORT:
        // 1. If c is an ASCII digit, append c to buffer.
        if (c !== undefined && isASCIIDigit(codePointOf(c))) {
          buffer += c;
        } else if (
            (c === undefined || '/' === c || '?' === c || '#' === c) ||
            (isSpecial(url) && '\\' === c) ||
            stateOverride !== null
        ) {
          // 1. If buffer is not the empty string, then:
          if ('' !== buffer) {
            // 1. Let port be the mathematical integer value that is represented by buffer in radix-10.
            // 2. If port is greater than 2^16 - 1, port-out-of-range validation error, return failure.
            const port = parseInt(buffer, 10);
            if (port > 2 ** 16 - 1) {
              err('port-out-of-range');
              throw new InvalidPortError(buffer);
            }
            // 3. Set url's port to null if port is url's scheme's default port, and to port otherwise.
            url._port = (port === defaultPort(url._scheme)) ? null : port;
            // 4. Set buffer to the empty string.
            buffer = '';
            // 5. If state override is given, then return.
            if (stateOverride !== null) {
              return true;
            }
          }
          // 2. If state override is given, then return failure.
          if (stateOverride !== null) {
            return false;
          }
          // 3. Set state to path start state and decrease pointer by 1.
          state = ParserState.PATH_START;
          pointer -= 1;
        // 3. Otherwise, port-invalid validation error, return failure.
        } else {
          err('port-invalid');
          throw new InvalidPortError(buffer + c);
        }
        break;

      case ParserState.FILE:
        // 1. Set url's scheme to "file".
        // 2. Set url's host to the empty string.
        url._scheme = 'file';
        url._host = EMPTY_HOST;
        // 3. If c is U+002F (/) or U+005C (\), then set state to file slash state.
        if ('/' === c || '\\' === c) {
          if ('\\' === c) {
            err('invalid-reverse-solidus');
          }
          state = ParserState.FILE_SLASH;
        // 4. Otherwise, if base is non-null and base's scheme is "file":
        } else if (base !== null && 'file' === base._scheme) {
          // 1. Set url's host, path and query to those of base.
          url._host = base._host;
          url._path = copyPath(base);
          url._query = base._query;
          if ('?' === c) {
            url._query = '';
            state = ParserState.QUERY;
          } else if ('#' === c) {
            url._fragment = '';
            state = ParserState.FRAGMENT;
          // 4. Otherwise, if c is not the EOF code point: set url's query to null, shorten url's path unless
          //    the rest of input starts with a Windows drive letter, then set state to path state.
          } else if (c !== undefined) {
            url._query = null;
            if (!startsWithWindowsDriveLetter(codePoints, pointer)) {
              shortenPath(url);
            } else {
              err('file-invalid-Windows-drive-letter');
              url._path = [];
            }
            state = ParserState.PATH;
            pointer -= 1;
          }
        // 5. Otherwise, set state to path state, and decrease pointer by 1.
        } else {
          state = ParserState.PATH;
          pointer -= 1;
        }
        break;

      case ParserState.FILE_SLASH:
        // 1. If c is U+002F (/) or U+005C (\), then set state to file host state.
        if ('/' === c || '\\' === c) {
          if ('\\' === c) {
            err('invalid-reverse-solidus');
          }
          state = ParserState.FILE_HOST;
        // 2. Otherwise:
        } else {
          // 1. If base is non-null and base's scheme is "file", take base's host, and its first path
          //    segment when that is a normalized Windows drive letter.
          if (base !== null && 'file' === base._scheme) {
            url._host = base._host;
            if (!startsWithWindowsDriveLetter(codePoints, pointer)
                && typeof base._path !== 'string'
                && base._path.length > 0
                && isNormalizedWindowsDriveLetter(base._path[0])) {
              pathSegments(url).push(base._path[0]);
            }
          }
          state = ParserState.PATH;
          pointer -= 1;
        }
        break;

      case ParserState.FILE_HOST:
        // 1. If c is the EOF code point, U+002F (/), U+005C (\), U+003F (?), or U+0023 (#),
        //    then decrease pointer by 1 and then:
        if (c === undefined || '/' === c || '\\' === c || '?' === c || '#' === c) {
          pointer -= 1;
          // 1. If state override is not given and buffer is a Windows drive letter,
          //    file-invalid-Windows-drive-letter-host validation error, set state to path state.
          if (stateOverride === null && isWindowsDriveLetter(buffer)) {
            // The buffer is kept and becomes the first path segment.
            err('file-invalid-Windows-drive-letter-host');
            state = ParserState.PATH;
          // 2. Otherwise, if buffer is the empty string, then set url's host to the empty string.
          } else if ('' === buffer) {
            url._host = EMPTY_HOST;
            if (stateOverride !== null) {
              return true;
            }
            state = ParserState.PATH_START;
          // 3. Otherwise, host-parse buffer; "localhost" becomes the empty host.
          } else {
            let host = parseHost(buffer, !isSpecial(url));
            if (host._type === HostType.DOMAIN && 'localhost' === host._domain) {
              host = EMPTY_HOST;
            }
            url._host = host;
            if (stateOverride !== null) {
              return true;
            }
            buffer = '';
            state = ParserState.PATH_START;
          }
        // 2. Otherwise, append c to buffer.
        } else {
          buffer += c;
        }
        break;

      case ParserState.PATH_START:
        // 1. If url is special, then set state to path state and decrease pointer by 1
        //    unless c is U+002F (/) or U+005C (\).
        if (isSpecial(url)) {
          if ('\\' === c) {
            err('invalid-reverse-solidus');
          }
          state = ParserState.PATH;
          if ('/' !== c && '\\' !== c) {
            pointer -= 1;
          }
        // 2. Otherwise, if state override is not given and c is U+003F (?), start the query.
        } else if (stateOverride === null && '?' === c) {
          url._query = '';
          state = ParserState.QUERY;
        // 3. Otherwise, if state override is not given and c is U+0023 (#), start the fragment.
        } else if (stateOverride === null && '#' === c) {
          url._fragment = '';
          state = ParserState.FRAGMENT;
        // 4. Otherwise, if c is not the EOF code point, set state to path state,
        //    and decrease pointer by 1 if c is not U+002F (/).
        } else if (c !== undefined) {
          state = ParserState.PATH;
          if ('/' !== c) {
            pointer -= 1;
          }
        // 5. Otherwise, if state override is given and url's host is null, append the empty string to url's path.
        } else if (stateOverride !== null && url._host === null) {
          pathSegments(url).push('');
        }
        break;

      case ParserState.PATH: {
        const isSlash = '/' === c || (isSpecial(url) && '\\' === c);
        // 1. If one of the following is true: c is the EOF code point or U+002F (/); url is special and c is
        //    U+005C (\); state override is not given and c is U+003F (?) or U+0023 (#); then:
        if (c === undefined || isSlash || (stateOverride === null && ('?' === c || '#' === c))) {
          // 1. If url is special and c is U+005C (\), invalid-reverse-solidus validation error.
          if ('\\' === c && isSlash) {
            err('invalid-reverse-solidus');
          }
          // 2. If buffer is a double-dot URL path segment, then shorten url's path and,
          //    unless c is a slash, append the empty string to url's path.
          if (isDoubleDotPathSegment(buffer)) {
            shortenPath(url);
            if (!isSlash) {
              pathSegments(url).push('');
            }
          // 3. Otherwise, if buffer is a single-dot URL path segment and c is not a slash,
          //    append the empty string to url's path.
          } else if (isSingleDotPathSegment(buffer)) {
            if (!isSlash) {
              pathSegments(url).push('');
            }
          // 4. Otherwise, if buffer is not a single-dot URL path segment, then:
          } else {
            // 1. If url's scheme is "file", url's path is empty, and buffer is a Windows drive letter,
            //    then replace the second code point in buffer with U+003A (:).
            // 2. Append buffer to url's path.
            const path = pathSegments(url);
            if ('file' === url._scheme && path.length === 0 && isWindowsDriveLetter(buffer)) {
              buffer = buffer[0] + ':';
            }
            path.push(buffer);
          }
          // 5. Set buffer to the empty string.
          buffer = '';
          // 6. If c is U+003F (?), start the query.
          // 7. If c is U+0023 (#), start the fragment.
          if ('?' === c) {
            url._query = '';
            state = ParserState.QUERY;
          } else if ('#' === c) {
            url._fragment = '';
            state = ParserState.FRAGMENT;
          }
        // 2. Otherwise: report invalid URL units, then UTF-8 percent-encode c using the path
        //    percent-encode set and append the result to buffer.
        } else {
          checkPercentEscape(pointer, c);
          buffer += utf8PercentEncodeCodePoint(c, isPathPercentEncode);
        }
        break;
      }

      case ParserState.OPAQUE_PATH:
        // 1. If c is U+003F (?), then set url's query to the empty string and state to query state.
        if ('?' === c) {
          url._query = '';
          state = ParserState.QUERY;
        // 2. Otherwise, if c is U+0023 (#), then set url's fragment to the empty string and state to fragment state.
        } else if ('#' === c) {
          url._fragment = '';
          state = ParserState.FRAGMENT;
        // 3. Otherwise, if c is not the EOF code point, UTF-8 percent-encode c using the C0 control
        //    percent-encode set and append the result to url's path.
        } else if (c !== undefined) {
          checkPercentEscape(pointer, c);
          url._path = (typeof url._path === 'string' ? url._path : '')
              + utf8PercentEncodeCodePoint(c, isC0ControlPercentEncode);
        }
        break;

      case ParserState.QUERY:
        // 1. If c is the EOF code point, or state override is not given and c is U+0023 (#), then:
        if (c === undefined || (stateOverride === null && '#' === c)) {
          // 1. Let queryPercentEncodeSet be the special-query percent-encode set if url is special;
          //    otherwise the query percent-encode set.
          // 2. Percent-encode buffer with it and append the result to url's query.
          const queryPercentEncodeSet = isSpecial(url) ? isSpecialQueryPercentEncode : isQueryPercentEncode;
          url._query = (url._query ?? '') + utf8PercentEncodeString(buffer, queryPercentEncodeSet);
          // 3. Set buffer to the empty string.
          // 4. If c is U+0023 (#), then set url's fragment to the empty string and state to fragment state.
          buffer = '';
          if ('#' === c) {
            url._fragment = '';
            state = ParserState.FRAGMENT;
          }
        // 2. Otherwise, if c is not the EOF code point, append c to buffer.
        } else {
          checkPercentEscape(pointer, c);
          buffer += c;
        }
        break;

      case ParserState.FRAGMENT:
        // 1. If c is not the EOF code point, UTF-8 percent-encode c using the fragment percent-encode set
        //    and append the result to url's fragment.
        if (c !== undefined) {
          checkPercentEscape(pointer, c);
          url._fragment = (url._fragment ?? '') + utf8PercentEncodeCodePoint(c, isFragmentPercentEncode);
        }
        break;
    }

    if (pointer >= length) {
      break;
    }
    pointer++;
  }

  return stateOverride !== null ? true : url;
}
