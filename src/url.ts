/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { isUserinfoPercentEncode, utf8PercentEncodeString } from "./encode";
import { errorMessage, InvalidUrlError } from "./errors";
import { serializeHost } from "./host";
import type { HostType } from "./host";
import { createLogger } from "./logger";
import { getOrigin, serializeOrigin } from "./origin";
import { basicParse, ParserState } from "./parser";
import { cannotHaveUsernamePasswordPort, cloneRecord, hasOpaquePath, includesCredentials, isSpecial, UrlRecord } from "./record";
import { URLSearchParams } from "./search-params";
import { serializePath, serializeUrlWithComponents } from "./serialize";
import type { UrlComponents } from "./serialize";
import { toUSVString } from "./usvstring";

const logger = createLogger('url');

function parseRecord(input: string, base?: string | Url): UrlRecord {
  let parsedBase: UrlRecord | null = null;
  const baseString = base === undefined ? undefined : `${base}`;
  if (base instanceof Url) {
    parsedBase = base._record;
  } else if (base !== undefined) {
    try {
      parsedBase = basicParse(toUSVString(base), null);
    } catch (e) {
      throw wrapParseError(e, input, baseString);
    }
  }
  try {
    return basicParse(toUSVString(input), parsedBase);
  } catch (e) {
    throw wrapParseError(e, input, baseString);
  }
}

// Parse failures surface as InvalidUrlError, with the host or port error as its cause.
function wrapParseError(error: unknown, input: string, base: string | undefined): unknown {
  if (error instanceof TypeError) {
    return new InvalidUrlError(input, base, { cause: error });
  }
  return error;
}

// https://url.spec.whatwg.org/#potentially-strip-trailing-spaces-from-an-opaque-path
function stripTrailingSpacesFromOpaquePath(url: UrlRecord): void {
  if (typeof url._path !== 'string' || url._fragment !== null || url._query !== null) {
    return;
  }
  url._path = url._path.replace(/ +$/, '');
}

/**
 * A parsed URL.
 *
 * Setters run on a copy of the record and only commit it when the new value is accepted,
 * so a rejected value leaves the URL exactly as it was. The href and the component
 * offsets are recomputed on every commit.
 */
export class Url {
  private _url: UrlRecord;
  private _href: string;
  private _components: UrlComponents;

  constructor(input: string, base?: string | Url);
  /** @internal Wraps an already parsed record without serializing and parsing it again. */
  constructor(record: UrlRecord);
  constructor(input: string | UrlRecord, base?: string | Url) {
    this._url = input instanceof UrlRecord ? input : parseRecord(input, base);
    const { href, components } = serializeUrlWithComponents(this._url);
    this._href = href;
    this._components = components;
  }

  /** Same as `new Url(input, base)`. Throws an {@link InvalidUrlError} on failure. */
  static parse(input: string, base?: string | Url): Url {
    return new Url(input, base);
  }

  static canParse(input: string, base?: string | Url): boolean {
    try {
      parseRecord(input, base);
      return true;
    } catch (e) {
      if (e instanceof InvalidUrlError) {
        return false;
      }
      throw e;
    }
  }

  /** @internal */
  get _record(): UrlRecord {
    return this._url;
  }

  private _commit(url: UrlRecord): void {
    const { href, components } = serializeUrlWithComponents(url);
    this._url = url;
    this._href = href;
    this._components = components;
  }

  // Runs `apply` on a copy of the record and commits the copy if `apply` accepted the value.
  private _update(setter: string, value: string, apply: (url: UrlRecord, value: string) => boolean): boolean {
    const scratch = cloneRecord(this._url);
    let accepted: boolean;
    try {
      accepted = apply(scratch, toUSVString(value));
    } catch (e) {
      if (!(e instanceof TypeError)) {
        throw e;
      }
      logger.debug(`${setter}("${value}") failed on ${this._href}: ${errorMessage(e)}`);
      return false;
    }
    if (!accepted) {
      logger.debug(`${setter}("${value}") rejected on ${this._href}`);
      return false;
    }
    this._commit(scratch);
    return true;
  }

  toString(): string {
    return this._href;
  }

  toJSON(): string {
    return this._href;
  }

  get href(): string {
    return this._href;
  }

  setHref(href: string): boolean {
    let parsed: UrlRecord;
    try {
      parsed = basicParse(toUSVString(href), null);
    } catch (e) {
      if (!(e instanceof TypeError)) {
        throw e;
      }
      logger.debug(`setHref("${href}") failed: ${errorMessage(e)}`);
      return false;
    }
    this._commit(parsed);
    return true;
  }

  get origin(): string {
    return serializeOrigin(getOrigin(this._url));
  }

  get protocol(): string {
    return `${this._url._scheme}:`;
  }

  setProtocol(protocol: string): boolean {
    return this._update('setProtocol', protocol,
        (url, value) => basicParse(`${value}:`, null, url, ParserState.SCHEME_START));
  }

  get username(): string {
    return this._url._username;
  }

  setUsername(username: string): boolean {
    return this._update('setUsername', username, (url, value) => {
      if (cannotHaveUsernamePasswordPort(url)) {
        return false;
      }
      url._username = utf8PercentEncodeString(value, isUserinfoPercentEncode);
      return true;
    });
  }

  get password(): string {
    return this._url._password;
  }

  setPassword(password: string): boolean {
    return this._update('setPassword', password, (url, value) => {
      if (cannotHaveUsernamePasswordPort(url)) {
        return false;
      }
      url._password = utf8PercentEncodeString(value, isUserinfoPercentEncode);
      return true;
    });
  }

  get host(): string {
    const url = this._url;
    if (null === url._host) {
      return '';
    }
    if (null === url._port) {
      return serializeHost(url._host);
    }
    return `${serializeHost(url._host)}:${url._port}`;
  }

  /** Accepts `host` or `host:port`. */
  setHost(host: string): boolean {
    return this._update('setHost', host, (url, value) => {
      if (hasOpaquePath(url)) {
        return false;
      }
      return basicParse(value, null, url, ParserState.HOST);
    });
  }

  get hostname(): string {
    return null === this._url._host ? '' : serializeHost(this._url._host);
  }

  setHostname(hostname: string): boolean {
    return this._update('setHostname', hostname, (url, value) => {
      if (hasOpaquePath(url)) {
        return false;
      }
      return basicParse(value, null, url, ParserState.HOSTNAME);
    });
  }

  get port(): string {
    return null === this._url._port ? '' : `${this._url._port}`;
  }

  /** An empty string removes the port. Anything after the leading digits is ignored. */
  setPort(port: string): boolean {
    return this._update('setPort', port, (url, value) => {
      if (cannotHaveUsernamePasswordPort(url)) {
        return false;
      }
      if ('' === value) {
        url._port = null;
        return true;
      }
      return basicParse(value, null, url, ParserState.PORT);
    });
  }

  get pathname(): string {
    return serializePath(this._url);
  }

  setPathname(pathname: string): boolean {
    return this._update('setPathname', pathname, (url, value) => {
      if (hasOpaquePath(url)) {
        return false;
      }
      url._path = [];
      return basicParse(value, null, url, ParserState.PATH_START);
    });
  }

  get search(): string {
    if (null === this._url._query || '' === this._url._query) {
      return '';
    }
    return `?${this._url._query}`;
  }

  /** An empty string removes the query. A single leading `?` is ignored. */
  setSearch(search: string): void {
    this._update('setSearch', search, (url, value) => {
      if ('' === value) {
        url._query = null;
        stripTrailingSpacesFromOpaquePath(url);
        return true;
      }
      url._query = '';
      return basicParse('?' === value[0] ? value.slice(1) : value, null, url, ParserState.QUERY);
    });
  }

  /**
   * A copy of the query as name-value pairs.
   * Changes to the returned object do not affect this URL; write them back with
   * `url.setSearch(params.toString())`.
   */
  get searchParams(): URLSearchParams {
    return new URLSearchParams(this._url._query ?? '');
  }

  get hash(): string {
    if (null === this._url._fragment || '' === this._url._fragment) {
      return '';
    }
    return `#${this._url._fragment}`;
  }

  /** An empty string removes the fragment. A single leading `#` is ignored. */
  setHash(hash: string): void {
    this._update('setHash', hash, (url, value) => {
      if ('' === value) {
        url._fragment = null;
        stripTrailingSpacesFromOpaquePath(url);
        return true;
      }
      url._fragment = '';
      return basicParse('#' === value[0] ? value.slice(1) : value, null, url, ParserState.FRAGMENT);
    });
  }

  clearPort(): void {
    const url = cloneRecord(this._url);
    url._port = null;
    this._commit(url);
  }

  clearSearch(): void {
    this.setSearch('');
  }

  clearHash(): void {
    this.setHash('');
  }

  get components(): UrlComponents {
    return this._components;
  }

  get hostType(): HostType | null {
    return null === this._url._host ? null : this._url._host._type;
  }

  get isSpecial(): boolean {
    return isSpecial(this._url);
  }

  get hasOpaquePath(): boolean {
    return hasOpaquePath(this._url);
  }

  get hasCredentials(): boolean {
    return includesCredentials(this._url);
  }

  get hasHostname(): boolean {
    return null !== this._url._host;
  }

  get hasEmptyHostname(): boolean {
    return null !== this._url._host && '' === serializeHost(this._url._host);
  }

  get hasPort(): boolean {
    return null !== this._url._port;
  }

  get hasPassword(): boolean {
    return '' !== this._url._password;
  }

  get hasNonEmptyUsername(): boolean {
    return '' !== this._url._username;
  }

  get hasNonEmptyPassword(): boolean {
    return '' !== this._url._password;
  }

  get hasSearch(): boolean {
    return null !== this._url._query;
  }

  get hasHash(): boolean {
    return null !== this._url._fragment;
  }

  clone(): Url {
    return new Url(cloneRecord(this._url));
  }

  equals(other: Url): boolean {
    return this._href === other._href;
  }

  /** Orders URLs by their href, comparing UTF-16 code units. */
  compare(other: Url): number {
    return (this._href === other._href) ? 0 : (this._href < other._href) ? -1 : 1;
  }
}

/** Parses `input` against an optional `base`. Throws an {@link InvalidUrlError} on failure. */
export function parse(input: string, base?: string | Url): Url {
  return new Url(input, base);
}

export function canParse(input: string, base?: string | Url): boolean {
  return Url.canParse(input, base);
}
