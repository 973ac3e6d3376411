/* Any copyright is dedicated to the Public Domain.
* http://creativecommons.org/publicdomain/zero/1.0/ */

import { isEmptyHost } from "./host";
import type { Host } from "./host";

// https://url.spec.whatwg.org/#special-scheme
const defaultPorts: ReadonlyMap<string, number | null> = new Map<string, number | null>([
  ['ftp', 21],
  ['file', null],
  ['http', 80],
  ['https', 443],
  ['ws', 80],
  ['wss', 443]
]);

export function isSpecialScheme(scheme: string): boolean {
  return defaultPorts.has(scheme);
}

export function defaultPort(scheme: string): number | null {
  return defaultPorts.get(scheme) ?? null;
}

// https://url.spec.whatwg.org/#concept-url
export class UrlRecord {
  _scheme: string = '';
  _username: string = '';
  _password: string = '';
  _host: Host | null = null;
  _port: number | null = null;
  // A string is an opaque path, an array is a list of path segments.
  _path: string | string[] = [];
  _query: string | null = null;
  _fragment: string | null = null;
}

export function cloneRecord(url: UrlRecord): UrlRecord {
  const copy = new UrlRecord();
  copy._scheme = url._scheme;
  copy._username = url._username;
  copy._password = url._password;
  // Hosts are immutable values and can be shared.
  copy._host = url._host;
  copy._port = url._port;
  copy._path = typeof url._path === 'string' ? url._path : url._path.slice();
  copy._query = url._query;
  copy._fragment = url._fragment;
  return copy;
}

export function isSpecial(url: UrlRecord): boolean {
  return isSpecialScheme(url._scheme);
}

// https://url.spec.whatwg.org/#url-opaque-path
export function hasOpaquePath(url: UrlRecord): boolean {
  return typeof url._path === 'string';
}

// https://url.spec.whatwg.org/#include-credentials
export function includesCredentials(url: UrlRecord): boolean {
  return url._username !== '' || url._password !== '';
}

// https://url.spec.whatwg.org/#cannot-have-a-username-password-port
export function cannotHaveUsernamePasswordPort(url: UrlRecord): boolean {
  return null === url._host || isEmptyHost(url._host) || 'file' === url._scheme;
}
