import { isSequence, stableSort } from "./util";
import { parseUrlEncoded, serializeUrlEncoded } from "./urlencode";
import type { NameValuePair } from "./urlencode";
import { toUSVString } from "./usvstring";

export type URLSearchParamsInit = string | Iterable<Iterable<string>> | Record<string, string>;

// Names are compared by UTF-16 code units, which is what < does on strings.
function compareParams([name1]: NameValuePair, [name2]: NameValuePair): number {
  return (name1 === name2) ? 0 : (name1 < name2) ? -1 : 1;
}

/**
 * An ordered list of name-value pairs in the `application/x-www-form-urlencoded` format.
 *
 * Instances are never tied to a URL. To change a URL's query, serialize the params
 * and pass the result to `Url#setSearch`.
 */
export class URLSearchParams implements Iterable<NameValuePair> {
  private _list: NameValuePair[] = [];

  // https://url.spec.whatwg.org/#dom-urlsearchparams-urlsearchparams
  constructor(init: URLSearchParamsInit = '') {
    if (typeof init === 'string') {
      const query = toUSVString(init);
      this._list = parseUrlEncoded('?' === query[0] ? query.slice(1) : query);
    } else if (isSequence<Iterable<string>>(init)) {
      for (const rawPair of init) {
        const pair = Array.from(rawPair);
        if (pair.length !== 2) {
          throw new TypeError(`Each name-value pair must contain exactly two items, got ${pair.length}`);
        }
        this._list.push([toUSVString(pair[0]), toUSVString(pair[1])]);
      }
    } else {
      for (const name of Object.keys(init)) {
        this._list.push([toUSVString(name), toUSVString(init[name])]);
      }
    }
  }

  get size(): number {
    return this._list.length;
  }

  append(name: string, value: string): void {
    this._list.push([toUSVString(name), toUSVString(value)]);
  }

  /** Removes every pair named `name`, or only those whose value is also `value`. */
  delete(name: string, value?: string): void {
    name = toUSVString(name);
    const expected = value === undefined ? undefined : toUSVString(value);
    this._list = this._list.filter(([n, v]) => !(n === name && (expected === undefined || v === expected)));
  }

  get(name: string): string | null {
    name = toUSVString(name);
    const pair = this._list.find(([n]) => n === name);
    return pair === undefined ? null : pair[1];
  }

  getAll(name: string): string[] {
    name = toUSVString(name);
    return this._list.filter(([n]) => n === name).map(([, v]) => v);
  }

  has(name: string, value?: string): boolean {
    name = toUSVString(name);
    const expected = value === undefined ? undefined : toUSVString(value);
    return this._list.some(([n, v]) => n === name && (expected === undefined || v === expected));
  }

  // The first pair named `name` keeps its position, the others are removed.
  set(name: string, value: string): void {
    name = toUSVString(name);
    value = toUSVString(value);
    const list = this._list;
    let found = false;
    let index = 0;
    while (index < list.length) {
      const tuple = list[index];
      if (tuple[0] === name) {
        if (found) {
          list.splice(index, 1);
        } else {
          tuple[1] = value;
          found = true;
          index++;
        }
      } else {
        index++;
      }
    }
    if (!found) {
      list.push([name, value]);
    }
  }

  // Pairs with equal names keep their relative order.
  sort(): void {
    stableSort(this._list, compareParams);
  }

  forEach(callback: (value: string, name: string, params: URLSearchParams) => void): void {
    for (const [name, value] of this._list.slice()) {
      callback(value, name, this);
    }
  }

  toString(): string {
    return serializeUrlEncoded(this._list);
  }

  entries(): URLSearchParamsIterator<NameValuePair> {
    return new URLSearchParamsIterator(this._list, selectEntry);
  }

  keys(): URLSearchParamsIterator<string> {
    return new URLSearchParamsIterator(this._list, selectKey);
  }

  values(): URLSearchParamsIterator<string> {
    return new URLSearchParamsIterator(this._list, selectValue);
  }

  [Symbol.iterator](): URLSearchParamsIterator<NameValuePair> {
    return this.entries();
  }
}

type PairSelector<T> = (pair: Readonly<NameValuePair>) => T;

const selectEntry: PairSelector<NameValuePair> = pair => [pair[0], pair[1]];
const selectKey: PairSelector<string> = pair => pair[0];
const selectValue: PairSelector<string> = pair => pair[1];

/**
 * Iterates over the pairs as they were when the iterator was created.
 * Later changes to the params are not seen.
 */
export class URLSearchParamsIterator<T> implements IterableIterator<T> {
  private readonly _snapshot: ReadonlyArray<Readonly<NameValuePair>>;
  private readonly _selector: PairSelector<T>;
  private _index = 0;

  constructor(list: ReadonlyArray<Readonly<NameValuePair>>, selector: PairSelector<T>) {
    this._snapshot = list.map(([name, value]) => [name, value] as const);
    this._selector = selector;
  }

  next(): IteratorResult<T> {
    if (this._index < this._snapshot.length) {
      return { done: false, value: this._selector(this._snapshot[this._index++]) };
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): URLSearchParamsIterator<T> {
    return this;
  }
}
