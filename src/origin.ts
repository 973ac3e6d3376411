import { serializeHost } from "./host";
import type { Host } from "./host";
import { basicParse } from "./parser";
import { serializePath } from "./serialize";
import type { UrlRecord } from "./record";

// https://html.spec.whatwg.org/multipage/origin.html#concept-origin-tuple
export interface TupleOrigin {
  readonly opaque: false;
  readonly scheme: string;
  readonly host: Host;
  readonly port: number | null;
}

// https://html.spec.whatwg.org/multipage/origin.html#concept-origin-opaque
export interface OpaqueOrigin {
  readonly opaque: true;
}

export type Origin = TupleOrigin | OpaqueOrigin;

const OPAQUE: OpaqueOrigin = { opaque: true };

// https://html.spec.whatwg.org/multipage/origin.html#ascii-serialisation-of-an-origin
export const OPAQUE_ORIGIN = 'null';

// https://url.spec.whatwg.org/#concept-url-origin
export function getOrigin(url: UrlRecord): Origin {
  switch (url._scheme) {
    case 'blob': {
      let pathUrl: UrlRecord;
      try {
        pathUrl = basicParse(serializePath(url), null);
      } catch (e) {
        if (e instanceof TypeError) {
          // The path is not a URL of its own.
          return OPAQUE;
        }
        throw e;
      }
      if ('http' === pathUrl._scheme || 'https' === pathUrl._scheme || 'file' === pathUrl._scheme) {
        return getOrigin(pathUrl);
      }
      return OPAQUE;
    }
    case 'ftp':
    case 'http':
    case 'https':
    case 'ws':
    case 'wss':
      if (url._host === null) {
        return OPAQUE;
      }
      return {
        opaque: false,
        scheme: url._scheme,
        host: url._host,
        port: url._port
      };
    default:
      // file: and every non-special scheme.
      return OPAQUE;
  }
}

export function serializeOrigin(origin: Origin): string {
  if (origin.opaque) {
    return OPAQUE_ORIGIN;
  }
  return `${origin.scheme}://${serializeHost(origin.host)}${origin.port === null ? '' : `:${origin.port}`}`;
}
