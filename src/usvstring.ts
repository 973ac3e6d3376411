const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

// https://webidl.spec.whatwg.org/#dfn-obtain-unicode
// Every lone surrogate becomes U+FFFD; well-formed strings are returned as they are.
export function toUSVString(input: string): string {
  return input.replace(LONE_SURROGATE, '\uFFFD');
}
