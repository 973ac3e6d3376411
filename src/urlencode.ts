import { isFormUrlencodedPercentEncode, utf8PercentEncodeString, utf8StringPercentDecode } from "./encode";

export type NameValuePair = [name: string, value: string];

const PLUS = /\+/g;

// https://url.spec.whatwg.org/#concept-urlencoded-parser
export function parseUrlEncoded(input: string): NameValuePair[] {
  const output: NameValuePair[] = [];
  for (const sequence of input.split('&')) {
    if ('' === sequence) {
      continue;
    }
    const equalsIndex = sequence.indexOf('=');
    const name = equalsIndex === -1 ? sequence : sequence.slice(0, equalsIndex);
    const value = equalsIndex === -1 ? '' : sequence.slice(equalsIndex + 1);
    output.push([
      utf8StringPercentDecode(name.replace(PLUS, ' ')),
      utf8StringPercentDecode(value.replace(PLUS, ' '))
    ]);
  }
  return output;
}

// https://url.spec.whatwg.org/#concept-urlencoded-serializer
export function serializeUrlEncoded(tuples: ReadonlyArray<Readonly<NameValuePair>>): string {
  return tuples
      .map(([name, value]) => `${serializeUrlEncodedString(name)}=${serializeUrlEncodedString(value)}`)
      .join('&');
}

function serializeUrlEncodedString(input: string): string {
  return utf8PercentEncodeString(input, isFormUrlencodedPercentEncode, true);
}
