// https://github.com/jcranmer/idna-uts46
declare module 'idna-uts46' {

  interface ToAsciiOptions {
    transitional?: boolean;
    useStd3ASCII?: boolean;
    verifyDnsLength?: boolean;
  }

  interface ToUnicodeOptions {
    useStd3ASCII?: boolean;
  }

  const uts46: {
    toAscii(domain: string, options?: ToAsciiOptions): string;
    toUnicode(domain: string, options?: ToUnicodeOptions): string;
  };

  export = uts46;
}
