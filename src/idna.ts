import uts46 from "idna-uts46";
import { getUrlConfig } from "./config";
import { errorMessage, IdnaError } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger('idna');

/**
 * Unicode ToASCII (UTS #46) with nontransitional processing.
 * Throws an {@link IdnaError} when the domain cannot be converted.
 */
export function toAscii(domain: string): string {
  const beStrict = getUrlConfig().strictDomains;
  try {
    return uts46.toAscii(domain, {
      transitional: false,
      useStd3ASCII: beStrict,
      verifyDnsLength: beStrict
    });
  } catch (e) {
    throw new IdnaError(domain, { cause: e });
  }
}

/**
 * Unicode ToUnicode (UTS #46). A domain that fails to convert is returned unchanged.
 */
export function toUnicode(domain: string): string {
  try {
    return uts46.toUnicode(domain, { useStd3ASCII: false });
  } catch (e) {
    logger.debug(`toUnicode("${domain}") kept the input: ${errorMessage(e)}`);
    return domain;
  }
}
