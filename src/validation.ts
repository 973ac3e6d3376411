import { getUrlConfig } from "./config";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

// https://url.spec.whatwg.org/#validation-error
export type ValidationErrorType =
    | 'domain-to-ASCII'
    | 'domain-invalid-code-point'
    | 'host-invalid-code-point'
    | 'IPv4-empty-part'
    | 'IPv4-non-decimal-part'
    | 'IPv4-out-of-range-part'
    | 'invalid-URL-unit'
    | 'special-scheme-missing-following-solidus'
    | 'missing-scheme-non-relative-URL'
    | 'invalid-reverse-solidus'
    | 'invalid-credentials'
    | 'host-missing'
    | 'port-out-of-range'
    | 'port-invalid'
    | 'file-invalid-Windows-drive-letter'
    | 'file-invalid-Windows-drive-letter-host'
    | 'leading-or-trailing-control-or-space'
    | 'tab-or-newline';

export interface ValidationError {
  readonly type: ValidationErrorType;
  readonly input: string;
}

const logger = createLogger('validation');

export function reportValidationError(type: ValidationErrorType, input: string): void {
  logger.debug(`${type} in "${input}"`);
  const { onValidationError } = getUrlConfig();
  if (!onValidationError) {
    return;
  }
  // A failing hook is logged and the parse carries on.
  try {
    onValidationError({ type, input });
  } catch (e) {
    logger.warn(`onValidationError hook threw on ${type}: ${errorMessage(e)}`);
  }
}
