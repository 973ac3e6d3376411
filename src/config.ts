import { InvalidConfigurationError } from "./errors";
import type { ValidationError } from "./validation";

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface UrlConfig {
  /** Lowest level written to the console. Defaults to `'silent'`. */
  readonly logLevel: LogLevel | 'silent';
  /**
   * Receives every non-fatal validation error encountered while parsing.
   * Validation errors never change the result of a parse.
   */
  readonly onValidationError: ((error: ValidationError) => void) | undefined;
  /**
   * The URL Standard's "beStrict" flag for domain to ASCII:
   * enables UseSTD3ASCIIRules and VerifyDnsLength. Defaults to `false`.
   */
  readonly strictDomains: boolean;
}

const DEFAULT_CONFIG: UrlConfig = {
  logLevel: 'silent',
  onValidationError: undefined,
  strictDomains: false
};

const LOG_LEVELS: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error', 'silent']);

let currentConfig: UrlConfig = DEFAULT_CONFIG;

export function getUrlConfig(): UrlConfig {
  return Object.freeze({ ...currentConfig });
}

export function setUrlConfig(config: Partial<UrlConfig>): void {
  if (config.logLevel !== undefined && !LOG_LEVELS.has(config.logLevel)) {
    throw new InvalidConfigurationError(`UrlConfig.logLevel must be one of ${[...LOG_LEVELS].join(', ')}.`);
  }
  if (config.onValidationError !== undefined && typeof config.onValidationError !== 'function') {
    throw new InvalidConfigurationError('UrlConfig.onValidationError must be a function.');
  }
  if (config.strictDomains !== undefined && typeof config.strictDomains !== 'boolean') {
    throw new InvalidConfigurationError('UrlConfig.strictDomains must be a boolean.');
  }
  currentConfig = { ...currentConfig, ...config };
}

export function resetUrlConfig(): void {
  currentConfig = DEFAULT_CONFIG;
}
