/**
 * Error classes thrown by the parser and the IDNA layer.
 *
 * All of them extend `TypeError`, which is what the URL Standard throws on failure,
 * and carry a stable `code` for programmatic checks.
 * @module
 */

export class InvalidUrlError extends TypeError {
  public readonly code = 'ERR_INVALID_URL';
  public readonly input: string;
  public readonly base: string | undefined;

  constructor(input: string, base?: string, options?: { cause?: unknown }) {
    super(`Invalid URL: "${input}"${base === undefined ? '' : ` (base: "${base}")`}`, options);
    this.name = 'InvalidUrlError';
    this.input = input;
    this.base = base;
  }
}

export class InvalidHostError extends TypeError {
  public readonly code = 'ERR_INVALID_HOST';
  public readonly host: string;

  constructor(host: string, reason: string) {
    super(`Invalid host "${host}": ${reason}`);
    this.name = 'InvalidHostError';
    this.host = host;
  }
}

export class InvalidPortError extends TypeError {
  public readonly code = 'ERR_INVALID_PORT';
  public readonly port: string;

  constructor(port: string) {
    super(`Invalid port "${port}"`);
    this.name = 'InvalidPortError';
    this.port = port;
  }
}

export class IdnaError extends TypeError {
  public readonly code = 'ERR_IDNA';
  public readonly domain: string;

  constructor(domain: string, options?: { cause?: unknown }) {
    super(`Cannot convert domain "${domain}" to ASCII`, options);
    this.name = 'IdnaError';
    this.domain = domain;
  }
}

export class InvalidConfigurationError extends TypeError {
  public readonly code = 'ERR_INVALID_CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
