import { getUrlConfig } from "./config";
import type { LogLevel } from "./config";

const SEVERITY: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(sub: string): Logger;
}

export function createLogger(component: string): Logger {
  const log = (level: LogLevel, message: string) => {
    if (SEVERITY[level] < SEVERITY[getUrlConfig().logLevel]) return;
    console[level](`[urlcore:${component}] ${message}`);
  };
  return {
    debug: message => log('debug', message),
    info: message => log('info', message),
    warn: message => log('warn', message),
    error: message => log('error', message),
    child: sub => createLogger(`${component}:${sub}`)
  };
}
