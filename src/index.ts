export { Url, parse, canParse } from "./url";
export { URLSearchParams, URLSearchParamsIterator } from "./search-params";
export type { URLSearchParamsInit } from "./search-params";
export type { NameValuePair } from "./urlencode";
export { OMITTED } from "./serialize";
export type { UrlComponents } from "./serialize";
export { HostType } from "./host";
export { toAscii, toUnicode } from "./idna";
export {
  IdnaError,
  InvalidConfigurationError,
  InvalidHostError,
  InvalidPortError,
  InvalidUrlError
} from "./errors";
export { getUrlConfig, resetUrlConfig, setUrlConfig } from "./config";
export type { LogLevel, UrlConfig } from "./config";
export type { ValidationError, ValidationErrorType } from "./validation";
