/**
 * @packageDocumentation
 * @module @backstub/core
 *
 * Backstub Core Package
 *
 * The request and response model shared by backstub backends: request
 * descriptions with parsed URIs, response-decoding specs, raw stubbed bodies
 * and the effect wrappers that decide whether a backend answers
 * synchronously or with a promise.
 */

// Models
export { default as HttpRequest, isHttpMethod } from "./models/http-request";
export type { HttpMethod, RequestConfig } from "./models/http-request";
export { default as Uri } from "./models/uri";
export { isSuccessStatus, statusTextFor } from "./models/http-response";
export type { HttpResponse, ResponseBody } from "./models/http-response";

// Bodies and decoding
export {
  TextBody,
  BytesBody,
  StreamBody,
  OpaqueBody,
  isRawBody,
  toRawBody,
  streamOf,
  describeRawBody,
  toJsonText,
} from "./body/raw-body";
export type { RawBody } from "./body/raw-body";
export {
  ResponseAs,
  IgnoreResponse,
  ResponseAsString,
  ResponseAsByteArray,
  ResponseAsAny,
  MappedResponseAs,
  ignore,
  asString,
  asByteArray,
  asAny,
} from "./body/response-as";
export {
  decodeText,
  decodeBytes,
  decodeAny,
  matched,
  mismatch,
} from "./body/decoders";
export type { Adjusted } from "./body/decoders";
export { adjustBody } from "./body/body-adjuster";

// Backends and effects
export type { Backend } from "./backend";
export { syncEffect, asyncEffect } from "./effect";
export type {
  EffectKind,
  EffectKinds,
  EffectWrapper,
  Wrapped,
} from "./effect";

// Configuration, logging and errors
export { config, parseLogLevel } from "./config";
export type { LogLevelName } from "./config";
export { Logger, LogLevel, createLogger } from "./utils/logger";
export type { LoggerOptions } from "./utils/logger";
export { InvalidUriError } from "./errors";
