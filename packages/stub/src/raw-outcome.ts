import {
  decodeText,
  isSuccessStatus,
  statusTextFor,
  toJsonText,
  toRawBody,
  type HttpResponse,
  type RawBody,
  type ResponseAs,
  type ResponseBody,
} from "@backstub/core";
import { StubConfigurationError } from "./errors";
import type { StubResponse } from "./models/handlers";

/**
 * A stubbed response, body still undecoded.
 */
export interface ValueOutcome {
  readonly type: "value";
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: RawBody;
}

/**
 * A failure to raise when the request is sent, as a real transport would.
 */
export interface ThrownOutcome {
  readonly type: "thrown";
  readonly error: unknown;
}

export type RawOutcome = ValueOutcome | ThrownOutcome;

export function assertValidStatus(status: number): void {
  if (!Number.isInteger(status) || status < 100 || status > 599) {
    throw new StubConfigurationError(
      `Invalid status code ${status}: expected an integer between 100 and 599`
    );
  }
}

/**
 * Normalizes a rule's response: fills in defaults and classifies the body.
 *
 * @throws {StubConfigurationError} If the status is not a valid HTTP status
 */
export function valueOutcome(response: StubResponse): ValueOutcome {
  const { status = 200, statusText, headers = {}, body = "" } = response;
  assertValidStatus(status);
  return {
    type: "value",
    status,
    statusText: statusText ?? statusTextFor(status),
    headers: { ...headers },
    body: toRawBody(body),
  };
}

export function thrownOutcome(error: unknown): ThrownOutcome {
  return { type: "thrown", error };
}

/**
 * Turns an outcome into the response the caller sees.
 *
 * A 2xx body is decoded with `responseAs`; if it does not fit, the body is a
 * `mismatch` holding the raw value and the response is still returned. Any
 * other status yields a `status` error body with the raw body as text.
 *
 * @throws The error of a thrown outcome, unchanged
 * @throws Whatever a mapping function inside `responseAs` throws
 */
export function settleOutcome<T>(
  outcome: RawOutcome,
  responseAs: ResponseAs<T>
): HttpResponse<T> {
  if (outcome.type === "thrown") {
    throw outcome.error;
  }
  return {
    status: outcome.status,
    statusText: outcome.statusText,
    headers: outcome.headers,
    body: decodeBody(outcome, responseAs),
  };
}

function decodeBody<T>(
  outcome: ValueOutcome,
  responseAs: ResponseAs<T>
): ResponseBody<T> {
  if (!isSuccessStatus(outcome.status)) {
    return { ok: false, reason: "status", error: errorText(outcome.body) };
  }
  const adjusted = responseAs.adjust(outcome.body);
  if (adjusted.matched) {
    return { ok: true, value: adjusted.value };
  }
  return { ok: false, reason: "mismatch", raw: outcome.body };
}

function errorText(body: RawBody): string {
  const text = decodeText(body, "utf-8");
  if (text.matched) {
    return text.value;
  }
  return toJsonText(body.value) ?? String(body.value);
}
