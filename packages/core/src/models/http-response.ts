import { STATUS_CODES } from "node:http";
import type { RawBody } from "../body/raw-body";

/**
 * Decoded response body.
 *
 * - `ok: true`: a successful response whose body decoded as requested.
 * - `reason: "status"`: a non-2xx response; `error` holds its body as text.
 * - `reason: "mismatch"`: a successful response whose stubbed body could not
 *   be decoded as requested; `raw` holds it.
 */
export type ResponseBody<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: "status"; readonly error: string }
  | { readonly ok: false; readonly reason: "mismatch"; readonly raw: RawBody };

export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: ResponseBody<T>;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Standard reason phrase for a status code, or an empty string.
 */
export function statusTextFor(status: number): string {
  return STATUS_CODES[status] ?? "";
}
