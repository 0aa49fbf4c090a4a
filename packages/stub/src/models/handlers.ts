import type { HttpRequest } from "@backstub/core";

/**
 * A response as a rule describes it. Every field is optional:
 * `status` defaults to 200, `statusText` to the standard reason phrase,
 * `headers` to none and `body` to an empty string.
 *
 * `body` can be any value. Strings are text, `Uint8Array`s are bytes, raw
 * bodies such as `streamOf(...)` are kept, and anything else is handed over
 * as an opaque value.
 */
export interface StubResponse {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * Decides whether a rule applies to a request. Must not have side effects.
 *
 * @param request - The request being sent
 */
export interface RequestPredicate {
  (request: HttpRequest<unknown>): boolean;
}

/**
 * Computes the response of a rule whose predicate matched. May throw to
 * simulate a transport failure; the error is raised when the request is
 * sent.
 *
 * @param request - The request being sent
 */
export interface Responder {
  (request: HttpRequest<unknown>): StubResponse;
}

/**
 * Matches and answers in one step: returns `undefined` when the rule does
 * not apply to the request, or the response when it does. Called once per
 * request.
 *
 * @example
 * ```typescript
 * stub.whenRequestMatchesPartial((request) => {
 *   if (request.method === "POST" && request.uri.pathEndsWith("partial10")) {
 *     return { body: 10 };
 *   }
 *   return undefined;
 * });
 * ```
 */
export interface PartialResponder {
  (request: HttpRequest<unknown>): StubResponse | undefined;
}
