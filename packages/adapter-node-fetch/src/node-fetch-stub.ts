import {
  HttpRequest,
  asByteArray,
  isHttpMethod,
  toJsonText,
  type Backend,
  type EffectKind,
  type HttpResponse,
} from "@backstub/core";
import { Headers, Request, Response } from "node-fetch";
import type { RequestInfo, RequestInit } from "node-fetch";

/**
 * A function with the signature of node-fetch's `fetch`.
 */
export type StubFetch = (
  url: RequestInfo,
  init?: RequestInit
) => Promise<Response>;

/**
 * Creates a `fetch` replacement that answers every request from `backend`.
 *
 * Bodies are read as bytes, so `text()`, `json()` and `buffer()` work on the
 * returned response as they would on a real one. A stubbed body that is
 * neither text nor bytes is serialized as JSON, or as plain text when it has
 * no JSON form. A failure raised by the backend rejects the returned promise
 * with that same error object.
 *
 * @example
 * ```typescript
 * const backend = StubBackend.synchronous()
 *   .whenRequestMatches((request) => request.method === "GET")
 *   .thenRespond(JSON.stringify({ id: 1 }));
 *
 * const fetch = createStubFetch(backend);
 * const user = await (await fetch("http://example.org/users/1")).json();
 * ```
 */
export default function createStubFetch<K extends EffectKind>(
  backend: Backend<K>
): StubFetch {
  return async (url, init) => {
    const request = toHttpRequest(url, init);
    const response = await backend.effect.runToPromise(() =>
      backend.send(request)
    );
    return toFetchResponse(response, request.uri.toString());
  };
}

/**
 * Builds the backstub request for a `fetch` call. Values in `init` take
 * precedence over those of a `Request` passed as `url`.
 *
 * @throws {TypeError} If the method is not a supported HTTP method
 */
export function toHttpRequest(
  url: RequestInfo,
  init: RequestInit = {}
): HttpRequest<Uint8Array> {
  const base = url instanceof Request ? url : undefined;

  const method = (init.method ?? base?.method ?? "GET").toUpperCase();
  if (!isHttpMethod(method)) {
    throw new TypeError(`Unsupported HTTP method: ${method}`);
  }

  const headers: Record<string, string> = {};
  new Headers(init.headers ?? base?.headers).forEach((value, name) => {
    headers[name] = value;
  });

  return HttpRequest.from({
    url: requestUrl(url),
    method,
    headers,
    data: init.body ?? undefined,
  }).response(asByteArray());
}

function requestUrl(url: RequestInfo): string {
  if (typeof url === "string") {
    return url;
  }
  if (url instanceof Request) {
    return url.url;
  }
  return url.href;
}

function toFetchResponse(
  response: HttpResponse<Uint8Array>,
  url: string
): Response {
  const { status, statusText, body } = response;
  const headers = new Headers({ ...response.headers });

  let content: Buffer | string;
  if (body.ok) {
    content = Buffer.from(body.value);
  } else if (body.reason === "status") {
    content = body.error;
  } else {
    const json = toJsonText(body.raw.value);
    content = json ?? String(body.raw.value);
    if (json !== undefined && !headers.has("content-type")) {
      headers.set("content-type", "application/json");
    }
  }

  return new Response(content, { status, statusText, headers, url });
}
