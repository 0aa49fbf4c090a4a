import type { Backend } from "../backend";
import { asString, type ResponseAs } from "../body/response-as";
import type { EffectKind, Wrapped } from "../effect";
import type { HttpResponse } from "./http-response";
import Uri from "./uri";

/**
 * Supported HTTP methods for requests
 */
export type HttpMethod =
  | "GET"
  | "POST"
  | "PATCH"
  | "PUT"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE";

const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PATCH",
  "PUT",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "CONNECT",
  "TRACE",
];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * Plain description of a request, as accepted by {@link HttpRequest.from}.
 *
 * @example
 * ```typescript
 * const request = HttpRequest.from({
 *   url: "http://example.org/users",
 *   method: "POST",
 *   headers: { "Content-Type": "application/json" },
 *   data: { name: "Ada" },
 * });
 * ```
 */
export interface RequestConfig {
  /** The URL to make the request to */
  url: string | URL;
  /** The HTTP method to use */
  method: HttpMethod;
  /** Request headers; names are kept as given */
  headers?: Record<string, string>;
  /** Optional request body data, passed through untouched */
  data?: unknown;
}

/**
 * Immutable description of an outgoing request, together with the way its
 * response body should be decoded. Every builder method returns a new
 * request.
 *
 * @template T - The type the response body decodes to
 *
 * @example
 * ```typescript
 * const response = HttpRequest.get("http://example.org/d?p=v")
 *   .mapResponse((text) => Number.parseInt(text, 10))
 *   .send(backend);
 * ```
 */
export default class HttpRequest<T> {
  private constructor(
    public readonly method: HttpMethod,
    public readonly uri: Uri,
    public readonly headers: Readonly<Record<string, string>>,
    public readonly data: unknown,
    public readonly responseAs: ResponseAs<T>
  ) {}

  /**
   * Creates a request that decodes its response as UTF-8 text.
   *
   * @throws {InvalidUriError} If `config.url` is not a valid absolute URL
   */
  public static from(config: RequestConfig): HttpRequest<string> {
    const { url, method, headers = {}, data } = config;
    return new HttpRequest(
      method,
      Uri.parse(url),
      { ...headers },
      data,
      asString()
    );
  }

  public static get(url: string | URL): HttpRequest<string> {
    return HttpRequest.from({ url, method: "GET" });
  }

  public static post(url: string | URL, data?: unknown): HttpRequest<string> {
    return HttpRequest.from({ url, method: "POST", data });
  }

  public static put(url: string | URL, data?: unknown): HttpRequest<string> {
    return HttpRequest.from({ url, method: "PUT", data });
  }

  public static patch(url: string | URL, data?: unknown): HttpRequest<string> {
    return HttpRequest.from({ url, method: "PATCH", data });
  }

  public static delete(url: string | URL): HttpRequest<string> {
    return HttpRequest.from({ url, method: "DELETE" });
  }

  public static head(url: string | URL): HttpRequest<string> {
    return HttpRequest.from({ url, method: "HEAD" });
  }

  public static options(url: string | URL): HttpRequest<string> {
    return HttpRequest.from({ url, method: "OPTIONS" });
  }

  /**
   * Returns a copy that decodes its response with `responseAs`.
   */
  public response<U>(responseAs: ResponseAs<U>): HttpRequest<U> {
    return new HttpRequest(
      this.method,
      this.uri,
      this.headers,
      this.data,
      responseAs
    );
  }

  /**
   * Returns a copy whose decoded body is passed through `transform`.
   * Calls chain: each one wraps the previous spec.
   */
  public mapResponse<U>(transform: (value: T) => U): HttpRequest<U> {
    return this.response(this.responseAs.map(transform));
  }

  public header(name: string, value: string): HttpRequest<T> {
    return new HttpRequest(
      this.method,
      this.uri,
      { ...this.headers, [name]: value },
      this.data,
      this.responseAs
    );
  }

  public send<K extends EffectKind>(
    backend: Backend<K>
  ): Wrapped<K, HttpResponse<T>> {
    return backend.send(this);
  }

  public toString(): string {
    return `${this.method} ${this.uri.toString()}`;
  }
}
