import {
  HttpRequest,
  InvalidUriError,
  isHttpMethod,
  type Backend,
  type EffectKind,
  type HttpResponse,
  type ResponseBody,
} from "@backstub/core";
import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

/**
 * Creates an axios adapter that answers every request from `backend`
 * instead of the network.
 *
 * The response `data` is the body as text, so axios's own response
 * transforms still parse JSON; an opaque stubbed body (an object, a number)
 * is handed over as is. Statuses refused by `validateStatus` reject with an
 * `AxiosError` carrying the response. A failure raised by the backend
 * rejects with that same error object.
 *
 * @example
 * ```typescript
 * const backend = StubBackend.asynchronous()
 *   .whenRequestMatches((request) => request.uri.pathStartsWith("users"))
 *   .thenRespond(JSON.stringify([{ id: 1 }]));
 *
 * const client = axios.create({ adapter: createAxiosStubAdapter(backend) });
 * const { data } = await client.get("http://example.org/users");
 * // data => [{ id: 1 }]
 * ```
 */
export default function createAxiosStubAdapter<K extends EffectKind>(
  backend: Backend<K>
): AxiosAdapter {
  return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const request = toHttpRequest(config);
    const response = await backend.effect.runToPromise(() =>
      backend.send(request)
    );
    return settle(toAxiosResponse(response, config));
  };
}

/**
 * Builds the backstub request described by an axios request config.
 *
 * @throws {AxiosError} If the method is not a supported HTTP method
 * @throws {InvalidUriError} If `baseURL` and `url` do not form an absolute URL
 */
export function toHttpRequest(
  config: InternalAxiosRequestConfig
): HttpRequest<string> {
  const method = (config.method ?? "get").toUpperCase();
  if (!isHttpMethod(method)) {
    throw new AxiosError(
      `Unsupported HTTP method: ${method}`,
      AxiosError.ERR_BAD_OPTION_VALUE,
      config
    );
  }

  const url = resolveUrl(config);
  if (isParamsRecord(config.params)) {
    for (const [name, value] of Object.entries(config.params)) {
      if (value !== undefined && value !== null) {
        url.searchParams.append(name, String(value));
      }
    }
  }

  return HttpRequest.from({
    url,
    method,
    headers: toHeaderRecord(config.headers),
    data: config.data,
  });
}

function resolveUrl(config: InternalAxiosRequestConfig): URL {
  const { url = "", baseURL } = config;
  try {
    return new URL(url, baseURL);
  } catch {
    const input = baseURL === undefined ? url : `${baseURL} + ${url}`;
    throw new InvalidUriError(`Invalid URL format: ${input}`, input);
  }
}

function isParamsRecord(params: unknown): params is Record<string, unknown> {
  return typeof params === "object" && params !== null;
}

function toHeaderRecord(headers: AxiosHeaders): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers.toJSON())) {
    if (value === undefined || value === null || value === false) {
      continue;
    }
    record[name] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return record;
}

function toAxiosResponse(
  response: HttpResponse<string>,
  config: InternalAxiosRequestConfig
): AxiosResponse {
  return {
    data: responseData(response.body),
    status: response.status,
    statusText: response.statusText,
    headers: new AxiosHeaders({ ...response.headers }),
    config,
  };
}

function responseData(body: ResponseBody<string>): unknown {
  if (body.ok) {
    return body.value;
  }
  if (body.reason === "status") {
    return body.error;
  }
  return body.raw.value;
}

/**
 * Resolves or rejects the way axios's own transports do.
 */
function settle(response: AxiosResponse): AxiosResponse {
  const { validateStatus } = response.config;
  if (!validateStatus || validateStatus(response.status)) {
    return response;
  }
  throw new AxiosError(
    `Request failed with status code ${response.status}`,
    response.status >= 500
      ? AxiosError.ERR_BAD_RESPONSE
      : AxiosError.ERR_BAD_REQUEST,
    response.config,
    undefined,
    response
  );
}
