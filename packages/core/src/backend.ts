import type { EffectKind, EffectWrapper, Wrapped } from "./effect";
import type HttpRequest from "./models/http-request";
import type { HttpResponse } from "./models/http-response";

/**
 * Something that answers requests: the seam client code sends through.
 * A stub implements it in place of a real transport.
 *
 * @template K - Effect kind of every result, `sync` or `async`
 */
export interface Backend<K extends EffectKind> {
  readonly effect: EffectWrapper<K>;
  send<T>(request: HttpRequest<T>): Wrapped<K, HttpResponse<T>>;
}
