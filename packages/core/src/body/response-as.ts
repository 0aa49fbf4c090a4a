import { config } from "../config";
import {
  decodeAny,
  decodeBytes,
  decodeText,
  matched,
  type Adjusted,
} from "./decoders";
import type { RawBody } from "./raw-body";

/**
 * Describes how the caller wants a response body decoded.
 * Specs compose: {@link ResponseAs.map} wraps a spec in a
 * {@link MappedResponseAs}, so chained `mapResponse` calls build a tree.
 *
 * @template T - The type the body decodes to
 */
export abstract class ResponseAs<T> {
  public abstract readonly kind:
    | "ignore"
    | "string"
    | "bytes"
    | "any"
    | "mapped";

  /**
   * Converts a raw stubbed body into `T`. Returns a mismatch, never throws,
   * when the raw value has the wrong shape. Errors thrown by mapping
   * functions are not caught.
   */
  public abstract adjust(raw: RawBody): Adjusted<T>;

  public map<U>(transform: (value: T) => U): ResponseAs<U> {
    return new MappedResponseAs(this, transform);
  }
}

/**
 * Discards the body, whatever its shape.
 */
export class IgnoreResponse extends ResponseAs<void> {
  public readonly kind = "ignore";

  public adjust(): Adjusted<void> {
    return matched(undefined);
  }

  public toString(): string {
    return "ignore";
  }
}

export class ResponseAsString extends ResponseAs<string> {
  public readonly kind = "string";

  constructor(public readonly charset: string) {
    super();
  }

  public adjust(raw: RawBody): Adjusted<string> {
    return decodeText(raw, this.charset);
  }

  public toString(): string {
    return `asString(${this.charset})`;
  }
}

export class ResponseAsByteArray extends ResponseAs<Uint8Array> {
  public readonly kind = "bytes";

  public adjust(raw: RawBody): Adjusted<Uint8Array> {
    return decodeBytes(raw);
  }

  public toString(): string {
    return "asByteArray";
  }
}

/**
 * Accepts any body and yields the stubbed value as it was given: a string,
 * a `Uint8Array`, or an object or number handed over unchanged.
 */
export class ResponseAsAny extends ResponseAs<unknown> {
  public readonly kind = "any";

  public adjust(raw: RawBody): Adjusted<unknown> {
    return decodeAny(raw);
  }

  public toString(): string {
    return "asAny";
  }
}

/**
 * Decodes with `inner`, then applies `transform` to the result.
 * A mismatch of `inner` is a mismatch of the mapped spec.
 */
export class MappedResponseAs<T, U> extends ResponseAs<U> {
  public readonly kind = "mapped";

  constructor(
    public readonly inner: ResponseAs<T>,
    public readonly transform: (value: T) => U
  ) {
    super();
  }

  public adjust(raw: RawBody): Adjusted<U> {
    const adjusted = this.inner.adjust(raw);
    if (!adjusted.matched) {
      return adjusted;
    }
    return matched(this.transform(adjusted.value));
  }

  public toString(): string {
    return `${this.inner.toString()}.map`;
  }
}

export function ignore(): ResponseAs<void> {
  return new IgnoreResponse();
}

export function asString(
  charset: string = config.body.defaultCharset
): ResponseAs<string> {
  return new ResponseAsString(charset);
}

export function asByteArray(): ResponseAs<Uint8Array> {
  return new ResponseAsByteArray();
}

export function asAny(): ResponseAs<unknown> {
  return new ResponseAsAny();
}
