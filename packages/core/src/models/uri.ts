import { InvalidUriError } from "../errors";

/**
 * Parsed request target. Exposes the URL the way request predicates read it:
 * as path segments and a map of query parameters.
 *
 * @example
 * ```typescript
 * const uri = Uri.parse("http://example.org/a/b/c?p=v");
 * uri.path;                   // ["a", "b", "c"]
 * uri.paramsMap;              // { p: "v" }
 * uri.pathStartsWith("a", "b"); // true
 * ```
 */
export default class Uri {
  /** Percent-decoded, non-empty path segments in order */
  public readonly path: readonly string[];
  /** Query parameters; when a name repeats, the last value wins */
  public readonly paramsMap: Readonly<Record<string, string>>;

  private constructor(private readonly url: URL) {
    this.path = url.pathname
      .split("/")
      .filter((segment) => segment.length > 0)
      .map(decodeSegment);
    this.paramsMap = collectParams(url.searchParams);
  }

  /**
   * Parses an absolute URL.
   *
   * @throws {InvalidUriError} If the input is not a valid absolute URL
   */
  public static parse(input: string | URL): Uri {
    if (input instanceof URL) {
      return new Uri(new URL(input.href));
    }
    try {
      return new Uri(new URL(input));
    } catch {
      throw new InvalidUriError(`Invalid URL format: ${input}`, input);
    }
  }

  public get scheme(): string {
    return this.url.protocol.replace(/:$/, "");
  }

  public get host(): string {
    return this.url.hostname;
  }

  public get port(): number | undefined {
    return this.url.port === "" ? undefined : Number(this.url.port);
  }

  public param(name: string): string | undefined {
    return Object.hasOwn(this.paramsMap, name)
      ? this.paramsMap[name]
      : undefined;
  }

  public pathStartsWith(...segments: string[]): boolean {
    return (
      segments.length <= this.path.length &&
      segments.every((segment, index) => this.path[index] === segment)
    );
  }

  public pathEndsWith(...segments: string[]): boolean {
    const offset = this.path.length - segments.length;
    return (
      offset >= 0 &&
      segments.every((segment, index) => this.path[offset + index] === segment)
    );
  }

  public toString(): string {
    return this.url.href;
  }
}

/**
 * Null-prototype map, so names such as `constructor` are only present when
 * the query has them.
 */
function collectParams(
  searchParams: URLSearchParams
): Readonly<Record<string, string>> {
  const params: Record<string, string> = Object.create(null);
  for (const [name, value] of searchParams) {
    params[name] = value;
  }
  return params;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes are kept verbatim
    return segment;
  }
}
