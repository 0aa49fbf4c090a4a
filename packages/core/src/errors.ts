/**
 * Thrown when a request is built from a URL that cannot be parsed.
 */
export class InvalidUriError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = "InvalidUriError";
  }
}
