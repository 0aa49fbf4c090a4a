/**
 * Thrown when a stub rule is configured with values no response could
 * carry, such as a status code outside 100..599.
 */
export class StubConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StubConfigurationError";
  }
}
