import type { Backend, EffectKind, HttpRequest } from "@backstub/core";
import type { RawOutcome, ValueOutcome } from "./raw-outcome";
import type RuleSet from "./rule-set";

/**
 * Where the outcome of a request came from.
 */
export type ResolutionSource = "rule" | "fallback" | "default";

/**
 * Result of resolving a request: an outcome to settle, or a backend to
 * forward the request to.
 */
export type Resolution<K extends EffectKind> =
  | {
      readonly kind: "outcome";
      readonly source: ResolutionSource;
      readonly outcome: RawOutcome;
    }
  | { readonly kind: "delegate"; readonly backend: Backend<K> };

/**
 * A backend that can resolve requests without sending them, such as a stub.
 */
export interface ResolvingBackend<K extends EffectKind> extends Backend<K> {
  resolve(request: HttpRequest<unknown>): Resolution<K>;
}

export function isResolvingBackend<K extends EffectKind>(
  backend: Backend<K>
): backend is ResolvingBackend<K> {
  return "resolve" in backend && typeof backend.resolve === "function";
}

/**
 * Local rules first, then the fallback, then the default response.
 * The fallback is only consulted when no local rule matches.
 */
export default class FallbackChain<K extends EffectKind> {
  constructor(
    public readonly rules: RuleSet,
    public readonly fallback: Backend<K> | undefined,
    public readonly defaultOutcome: ValueOutcome
  ) {}

  public withRules(rules: RuleSet): FallbackChain<K> {
    return new FallbackChain(rules, this.fallback, this.defaultOutcome);
  }

  /**
   * Resolves a request. A resolving fallback is asked for its own full
   * resolution (rules, fallback and default); any other fallback backend is
   * returned as a delegation.
   */
  public resolve(request: HttpRequest<unknown>): Resolution<K> {
    const local = this.rules.match(request);
    if (local !== undefined) {
      return { kind: "outcome", source: "rule", outcome: local };
    }

    if (this.fallback === undefined) {
      return { kind: "outcome", source: "default", outcome: this.defaultOutcome };
    }

    if (isResolvingBackend(this.fallback)) {
      const resolution = this.fallback.resolve(request);
      return resolution.kind === "outcome"
        ? { ...resolution, source: "fallback" }
        : resolution;
    }

    return { kind: "delegate", backend: this.fallback };
  }
}
