/**
 * @packageDocumentation
 * @module @backstub/stub
 *
 * Backstub Stub Package
 *
 * A backend that answers requests from ordered matching rules, a fallback
 * backend or a default response, without any I/O.
 */

export { default as StubBackend, WhenRequest } from "./stub-backend";
export type { StubBackendOptions } from "./stub-backend";
export { default as RuleSet } from "./rule-set";
export type {
  MatchRule,
  TotalRule,
  PartialRule,
  OutcomeProducer,
} from "./rule-set";
export { default as FallbackChain, isResolvingBackend } from "./fallback-chain";
export type {
  Resolution,
  ResolutionSource,
  ResolvingBackend,
} from "./fallback-chain";
export {
  valueOutcome,
  thrownOutcome,
  settleOutcome,
  assertValidStatus,
} from "./raw-outcome";
export type { RawOutcome, ValueOutcome, ThrownOutcome } from "./raw-outcome";
export type {
  StubResponse,
  RequestPredicate,
  Responder,
  PartialResponder,
} from "./models/handlers";
export { StubConfigurationError } from "./errors";
