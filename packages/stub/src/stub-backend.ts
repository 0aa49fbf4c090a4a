import {
  asyncEffect,
  config,
  createLogger,
  describeRawBody,
  syncEffect,
  type Backend,
  type EffectKind,
  type EffectWrapper,
  type HttpRequest,
  type HttpResponse,
  type Logger,
  type Wrapped,
} from "@backstub/core";
import FallbackChain, {
  type Resolution,
  type ResolutionSource,
  type ResolvingBackend,
} from "./fallback-chain";
import type {
  PartialResponder,
  RequestPredicate,
  Responder,
  StubResponse,
} from "./models/handlers";
import {
  settleOutcome,
  thrownOutcome,
  valueOutcome,
  type RawOutcome,
} from "./raw-outcome";
import RuleSet, { type MatchRule, type OutcomeProducer } from "./rule-set";

/**
 * Options for a {@link StubBackend}.
 */
export interface StubBackendOptions {
  /**
   * Response used when no rule matches and there is no fallback.
   * Defaults to a 404 with an empty body and no headers.
   */
  defaultResponse?: StubResponse;
  /** Logger used for request resolution traces */
  logger?: Logger;
}

/**
 * A backend that answers from rules instead of the network.
 *
 * Stubs are immutable: every rule added returns a new stub, so a built stub
 * can be shared by concurrent callers.
 *
 * @template K - `sync` to get responses directly, `async` to get promises
 *
 * @example
 * ```typescript
 * const backend = StubBackend.synchronous()
 *   .whenRequestMatches((request) => request.uri.pathStartsWith("a", "b"))
 *   .thenRespondOk()
 *   .whenRequestMatches((request) => request.uri.paramsMap.p === "v")
 *   .thenRespond("10");
 *
 * const response = HttpRequest.get("http://example.org/d?p=v")
 *   .mapResponse(Number)
 *   .send(backend);
 * // response.body => { ok: true, value: 10 }
 * ```
 */
export default class StubBackend<K extends EffectKind>
  implements ResolvingBackend<K>
{
  private constructor(
    public readonly effect: EffectWrapper<K>,
    private readonly chain: FallbackChain<K>,
    private readonly logger: Logger
  ) {}

  /**
   * Creates a stub without rules, answering through `effect`.
   */
  public static create<K extends EffectKind>(
    effect: EffectWrapper<K>,
    options: StubBackendOptions = {}
  ): StubBackend<K> {
    return StubBackend.build(effect, undefined, options);
  }

  /**
   * Creates a stub whose `send` returns responses directly and throws
   * failures.
   */
  public static synchronous(options?: StubBackendOptions): StubBackend<"sync"> {
    return StubBackend.create(syncEffect, options);
  }

  /**
   * Creates a stub whose `send` returns promises.
   */
  public static asynchronous(
    options?: StubBackendOptions
  ): StubBackend<"async"> {
    return StubBackend.create(asyncEffect, options);
  }

  /**
   * Creates a stub that hands requests no rule of its own matches to
   * `fallback`. The new stub uses the fallback's effect, and unmatched
   * requests get whatever the fallback answers, its default included.
   */
  public static withFallback<K extends EffectKind>(
    fallback: Backend<K>,
    options: Omit<StubBackendOptions, "defaultResponse"> = {}
  ): StubBackend<K> {
    return StubBackend.build(fallback.effect, fallback, options);
  }

  private static build<K extends EffectKind>(
    effect: EffectWrapper<K>,
    fallback: Backend<K> | undefined,
    options: StubBackendOptions
  ): StubBackend<K> {
    const { defaultResponse = {}, logger = createLogger("stub") } = options;
    const defaultOutcome = valueOutcome({
      status: config.stub.defaultStatus,
      ...defaultResponse,
    });
    return new StubBackend(
      effect,
      new FallbackChain(RuleSet.empty, fallback, defaultOutcome),
      logger
    );
  }

  public get ruleCount(): number {
    return this.chain.rules.size;
  }

  /**
   * Starts a rule that applies to requests accepted by `predicate`.
   * Complete it with one of the `thenRespond*` methods.
   */
  public whenRequestMatches(predicate: RequestPredicate): WhenRequest<K> {
    return new WhenRequest(predicate, (rule) => this.addRule(rule));
  }

  /**
   * Starts a rule that applies to every request.
   */
  public whenAnyRequest(): WhenRequest<K> {
    return this.whenRequestMatches(() => true);
  }

  /**
   * Adds a rule that matches and answers in one call. See
   * {@link PartialResponder}.
   */
  public whenRequestMatchesPartial(partial: PartialResponder): StubBackend<K> {
    return this.addRule({ kind: "partial", tryMatch: partial });
  }

  public resolve(request: HttpRequest<unknown>): Resolution<K> {
    return this.chain.resolve(request);
  }

  /**
   * Answers a request. Rules are evaluated inside the effect, so an `async`
   * stub reports every failure through the returned promise.
   */
  public send<T>(request: HttpRequest<T>): Wrapped<K, HttpResponse<T>> {
    return this.effect.flatten<HttpResponse<T>>(() => {
      const resolution = this.chain.resolve(request);
      if (resolution.kind === "delegate") {
        this.logger.debug(
          `${request.toString()} matched no rule, delegating to fallback backend`
        );
        return resolution.backend.send(request);
      }

      const { source, outcome } = resolution;
      this.logResolution(request, source, outcome);
      return this.effect.wrap<HttpResponse<T>>(() =>
        settleOutcome(outcome, request.responseAs)
      );
    });
  }

  private addRule(rule: MatchRule): StubBackend<K> {
    return new StubBackend(
      this.effect,
      this.chain.withRules(this.chain.rules.append(rule)),
      this.logger
    );
  }

  private logResolution(
    request: HttpRequest<unknown>,
    source: ResolutionSource,
    outcome: RawOutcome
  ): void {
    const answer =
      outcome.type === "thrown"
        ? "failure"
        : `status ${outcome.status}, body ${describeRawBody(outcome.body)}`;
    switch (source) {
      case "rule":
        this.logger.debug(`${request.toString()} answered by a rule with ${answer}`);
        break;
      case "fallback":
        this.logger.debug(
          `${request.toString()} answered by the fallback stub with ${answer}`
        );
        break;
      case "default":
        this.logger.debug(
          `${request.toString()} matched no rule, answering with ${answer}`
        );
        break;
    }
  }
}

/**
 * A rule waiting for its response. Every method completes the rule and
 * returns the stub with the rule appended.
 */
export class WhenRequest<K extends EffectKind> {
  constructor(
    private readonly predicate: RequestPredicate,
    private readonly complete: (rule: MatchRule) => StubBackend<K>
  ) {}

  public thenRespondOk(): StubBackend<K> {
    return this.thenRespondWithCode(200);
  }

  public thenRespondNotFound(): StubBackend<K> {
    return this.thenRespondWithCode(404);
  }

  public thenRespondServerError(): StubBackend<K> {
    return this.thenRespondWithCode(500);
  }

  /**
   * Responds with `status` and `message` as a text body.
   *
   * @throws {StubConfigurationError} If `status` is not a valid HTTP status
   */
  public thenRespondWithCode(status: number, message = ""): StubBackend<K> {
    return this.thenRespond(message, { status });
  }

  /**
   * Responds with `body`, status 200 unless `init` says otherwise.
   *
   * The body is shared by every request the rule answers. A stream body can
   * only be read once; use {@link WhenRequest.thenRespondWith} to build a
   * fresh stream per request.
   *
   * @throws {StubConfigurationError} If `init.status` is not a valid HTTP status
   */
  public thenRespond(
    body: unknown,
    init: Omit<StubResponse, "body"> = {}
  ): StubBackend<K> {
    const outcome = valueOutcome({ ...init, body });
    return this.respondWith(() => outcome);
  }

  /**
   * Responds with whatever `responder` returns for the request. If the
   * responder throws, sending the request fails with that error.
   */
  public thenRespondWith(responder: Responder): StubBackend<K> {
    return this.respondWith((request) => valueOutcome(responder(request)));
  }

  /**
   * Makes sending a matching request fail with `error`, as a transport
   * failure would. The error is raised at send time, unchanged.
   */
  public thenThrow(error: unknown): StubBackend<K> {
    const outcome = thrownOutcome(error);
    return this.respondWith(() => outcome);
  }

  private respondWith(producer: OutcomeProducer): StubBackend<K> {
    return this.complete({
      kind: "total",
      predicate: this.predicate,
      producer,
    });
  }
}
