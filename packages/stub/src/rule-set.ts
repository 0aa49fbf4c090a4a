import type { HttpRequest } from "@backstub/core";
import type { PartialResponder, RequestPredicate } from "./models/handlers";
import { thrownOutcome, valueOutcome, type RawOutcome } from "./raw-outcome";

/**
 * Produces the outcome of a total rule once its predicate has matched.
 */
export type OutcomeProducer = (request: HttpRequest<unknown>) => RawOutcome;

/**
 * Rule with a separate predicate and producer.
 */
export interface TotalRule {
  readonly kind: "total";
  readonly predicate: RequestPredicate;
  readonly producer: OutcomeProducer;
}

/**
 * Rule whose single callable both matches and answers.
 */
export interface PartialRule {
  readonly kind: "partial";
  readonly tryMatch: PartialResponder;
}

export type MatchRule = TotalRule | PartialRule;

/**
 * Ordered, immutable list of rules. The first rule that matches a request
 * answers it; later rules are not evaluated.
 */
export default class RuleSet {
  public static readonly empty: RuleSet = new RuleSet([]);

  private constructor(private readonly rules: readonly MatchRule[]) {}

  public get size(): number {
    return this.rules.length;
  }

  /**
   * Returns a new rule set with `rule` after every existing rule.
   */
  public append(rule: MatchRule): RuleSet {
    return new RuleSet([...this.rules, rule]);
  }

  /**
   * Finds the outcome of the first matching rule.
   *
   * A producer that throws yields a thrown outcome: the rule still counts as
   * matched. Errors thrown by predicates propagate.
   *
   * @returns The outcome, or `undefined` when no rule matches
   */
  public match(request: HttpRequest<unknown>): RawOutcome | undefined {
    for (const rule of this.rules) {
      const outcome = evaluateRule(rule, request);
      if (outcome !== undefined) {
        return outcome;
      }
    }
    return undefined;
  }
}

function evaluateRule(
  rule: MatchRule,
  request: HttpRequest<unknown>
): RawOutcome | undefined {
  switch (rule.kind) {
    case "total": {
      const { predicate, producer } = rule;
      if (!predicate(request)) {
        return undefined;
      }
      return capture(() => producer(request));
    }
    case "partial": {
      const { tryMatch } = rule;
      return capture(() => {
        const response = tryMatch(request);
        return response === undefined ? undefined : valueOutcome(response);
      });
    }
  }
}

function capture(
  produce: () => RawOutcome | undefined
): RawOutcome | undefined {
  try {
    return produce();
  } catch (error) {
    return thrownOutcome(error);
  }
}
