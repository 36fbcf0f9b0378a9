/**
 * Condition Evaluator
 *
 * Evaluates one indexed condition: resolves its arguments, invokes the
 * registered function, stores the result under the condition's binding and
 * reduces it to a branch outcome.
 *
 * An absent function result is still stored. Later lookups must observe
 * "tried and absent" rather than "never tried".
 */

import { FunctionNotFoundError, MalformedModelError } from "./errors";
import type { EvaluationFrame } from "./evaluation-context";
import type { ExpressionEvaluator } from "./expression-evaluator";
import type { BoundRuleFunction } from "./function-registry";
import type { MaybeValue, RuleModel } from "./types";
import { describeValue, matchesBindingType } from "./values";

/**
 * Branch outcome of a function result: absent is false, booleans are
 * themselves, any other value is true
 */
export function toOutcome(value: MaybeValue): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  return true;
}

export class ConditionEvaluator {
  constructor(
    private readonly model: RuleModel,
    private readonly expressions: ExpressionEvaluator,
    private readonly functions: ReadonlyMap<string, BoundRuleFunction>
  ) {}

  /**
   * Evaluate a condition. Not memoized: the decision walker guarantees one
   * call per condition index per resolve.
   */
  evaluate(conditionIndex: number, frame: EvaluationFrame): boolean {
    const condition = this.model.conditions[conditionIndex];
    if (!condition) {
      throw new MalformedModelError(`condition index ${conditionIndex} is out of range`);
    }

    const impl = this.functions.get(condition.fn);
    if (!impl) {
      throw new FunctionNotFoundError(condition.fn);
    }

    const args = condition.argv.map((arg) => this.expressions.evaluate(arg, frame, "throw"));
    const value = impl(args, frame.diagnostics);

    if (condition.assign) {
      const { name, type } = condition.assign;
      if (value !== undefined && !matchesBindingType(value, type)) {
        throw new MalformedModelError(
          `conditions[${conditionIndex}] binds "${name}" as ${type}, got ${describeValue(value)} from ${condition.fn}`
        );
      }
      frame.context.bind(name, value);
    }

    const outcome = toOutcome(value);
    frame.diagnostics.record({
      conditionIndex,
      fn: condition.fn,
      binding: condition.assign?.name,
      value,
      outcome,
    });

    return outcome;
  }
}
