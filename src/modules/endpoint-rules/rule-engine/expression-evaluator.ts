/**
 * Expression Evaluator
 *
 * Evaluates compiled expressions against parameters and bound variables.
 * Shared by the condition evaluator (strict: reading a binding that was
 * never set is a model error) and the result resolver (lenient: such a
 * binding reads as absent).
 */

import { FunctionNotFoundError, MalformedModelError } from "./errors";
import type { EvaluationFrame } from "./evaluation-context";
import type { BoundRuleFunction } from "./function-registry";
import type { Expression, MaybeValue, RuleModel, RuleRecord, RuleValue, TemplatePart } from "./types";
import { describeValue, readPath } from "./values";

export type UnsetBindingPolicy = "throw" | "absent";

export class ExpressionEvaluator {
  private readonly parameterNames: ReadonlySet<string>;

  constructor(
    model: RuleModel,
    private readonly functions: ReadonlyMap<string, BoundRuleFunction>
  ) {
    this.parameterNames = new Set(model.parameters.map((parameter) => parameter.name));
  }

  evaluate(expression: Expression, frame: EvaluationFrame, policy: UnsetBindingPolicy): MaybeValue {
    switch (expression.kind) {
      case "literal":
        return expression.value;
      case "ref":
        return this.resolveRef(expression.name, frame, policy);
      case "template":
        return this.renderTemplate(expression.source, expression.parts, frame, policy);
      case "getAttr":
        return readPath(this.evaluate(expression.target, frame, policy), expression.path);
      case "call":
        return this.call(expression.fn, expression.argv, frame, policy);
      case "coalesce":
        return this.coalesce(expression.argv, frame, policy);
      case "array":
        return this.array(expression.items, frame, policy);
      case "record":
        return this.record(expression.entries, frame, policy);
    }
  }

  private resolveRef(name: string, frame: EvaluationFrame, policy: UnsetBindingPolicy): MaybeValue {
    if (this.parameterNames.has(name)) {
      return frame.params.get(name);
    }
    if (frame.context.isBound(name)) {
      return frame.context.get(name);
    }
    if (policy === "throw") {
      throw new MalformedModelError(`variable "${name}" is read before the condition that binds it was evaluated`);
    }
    return undefined;
  }

  /**
   * A template is absent as soon as one interpolated value is absent
   */
  private renderTemplate(
    source: string,
    parts: readonly TemplatePart[],
    frame: EvaluationFrame,
    policy: UnsetBindingPolicy
  ): MaybeValue {
    let rendered = "";
    for (const part of parts) {
      if (part.kind === "text") {
        rendered += part.text;
        continue;
      }
      const value = this.evaluate(part.expression, frame, policy);
      if (value === undefined) {
        return undefined;
      }
      if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
        throw new MalformedModelError(`template "${source}" cannot interpolate a value of type ${describeValue(value)}`);
      }
      rendered += String(value);
    }
    return rendered;
  }

  private call(
    fn: string,
    argv: readonly Expression[],
    frame: EvaluationFrame,
    policy: UnsetBindingPolicy
  ): MaybeValue {
    const impl = this.functions.get(fn);
    if (!impl) {
      throw new FunctionNotFoundError(fn);
    }
    const args = argv.map((arg) => this.evaluate(arg, frame, policy));
    return impl(args, frame.diagnostics);
  }

  /**
   * Every entry is evaluated, left to right, even after a present value was
   * found; nested calls therefore run exactly once each.
   */
  private coalesce(argv: readonly Expression[], frame: EvaluationFrame, policy: UnsetBindingPolicy): MaybeValue {
    const values = argv.map((arg) => this.evaluate(arg, frame, policy));
    const present = values.find((value) => value !== undefined);
    return present !== undefined ? present : values[values.length - 1];
  }

  private array(items: readonly Expression[], frame: EvaluationFrame, policy: UnsetBindingPolicy): MaybeValue {
    const values: RuleValue[] = [];
    for (const item of items) {
      const value = this.evaluate(item, frame, policy);
      if (value === undefined) {
        return undefined;
      }
      values.push(value);
    }
    return values;
  }

  /**
   * Absent entries are left out of the record
   */
  private record(
    entries: Readonly<Record<string, Expression>>,
    frame: EvaluationFrame,
    policy: UnsetBindingPolicy
  ): RuleRecord {
    const record: RuleRecord = {};
    for (const [key, entry] of Object.entries(entries)) {
      const value = this.evaluate(entry, frame, policy);
      if (value !== undefined) {
        record[key] = value;
      }
    }
    return record;
  }
}
