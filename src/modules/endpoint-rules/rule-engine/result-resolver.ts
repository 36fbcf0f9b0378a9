/**
 * Result Resolver
 *
 * Renders the terminal reached by the decision walker into the
 * caller-visible outcome: an endpoint, a rule-defined error, or
 * "no rule matched".
 */

import { MalformedModelError } from "./errors";
import type { EvaluationFrame } from "./evaluation-context";
import type { ExpressionEvaluator } from "./expression-evaluator";
import type {
  Endpoint,
  EndpointResult,
  FailureKind,
  ResolveResult,
  RuleModel,
  RuleValue,
  TerminalRef,
} from "./types";
import { describeValue } from "./values";

export const NO_RULE_MATCHED_MESSAGE = "No endpoint rule matched";

export class ResultResolver {
  constructor(
    private readonly model: RuleModel,
    private readonly expressions: ExpressionEvaluator
  ) {}

  render(terminal: TerminalRef, frame: EvaluationFrame): ResolveResult {
    // Bindings are final once a result renders
    frame.context.seal();

    if (terminal.kind === "noMatch") {
      return this.failure("NoRuleMatched", NO_RULE_MATCHED_MESSAGE, frame);
    }

    const result = this.model.results[terminal.index];
    if (!result) {
      throw new MalformedModelError(`result index ${terminal.index} is out of range`);
    }

    if (result.type === "error") {
      const message = this.expressions.evaluate(result.message, frame, "absent");
      if (typeof message !== "string") {
        throw new MalformedModelError(
          `results[${terminal.index}] message must evaluate to a string, got ${describeValue(message)}`
        );
      }
      return this.failure("RuleDefinedError", message, frame);
    }

    return { success: true, endpoint: this.renderEndpoint(terminal.index, result, frame) };
  }

  private renderEndpoint(index: number, result: EndpointResult, frame: EvaluationFrame): Endpoint {
    const url = this.expressions.evaluate(result.url, frame, "absent");
    if (typeof url !== "string") {
      throw new MalformedModelError(`results[${index}] url must evaluate to a string, got ${describeValue(url)}`);
    }

    const headers: Record<string, string[]> = {};
    for (const [name, expressions] of Object.entries(result.headers)) {
      const values: string[] = [];
      for (const expression of expressions) {
        const value = this.expressions.evaluate(expression, frame, "absent");
        if (value === undefined) {
          continue;
        }
        if (typeof value !== "string") {
          throw new MalformedModelError(
            `results[${index}] header "${name}" must evaluate to a string, got ${describeValue(value)}`
          );
        }
        values.push(value);
      }
      if (values.length > 0) {
        headers[name] = values;
      }
    }

    const properties: Record<string, RuleValue> = {};
    for (const [name, expression] of Object.entries(result.properties)) {
      const value = this.expressions.evaluate(expression, frame, "absent");
      if (value !== undefined) {
        properties[name] = value;
      }
    }

    return { url, headers, properties };
  }

  private failure(kind: FailureKind, message: string, frame: EvaluationFrame): ResolveResult {
    const { diagnostics } = frame;
    return {
      success: false,
      failure: {
        kind,
        message,
        trace: diagnostics.trace,
        ...(diagnostics.lastError !== undefined && { lastError: diagnostics.lastError }),
      },
    };
  }
}
