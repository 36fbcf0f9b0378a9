/**
 * Endpoint Resolver
 *
 * Main entry point: coordinates parameter building, decision diagram
 * traversal and result rendering for one rule model.
 *
 * A resolver is immutable once constructed and can be shared between
 * concurrent callers. All per-call state (bindings, memo table,
 * diagnostics) is allocated inside `resolve`.
 */

import { createLogger } from "@/lib/logger";

import { ConditionEvaluator } from "./condition-evaluator";
import { DecisionWalker } from "./decision-walker";
import { DiagnosticsCollector } from "./diagnostics-collector";
import { EndpointResolutionError } from "./errors";
import { EvaluationContext, type EvaluationFrame } from "./evaluation-context";
import { ExpressionEvaluator } from "./expression-evaluator";
import type { FunctionRegistry } from "./function-registry";
import { loadRuleModel } from "./model-loader";
import { buildParameters, type ParameterInput } from "./parameters";
import { ResultResolver } from "./result-resolver";
import type { Endpoint, Parameter, ResolveResult, RuleModel } from "./types";

const logger = createLogger("endpoint-resolver");

export class EndpointResolver {
  readonly usedFunctions: ReadonlySet<string>;
  private readonly walker: DecisionWalker;
  private readonly results: ResultResolver;

  /**
   * `model` must come from `loadRuleModel`, which performs the build-time
   * checks. Constructing a resolver freezes the registry.
   */
  constructor(
    readonly model: RuleModel,
    registry: FunctionRegistry
  ) {
    registry.freeze();
    this.usedFunctions = registry.usedFunctions(model);

    const functions = registry.instantiate(this.usedFunctions);
    const expressions = new ExpressionEvaluator(model, functions);

    this.walker = new DecisionWalker(model, new ConditionEvaluator(model, expressions, functions));
    this.results = new ResultResolver(model, expressions);
  }

  get parameters(): readonly Parameter[] {
    return this.model.parameters;
  }

  /**
   * Resolve the endpoint for one call.
   *
   * NoRuleMatched, RuleDefinedError and InvalidParams are returned as
   * failures; only a malformed model throws.
   */
  resolve(params: ParameterInput): ResolveResult {
    const built = buildParameters(this.model.parameters, params);
    if (!built.success) {
      logger.debug("Endpoint parameters rejected", { message: built.failure.message });
      return built;
    }

    const frame: EvaluationFrame = {
      params: built.values,
      context: new EvaluationContext(),
      diagnostics: new DiagnosticsCollector(),
    };

    const terminal = this.walker.resolve(frame);
    const outcome = this.results.render(terminal, frame);

    if (outcome.success) {
      logger.debug("Endpoint resolved", { url: outcome.endpoint.url, evaluated: frame.diagnostics.size });
    } else {
      logger.debug("Endpoint resolution failed", {
        kind: outcome.failure.kind,
        message: outcome.failure.message,
        evaluated: frame.diagnostics.size,
      });
    }

    return outcome;
  }

  /**
   * Like `resolve`, but throws EndpointResolutionError on failure
   */
  resolveOrThrow(params: ParameterInput): Endpoint {
    const outcome = this.resolve(params);
    if (!outcome.success) {
      throw new EndpointResolutionError(outcome.failure);
    }
    return outcome.endpoint;
  }
}

/**
 * Load a serialized model and build a resolver for it
 */
export function createEndpointResolver(input: unknown, registry: FunctionRegistry): EndpointResolver {
  return new EndpointResolver(loadRuleModel(input, registry), registry);
}
