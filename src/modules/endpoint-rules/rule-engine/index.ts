/**
 * Endpoint Rule Engine
 *
 * Exports for the decision-diagram endpoint resolver.
 */

// Types
export * from "./types";

// Errors
export {
  EndpointRulesError,
  MalformedModelError,
  FunctionNotFoundError,
  EndpointResolutionError,
} from "./errors";

// Function registry
export {
  FunctionRegistry,
  type FunctionCallContext,
  type StatefulCallContext,
  type RuleFunction,
  type StatefulRuleFunction,
  type BoundRuleFunction,
} from "./function-registry";

// Values
export { valuesEqual, parsePath, readPath } from "./values";

// Per-call state
export { EvaluationContext, type EvaluationFrame } from "./evaluation-context";
export { DiagnosticsCollector } from "./diagnostics-collector";

// Evaluation
export { ExpressionEvaluator, type UnsetBindingPolicy } from "./expression-evaluator";
export { ConditionEvaluator, toOutcome } from "./condition-evaluator";
export { DecisionWalker } from "./decision-walker";
export { ResultResolver, NO_RULE_MATCHED_MESSAGE } from "./result-resolver";

// Model loading
export { ruleModelSchema, expressionSchema, type SerializedExpression, type SerializedRuleModel } from "./model-schema";
export { loadRuleModel, compileExpression } from "./model-loader";
export { validateRuleModel } from "./model-validator";
export { parseTemplate } from "./template";
export { buildParameters, type ParameterInput, type BuildParametersResult } from "./parameters";

// Main resolver
export { EndpointResolver, createEndpointResolver } from "./endpoint-resolver";
