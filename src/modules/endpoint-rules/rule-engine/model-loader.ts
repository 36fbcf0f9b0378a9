/**
 * Model Loader
 *
 * Validates a serialized rule model, compiles its expressions (templates,
 * getAttr paths) and returns an immutable RuleModel.
 */

import { createLogger } from "@/lib/logger";

import { MalformedModelError } from "./errors";
import type { FunctionRegistry } from "./function-registry";
import { ruleModelSchema, type SerializedExpression, type SerializedRuleModel } from "./model-schema";
import { validateRuleModel } from "./model-validator";
import { parseTemplate } from "./template";
import type { Expression, RuleModel, RuleResult } from "./types";
import { parsePath } from "./values";

const logger = createLogger("model-loader");

export function compileExpression(expression: SerializedExpression): Expression {
  switch (expression.kind) {
    case "literal":
    case "ref":
      return { ...expression };
    case "template":
      return { kind: "template", source: expression.template, parts: parseTemplate(expression.template) };
    case "getAttr":
      return { kind: "getAttr", target: compileExpression(expression.target), path: parsePath(expression.path) };
    case "call":
      return { kind: "call", fn: expression.fn, argv: expression.argv.map(compileExpression) };
    case "coalesce":
      return { kind: "coalesce", argv: expression.argv.map(compileExpression) };
    case "array":
      return { kind: "array", items: expression.items.map(compileExpression) };
    case "record":
      return {
        kind: "record",
        entries: Object.fromEntries(
          Object.entries(expression.entries).map(([key, entry]) => [key, compileExpression(entry)])
        ),
      };
  }
}

function compileResult(result: SerializedRuleModel["results"][number]): RuleResult {
  if (result.type === "error") {
    return { type: "error", message: compileExpression(result.message) };
  }
  return {
    type: "endpoint",
    url: compileExpression(result.url),
    headers: Object.fromEntries(
      Object.entries(result.headers).map(([name, values]) => [name, values.map(compileExpression)])
    ),
    properties: Object.fromEntries(
      Object.entries(result.properties).map(([name, value]) => [name, compileExpression(value)])
    ),
  };
}

function compileModel(serialized: SerializedRuleModel): RuleModel {
  return {
    version: serialized.version,
    parameters: serialized.parameters.map((parameter) => ({ ...parameter })),
    conditions: serialized.conditions.map((condition, index) => ({
      index,
      fn: condition.fn,
      argv: condition.argv.map(compileExpression),
      ...(condition.assign && { assign: { ...condition.assign } }),
    })),
    results: serialized.results.map(compileResult),
    nodes: serialized.nodes.map((node) => ({ ...node })),
    root: serialized.root,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
}

/**
 * Parse, compile and validate a rule model.
 *
 * Throws MalformedModelError or FunctionNotFoundError; both are build-time
 * errors and should surface when the model is loaded, not per call.
 */
export function loadRuleModel(input: unknown, registry: FunctionRegistry): RuleModel {
  const parsed = ruleModelSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedModelError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "model"}: ${issue.message}`)
    );
  }

  const model = compileModel(parsed.data);
  validateRuleModel(model, registry);

  logger.info("Rule model loaded", {
    version: model.version,
    parameters: model.parameters.length,
    conditions: model.conditions.length,
    results: model.results.length,
    nodes: model.nodes.length,
  });

  return deepFreeze(model);
}
