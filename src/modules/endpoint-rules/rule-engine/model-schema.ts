/**
 * Rule Model Schema
 *
 * zod schemas for the serialized rule model handed over by the rule
 * compiler. Parsing only checks shape; cross-references are checked by the
 * model validator.
 */

import { z } from "zod";

import type { RuleValue } from "./types";

// ============================================================================
// SERIALIZED EXPRESSIONS
// ============================================================================

export type SerializedExpression =
  | { kind: "literal"; value: RuleValue }
  | { kind: "template"; template: string }
  | { kind: "ref"; name: string }
  | { kind: "getAttr"; target: SerializedExpression; path: string }
  | { kind: "call"; fn: string; argv: SerializedExpression[] }
  | { kind: "coalesce"; argv: SerializedExpression[] }
  | { kind: "array"; items: SerializedExpression[] }
  | { kind: "record"; entries: Record<string, SerializedExpression> };

const ruleValueSchema: z.ZodType<RuleValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().int(),
    z.boolean(),
    z.array(ruleValueSchema),
    z.record(ruleValueSchema),
  ])
);

/**
 * Schema for an expression (recursive via lazy)
 */
export const expressionSchema: z.ZodType<SerializedExpression> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("literal"), value: ruleValueSchema }),
    z.object({ kind: z.literal("template"), template: z.string() }),
    z.object({ kind: z.literal("ref"), name: z.string().min(1) }),
    z.object({ kind: z.literal("getAttr"), target: expressionSchema, path: z.string().min(1) }),
    z.object({ kind: z.literal("call"), fn: z.string().min(1), argv: z.array(expressionSchema) }),
    z.object({ kind: z.literal("coalesce"), argv: z.array(expressionSchema) }),
    z.object({ kind: z.literal("array"), items: z.array(expressionSchema) }),
    z.object({ kind: z.literal("record"), entries: z.record(expressionSchema) }),
  ])
);

// ============================================================================
// MODEL TABLES
// ============================================================================

const parameterValueSchema = z.union([z.string(), z.boolean(), z.array(z.string())]);

const parameterSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(["string", "boolean", "stringArray"]),
    required: z.boolean().default(false),
    default: parameterValueSchema.optional(),
    documentation: z.string().optional(),
  })
  .superRefine((parameter, ctx) => {
    const value = parameter.default;
    if (value === undefined) return;

    const matches =
      parameter.type === "stringArray"
        ? Array.isArray(value)
        : typeof value === parameter.type;
    if (!matches) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `default for "${parameter.name}" must be of type ${parameter.type}`,
        path: ["default"],
      });
    }
  });

const conditionSchema = z.object({
  fn: z.string().min(1),
  argv: z.array(expressionSchema).default([]),
  assign: z
    .object({
      name: z.string().min(1),
      type: z.enum(["string", "boolean", "stringArray", "record", "any"]).default("any"),
    })
    .optional(),
});

const resultSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("endpoint"),
    url: expressionSchema,
    headers: z.record(z.array(expressionSchema)).default({}),
    properties: z.record(expressionSchema).default({}),
  }),
  z.object({
    type: z.literal("error"),
    message: expressionSchema,
  }),
]);

const nodeSchema = z.object({
  conditionIndex: z.number().int().nonnegative(),
  highRef: z.number().int(),
  lowRef: z.number().int(),
});

/**
 * Schema for a complete serialized rule model
 */
export const ruleModelSchema = z.object({
  version: z.string().min(1).default("1.0"),
  parameters: z.array(parameterSchema).default([]),
  conditions: z.array(conditionSchema).default([]),
  results: z.array(resultSchema).default([]),
  nodes: z.array(nodeSchema).default([]),
  root: z.number().int(),
});

export type SerializedRuleModel = z.infer<typeof ruleModelSchema>;
