/**
 * Endpoint Rule Engine Types
 *
 * Defines the compiled rule model consumed by the engine:
 * - Parameter declarations
 * - An ordered condition table with optional variable bindings
 * - An ordered result table (endpoints and rule-defined errors)
 * - A flat node array forming a reduced decision diagram
 *
 * Everything here is plain data so a model can be loaded from JSON and
 * shared between concurrent resolve calls.
 */

// ============================================================================
// VALUES
// ============================================================================

/**
 * A value produced by a parameter, a literal or a rule function.
 * Structured results (partition, ARN, parsed URL) are records.
 */
export type RuleValue = string | number | boolean | RuleValue[] | RuleRecord;

export type RuleRecord = { [key: string]: RuleValue };

/**
 * `undefined` stands for "absent": a parameter that was not supplied, or a
 * function that produced no value.
 */
export type MaybeValue = RuleValue | undefined;

/**
 * Values a caller may supply for a parameter
 */
export type ParameterValue = string | boolean | string[];

export type ParameterType = "string" | "boolean" | "stringArray";

/**
 * Declared type of a condition binding
 */
export type BindingType = ParameterType | "record" | "any";

// ============================================================================
// EXPRESSIONS
// ============================================================================

/**
 * One step of a getAttr path: `authSchemes[0].name` is key, index, key
 */
export type PathPart = { kind: "key"; key: string } | { kind: "index"; index: number };

export type TemplatePart = { kind: "text"; text: string } | { kind: "value"; expression: Expression };

/**
 * Compiled expression tree
 */
export type Expression =
  | { kind: "literal"; value: RuleValue }
  | { kind: "template"; source: string; parts: TemplatePart[] }
  | { kind: "ref"; name: string }
  | { kind: "getAttr"; target: Expression; path: PathPart[] }
  | { kind: "call"; fn: string; argv: Expression[] }
  | { kind: "coalesce"; argv: Expression[] }
  | { kind: "array"; items: Expression[] }
  | { kind: "record"; entries: Record<string, Expression> };

// ============================================================================
// MODEL
// ============================================================================

export interface Parameter {
  name: string;
  type: ParameterType;
  required: boolean;
  default?: ParameterValue;
  documentation?: string;
}

export interface Binding {
  name: string;
  type: BindingType;
}

/**
 * A single indexed test. When `assign` is set, the function result
 * (including an absent one) is stored in the evaluation context under
 * `assign.name`.
 */
export interface Condition {
  index: number;
  fn: string;
  argv: Expression[];
  assign?: Binding;
}

export interface EndpointResult {
  type: "endpoint";
  url: Expression;
  headers: Record<string, Expression[]>;
  properties: Record<string, Expression>;
}

export interface ErrorResult {
  type: "error";
  message: Expression;
}

export type RuleResult = EndpointResult | ErrorResult;

/**
 * Decision node. `highRef` is followed when the condition holds.
 */
export interface DecisionNode {
  conditionIndex: number;
  highRef: number;
  lowRef: number;
}

/**
 * Immutable compiled rule model
 */
export interface RuleModel {
  version: string;
  parameters: Parameter[];
  conditions: Condition[];
  results: RuleResult[];
  nodes: DecisionNode[];
  root: number;
}

// ============================================================================
// REFERENCE ENCODING
// ============================================================================

/**
 * Node references:
 * - `ref >= 0` addresses `nodes[ref]`
 * - `ref === -1` is the "no rule matched" terminal
 * - `ref <= -2` addresses `results[-(ref + 2)]`
 */
export const NO_MATCH_REF = -1;

export type TerminalRef = { kind: "noMatch" } | { kind: "result"; index: number };

export function resultRef(resultIndex: number): number {
  return -(resultIndex + 2);
}

export function isNodeRef(ref: number): boolean {
  return ref >= 0;
}

/**
 * Decode a terminal reference. Callers must check `isNodeRef` first.
 */
export function decodeTerminal(ref: number): TerminalRef {
  if (ref === NO_MATCH_REF) {
    return { kind: "noMatch" };
  }
  return { kind: "result", index: -ref - 2 };
}

// ============================================================================
// OUTCOMES
// ============================================================================

/**
 * The resolved network target
 */
export interface Endpoint {
  url: string;
  headers: Record<string, string[]>;
  properties: Record<string, RuleValue>;
}

/**
 * One fresh (non-memoized) condition evaluation
 */
export interface DiagnosticEntry {
  conditionIndex: number;
  fn: string;
  binding?: string;
  value: MaybeValue;
  outcome: boolean;
}

export type FailureKind = "NoRuleMatched" | "RuleDefinedError" | "InvalidParams";

export interface ResolveFailure {
  kind: FailureKind;
  message: string;
  trace: DiagnosticEntry[];
  // Last error a rule function reported, e.g. why an ARN did not parse
  lastError?: string;
}

export type ResolveResult =
  | { success: true; endpoint: Endpoint }
  | { success: false; failure: ResolveFailure };

/**
 * Parameter values for one resolve call, after defaults were applied
 */
export type ParameterValues = ReadonlyMap<string, ParameterValue>;
