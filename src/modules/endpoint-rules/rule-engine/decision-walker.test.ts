import { describe, expect, it } from "vitest";

import { ConditionEvaluator } from "./condition-evaluator";
import { DecisionWalker } from "./decision-walker";
import { DiagnosticsCollector } from "./diagnostics-collector";
import { MalformedModelError } from "./errors";
import { EvaluationContext, type EvaluationFrame } from "./evaluation-context";
import { ExpressionEvaluator } from "./expression-evaluator";
import type { BoundRuleFunction } from "./function-registry";
import { NO_MATCH_REF, resultRef, type DecisionNode, type ParameterValue, type RuleModel } from "./types";

describe("DecisionWalker", () => {
  const createWalker = (nodes: DecisionNode[], root: number) => {
    let counter = 0;
    const functions = new Map<string, BoundRuleFunction>([
      ["isSet", (args) => args[0] !== undefined],
      [
        "count",
        () => {
          counter++;
          return true;
        },
      ],
    ]);
    const model: RuleModel = {
      version: "1.0",
      parameters: [{ name: "A", type: "string", required: false }],
      conditions: [
        { index: 0, fn: "isSet", argv: [{ kind: "ref", name: "A" }] },
        { index: 1, fn: "count", argv: [] },
        { index: 2, fn: "count", argv: [] },
      ],
      results: [],
      nodes,
      root,
    };
    const conditions = new ConditionEvaluator(model, new ExpressionEvaluator(model, functions), functions);
    return { walker: new DecisionWalker(model, conditions), evaluations: () => counter };
  };

  const createFrame = (params: Record<string, ParameterValue> = {}): EvaluationFrame => ({
    params: new Map(Object.entries(params)),
    context: new EvaluationContext(),
    diagnostics: new DiagnosticsCollector(),
  });

  it("should follow highRef when the condition holds and lowRef otherwise", () => {
    const { walker } = createWalker([{ conditionIndex: 0, highRef: resultRef(0), lowRef: resultRef(1) }], 0);

    expect(walker.resolve(createFrame({ A: "x" }))).toEqual({ kind: "result", index: 0 });
    expect(walker.resolve(createFrame())).toEqual({ kind: "result", index: 1 });
  });

  it("should return a terminal root without evaluating anything", () => {
    const { walker, evaluations } = createWalker([], NO_MATCH_REF);
    const frame = createFrame();

    expect(walker.resolve(frame)).toEqual({ kind: "noMatch" });
    expect(evaluations()).toBe(0);
    expect(frame.diagnostics.size).toBe(0);
  });

  it("should evaluate a condition shared by two nodes on one path only once", () => {
    const { walker, evaluations } = createWalker(
      [
        { conditionIndex: 2, highRef: 1, lowRef: -1 },
        { conditionIndex: 0, highRef: 2, lowRef: 2 },
        { conditionIndex: 2, highRef: -2, lowRef: -1 },
      ],
      0
    );
    const frame = createFrame({ A: "x" });

    expect(walker.resolve(frame)).toEqual({ kind: "result", index: 0 });
    expect(evaluations()).toBe(1);
    expect(frame.diagnostics.trace.map((entry) => entry.conditionIndex)).toEqual([2, 0]);
  });

  it("should start with a fresh memo table on every call", () => {
    const { walker, evaluations } = createWalker([{ conditionIndex: 1, highRef: -2, lowRef: -1 }], 0);

    walker.resolve(createFrame());
    walker.resolve(createFrame());

    expect(evaluations()).toBe(2);
  });

  it("should stop a cyclic traversal", () => {
    const { walker } = createWalker(
      [
        { conditionIndex: 1, highRef: 1, lowRef: 1 },
        { conditionIndex: 2, highRef: 0, lowRef: 0 },
      ],
      0
    );

    expect(() => walker.resolve(createFrame())).toThrow(MalformedModelError);
    expect(() => walker.resolve(createFrame())).toThrow(
      "decision diagram traversal exceeded 2 steps; the node graph has a cycle"
    );
  });

  it("should reject an out-of-range node reference", () => {
    const { walker } = createWalker([{ conditionIndex: 0, highRef: 7, lowRef: -1 }], 0);

    expect(() => walker.resolve(createFrame({ A: "x" }))).toThrow("node reference 7 is out of range");
  });

  it("should reject a node whose condition does not exist", () => {
    const { walker } = createWalker([{ conditionIndex: 5, highRef: -2, lowRef: -1 }], 0);

    expect(() => walker.resolve(createFrame())).toThrow("nodes[0] uses condition 5, which does not exist");
  });
});
