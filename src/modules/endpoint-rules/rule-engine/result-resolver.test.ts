import { describe, expect, it } from "vitest";

import { DiagnosticsCollector } from "./diagnostics-collector";
import { EndpointRulesError, MalformedModelError } from "./errors";
import { EvaluationContext, type EvaluationFrame } from "./evaluation-context";
import { ExpressionEvaluator } from "./expression-evaluator";
import { NO_RULE_MATCHED_MESSAGE, ResultResolver } from "./result-resolver";
import type { Expression, ParameterValue, RuleModel, RuleResult } from "./types";

describe("ResultResolver", () => {
  const ref = (name: string): Expression => ({ kind: "ref", name });
  const literal = (value: string): Expression => ({ kind: "literal", value });

  const createResolver = (results: RuleResult[]) => {
    const model: RuleModel = {
      version: "1.0",
      parameters: [
        { name: "Region", type: "string", required: false },
        { name: "Token", type: "string", required: false },
      ],
      conditions: [],
      results,
      nodes: [],
      root: -1,
    };
    return new ResultResolver(model, new ExpressionEvaluator(model, new Map()));
  };

  const createFrame = (params: Record<string, ParameterValue> = {}): EvaluationFrame => ({
    params: new Map(Object.entries(params)),
    context: new EvaluationContext(),
    diagnostics: new DiagnosticsCollector(),
  });

  describe("no match", () => {
    it("should return a NoRuleMatched failure with the trace", () => {
      const frame = createFrame();
      frame.diagnostics.record({ conditionIndex: 0, fn: "isSet", value: false, outcome: false });

      expect(createResolver([]).render({ kind: "noMatch" }, frame)).toEqual({
        success: false,
        failure: {
          kind: "NoRuleMatched",
          message: NO_RULE_MATCHED_MESSAGE,
          trace: [{ conditionIndex: 0, fn: "isSet", value: false, outcome: false }],
        },
      });
    });

    it("should attach the last error a function reported", () => {
      const frame = createFrame();
      frame.diagnostics.reportError("ARN resource must not be empty");

      const outcome = createResolver([]).render({ kind: "noMatch" }, frame);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.failure.lastError).toBe("ARN resource must not be empty");
      }
    });
  });

  describe("error results", () => {
    it("should render the message as a RuleDefinedError", () => {
      const resolver = createResolver([
        {
          type: "error",
          message: {
            kind: "template",
            source: "Invalid region: {Region}",
            parts: [
              { kind: "text", text: "Invalid region: " },
              { kind: "value", expression: ref("Region") },
            ],
          },
        },
      ]);

      expect(resolver.render({ kind: "result", index: 0 }, createFrame({ Region: "moon-1" }))).toEqual({
        success: false,
        failure: { kind: "RuleDefinedError", message: "Invalid region: moon-1", trace: [] },
      });
    });

    it("should reject a message that is not a string", () => {
      const resolver = createResolver([{ type: "error", message: ref("Region") }]);

      expect(() => resolver.render({ kind: "result", index: 0 }, createFrame())).toThrow(
        "results[0] message must evaluate to a string, got absent"
      );
    });
  });

  describe("endpoint results", () => {
    const endpoint: RuleResult = {
      type: "endpoint",
      url: { kind: "coalesce", argv: [ref("override"), literal("https://default.example.com")] },
      headers: {
        "x-region": [ref("Region"), literal("fallback")],
        "x-token": [ref("Token")],
      },
      properties: {
        signingRegion: ref("Region"),
        signingName: literal("storage"),
      },
    };

    it("should render url, headers and properties", () => {
      const frame = createFrame({ Region: "eu-west-1" });
      frame.context.bind("override", "https://custom.example.com");

      expect(createResolver([endpoint]).render({ kind: "result", index: 0 }, frame)).toEqual({
        success: true,
        endpoint: {
          url: "https://custom.example.com",
          headers: { "x-region": ["eu-west-1", "fallback"] },
          properties: { signingRegion: "eu-west-1", signingName: "storage" },
        },
      });
    });

    it("should read a binding whose condition never ran as absent", () => {
      expect(createResolver([endpoint]).render({ kind: "result", index: 0 }, createFrame())).toEqual({
        success: true,
        endpoint: {
          url: "https://default.example.com",
          headers: { "x-region": ["fallback"] },
          properties: { signingName: "storage" },
        },
      });
    });

    it("should emit a header only when one of its values is present", () => {
      const frame = createFrame({ Region: "eu-west-1", Token: "test-token" });

      const rendered = createResolver([endpoint]).render({ kind: "result", index: 0 }, frame);

      expect(rendered.success && rendered.endpoint.headers).toEqual({
        "x-region": ["eu-west-1", "fallback"],
        "x-token": ["test-token"],
      });
      const withoutToken = createResolver([endpoint]).render({ kind: "result", index: 0 }, createFrame());
      expect(withoutToken.success && Object.keys(withoutToken.endpoint.headers)).toEqual(["x-region"]);
    });

        it("should reject an absent url", () => {
      const resolver = createResolver([{ type: "endpoint", url: ref("Region"), headers: {}, properties: {} }]);

      expect(() => resolver.render({ kind: "result", index: 0 }, createFrame())).toThrow(MalformedModelError);
      expect(() => resolver.render({ kind: "result", index: 0 }, createFrame())).toThrow(
        "results[0] url must evaluate to a string, got absent"
      );
    });

    it("should seal the evaluation context", () => {
      const frame = createFrame();

      createResolver([endpoint]).render({ kind: "result", index: 0 }, frame);

      expect(() => frame.context.bind("late", "value")).toThrow(EndpointRulesError);
    });
  });

  it("should reject an out-of-range result index", () => {
    expect(() => createResolver([]).render({ kind: "result", index: 3 }, createFrame())).toThrow(
      "result index 3 is out of range"
    );
  });
});
