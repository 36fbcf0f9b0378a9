import { describe, expect, it } from "vitest";

import { FunctionNotFoundError, MalformedModelError } from "./errors";
import { FunctionRegistry } from "./function-registry";
import { loadRuleModel } from "./model-loader";

describe("loadRuleModel", () => {
  const registry = new FunctionRegistry()
    .register("isSet", (args) => args[0] !== undefined)
    .register("parse", (args) => {
      const raw = args[0];
      return typeof raw === "string" ? { raw } : undefined;
    });

  const createModel = (overrides: Record<string, unknown> = {}) => ({
    parameters: [{ name: "Host", type: "string" }],
    conditions: [{ fn: "isSet", argv: [{ kind: "ref", name: "Host" }] }],
    results: [
      { type: "endpoint", url: { kind: "template", template: "https://{Host}.example.com" } },
      { type: "error", message: { kind: "literal", value: "Host is required" } },
    ],
    nodes: [{ conditionIndex: 0, highRef: -2, lowRef: -3 }],
    root: 0,
    ...overrides,
  });

  const issuesOf = (input: unknown): string[] => {
    try {
      loadRuleModel(input, registry);
    } catch (error) {
      if (error instanceof MalformedModelError) {
        return error.issues;
      }
      throw error;
    }
    throw new Error("expected the model to be rejected");
  };

  describe("parsing", () => {
    it("should apply defaults and compile templates", () => {
      const model = loadRuleModel(createModel(), registry);

      expect(model.version).toBe("1.0");
      expect(model.parameters).toEqual([{ name: "Host", type: "string", required: false }]);
      expect(model.conditions[0].index).toBe(0);
      expect(model.results[0]).toEqual({
        type: "endpoint",
        url: {
          kind: "template",
          source: "https://{Host}.example.com",
          parts: [
            { kind: "text", text: "https://" },
            { kind: "value", expression: { kind: "ref", name: "Host" } },
            { kind: "text", text: ".example.com" },
          ],
        },
        headers: {},
        properties: {},
      });
    });

    it("should freeze the loaded model", () => {
      const model = loadRuleModel(createModel(), registry);

      expect(Object.isFrozen(model)).toBe(true);
      expect(Object.isFrozen(model.nodes[0])).toBe(true);
      expect(Object.isFrozen(model.conditions[0].argv)).toBe(true);
    });

    it("should report schema violations with their path", () => {
      expect(issuesOf(createModel({ root: undefined }))).toEqual(["root: Required"]);
    });

    it("should check parameter defaults against the declared type", () => {
      const parameters = [{ name: "Host", type: "string", default: true }];

      expect(issuesOf(createModel({ parameters }))).toEqual([
        'parameters.0.default: default for "Host" must be of type string',
      ]);
    });

    it("should reject a malformed template", () => {
      const results = [{ type: "endpoint", url: { kind: "template", template: "https://{Host" } }];

      expect(issuesOf(createModel({ results, nodes: [{ conditionIndex: 0, highRef: -2, lowRef: -1 }] }))).toEqual([
        'unclosed "{" in template "https://{Host"',
      ]);
    });
  });

  describe("validation", () => {
    it("should collect name problems", () => {
      const parameters = [
        { name: "Host", type: "string" },
        { name: "Host", type: "string" },
      ];
      const conditions = [
        { fn: "isSet", argv: [{ kind: "ref", name: "Missing" }] },
        { fn: "parse", argv: [{ kind: "ref", name: "Host" }], assign: { name: "Host" } },
      ];

      expect(issuesOf(createModel({ parameters, conditions }))).toEqual([
        'parameter "Host" is declared more than once',
        'conditions[1] binds "Host", which is already a parameter',
        'conditions[0] references unknown name "Missing"',
      ]);
    });

    it("should reject reading a binding before the condition that introduces it", () => {
      const conditions = [
        { fn: "isSet", argv: [{ kind: "ref", name: "parsed" }] },
        { fn: "parse", argv: [{ kind: "ref", name: "Host" }], assign: { name: "parsed" } },
      ];

      expect(issuesOf(createModel({ conditions }))).toEqual([
        'conditions[0] references "parsed", which is bound by conditions[1]',
      ]);
    });

    it("should reject a binding read on a path that skips the condition introducing it", () => {
      const conditions = [
        { fn: "isSet", argv: [{ kind: "ref", name: "Host" }] },
        { fn: "parse", argv: [{ kind: "ref", name: "Host" }], assign: { name: "parsed" } },
        { fn: "isSet", argv: [{ kind: "ref", name: "parsed" }] },
      ];
      const nodes = [
        { conditionIndex: 0, highRef: 1, lowRef: 2 },
        { conditionIndex: 1, highRef: -2, lowRef: -3 },
        { conditionIndex: 2, highRef: -2, lowRef: -3 },
      ];

      expect(issuesOf(createModel({ conditions, nodes }))).toEqual([
        'nodes[2] reads "parsed" in conditions[2], but conditions[1] is not evaluated on every path to it',
      ]);
    });

    it("should accept a binding read once every path has evaluated its condition", () => {
      const conditions = [
        { fn: "isSet", argv: [{ kind: "ref", name: "Host" }] },
        { fn: "parse", argv: [{ kind: "ref", name: "Host" }], assign: { name: "parsed" } },
        { fn: "isSet", argv: [{ kind: "ref", name: "parsed" }] },
      ];
      const nodes = [
        { conditionIndex: 0, highRef: 1, lowRef: -3 },
        { conditionIndex: 1, highRef: 2, lowRef: 2 },
        { conditionIndex: 2, highRef: -2, lowRef: -3 },
      ];

      const model = loadRuleModel(createModel({ conditions, nodes }), registry);

      expect(model.nodes).toHaveLength(3);
    });

    it("should reject unknown names in results", () => {
      const results = [{ type: "error", message: { kind: "template", template: "bad {Nope}" } }];

      expect(issuesOf(createModel({ results, nodes: [{ conditionIndex: 0, highRef: -2, lowRef: -1 }] }))).toEqual([
        'results[0].message references unknown name "Nope"',
      ]);
    });

    it("should reject out-of-range references", () => {
      const nodes = [{ conditionIndex: 3, highRef: -5, lowRef: 4 }];

      expect(issuesOf(createModel({ nodes, root: 2 }))).toEqual([
        "root points at node 2, but there are 1 nodes",
        "nodes[0] uses condition 3, but there are 1 conditions",
        "nodes[0].highRef points at result 3, but there are 2 results",
        "nodes[0].lowRef points at node 4, but there are 1 nodes",
      ]);
    });

    it("should reject a cyclic node graph", () => {
      const nodes = [
        { conditionIndex: 0, highRef: 1, lowRef: -2 },
        { conditionIndex: 0, highRef: 0, lowRef: -3 },
      ];

      expect(issuesOf(createModel({ nodes }))).toEqual(["the decision diagram has a cycle through node 0"]);
    });

    it("should throw FunctionNotFoundError for an unregistered function", () => {
      const conditions = [{ fn: "aws.partition", argv: [{ kind: "ref", name: "Host" }] }];

      expect(() => loadRuleModel(createModel({ conditions }), registry)).toThrow(FunctionNotFoundError);
      expect(() => loadRuleModel(createModel({ conditions }), registry)).toThrow(
        'No rule function registered for "aws.partition"'
      );
    });
  });
});
