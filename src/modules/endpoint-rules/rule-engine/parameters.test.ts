import { describe, expect, it } from "vitest";

import { buildParameters } from "./parameters";
import type { Parameter } from "./types";

describe("buildParameters", () => {
  const declarations: Parameter[] = [
    { name: "Region", type: "string", required: true },
    { name: "UseFIPS", type: "boolean", required: true, default: false },
    { name: "Endpoint", type: "string", required: false },
    { name: "Tags", type: "stringArray", required: false, default: ["default"] },
  ];

  it("should apply defaults and skip absent optional parameters", () => {
    const result = buildParameters(declarations, { Region: "us-west-2" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(Object.fromEntries(result.values)).toEqual({
        Region: "us-west-2",
        UseFIPS: false,
        Tags: ["default"],
      });
      expect(result.values.has("Endpoint")).toBe(false);
    }
  });

  it("should accept a Map and treat null as not supplied", () => {
    const result = buildParameters(
      declarations,
      new Map([
        ["Region", "us-west-2"],
        ["UseFIPS", null],
        ["Endpoint", "https://example.com"],
      ])
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.values.get("UseFIPS")).toBe(false);
      expect(result.values.get("Endpoint")).toBe("https://example.com");
    }
  });

  it("should report a missing required parameter", () => {
    expect(buildParameters(declarations, {})).toEqual({
      success: false,
      failure: { kind: "InvalidParams", message: "a required field was missing: `Region`", trace: [] },
    });
  });

  it("should report a value of the wrong type", () => {
    expect(buildParameters(declarations, { Region: "us-west-2", UseFIPS: "yes" })).toEqual({
      success: false,
      failure: {
        kind: "InvalidParams",
        message: "invalid value for field: `UseFIPS` - expected a boolean",
        trace: [],
      },
    });
  });

  it("should report an undeclared parameter", () => {
    expect(buildParameters(declarations, { Region: "us-west-2", Color: "blue" })).toEqual({
      success: false,
      failure: {
        kind: "InvalidParams",
        message: "invalid value for field: `Color` - not a declared parameter",
        trace: [],
      },
    });
  });

  it("should check every item of a string array", () => {
    const result = buildParameters(declarations, { Region: "us-west-2", Tags: ["a", "b"] });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.values.get("Tags")).toEqual(["a", "b"]);
    }
  });
});
