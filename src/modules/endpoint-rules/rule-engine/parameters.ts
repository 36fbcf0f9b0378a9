/**
 * Parameter Builder
 *
 * Turns caller-supplied values into the parameter map of one resolve call:
 * applies declared defaults, enforces required parameters and checks types.
 */

import type { Parameter, ParameterType, ParameterValue, ParameterValues, ResolveFailure } from "./types";

/**
 * Caller input. `undefined` and `null` both mean "not supplied".
 */
export type ParameterInput =
  | ReadonlyMap<string, ParameterValue | null | undefined>
  | Readonly<Record<string, ParameterValue | null | undefined>>;

export type BuildParametersResult =
  | { success: true; values: ParameterValues }
  | { success: false; failure: ResolveFailure };

const TYPE_LABELS: Record<ParameterType, string> = {
  string: "a string",
  boolean: "a boolean",
  stringArray: "an array of strings",
};

function isParameterInputMap(
  input: ParameterInput
): input is ReadonlyMap<string, ParameterValue | null | undefined> {
  return input instanceof Map;
}

function hasType(value: unknown, type: ParameterType): value is ParameterValue {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "stringArray":
      return Array.isArray(value) && value.every((item) => typeof item === "string");
  }
}

function invalidParams(message: string): BuildParametersResult {
  return { success: false, failure: { kind: "InvalidParams", message, trace: [] } };
}

export function buildParameters(
  declarations: readonly Parameter[],
  input: ParameterInput
): BuildParametersResult {
  const supplied = new Map<string, unknown>(
    isParameterInputMap(input) ? input.entries() : Object.entries(input)
  );

  const declared = new Set(declarations.map((parameter) => parameter.name));
  for (const name of supplied.keys()) {
    if (!declared.has(name)) {
      return invalidParams(`invalid value for field: \`${name}\` - not a declared parameter`);
    }
  }

  const values = new Map<string, ParameterValue>();
  for (const parameter of declarations) {
    const raw = supplied.get(parameter.name);
    const value = raw === undefined || raw === null ? parameter.default : raw;

    if (value === undefined) {
      if (parameter.required) {
        return invalidParams(`a required field was missing: \`${parameter.name}\``);
      }
      continue;
    }
    if (!hasType(value, parameter.type)) {
      return invalidParams(
        `invalid value for field: \`${parameter.name}\` - expected ${TYPE_LABELS[parameter.type]}`
      );
    }
    values.set(parameter.name, value);
  }

  return { success: true, values };
}
