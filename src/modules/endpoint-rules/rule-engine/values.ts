/**
 * Value helpers shared by the evaluator, the standard library and the loader.
 */

import { MalformedModelError } from "./errors";
import type { BindingType, MaybeValue, PathPart, RuleRecord, RuleValue } from "./types";

export function isRecord(value: MaybeValue): value is RuleRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: MaybeValue): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Structural equality. Records compare by key set and values, arrays
 * element-wise.
 */
export function valuesEqual(a: MaybeValue, b: MaybeValue): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    const other = b;
    return a.every((item, i) => valuesEqual(item, other[i]));
  }
  if (isRecord(a)) {
    if (!isRecord(b)) {
      return false;
    }
    const left = a;
    const right = b;
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every((key) => Object.prototype.hasOwnProperty.call(right, key) && valuesEqual(left[key], right[key]))
    );
  }
  return a === b;
}

/**
 * Check a present value against a declared binding type
 */
export function matchesBindingType(value: RuleValue, type: BindingType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "stringArray":
      return isStringArray(value);
    case "record":
      return isRecord(value);
    case "any":
      return true;
  }
}

/**
 * Short human-readable type name for error messages
 */
export function describeValue(value: MaybeValue): string {
  if (value === undefined) return "absent";
  if (Array.isArray(value)) return "array";
  if (isRecord(value)) return "record";
  return typeof value;
}

// ============================================================================
// PATHS
// ============================================================================

const PATH_SEGMENT = /^([^[\]]*)((?:\[\d+\])*)$/;

/**
 * Parse a getAttr path such as `authSchemes[0].signingRegion`
 */
export function parsePath(path: string): PathPart[] {
  if (path.length === 0) {
    throw new MalformedModelError("getAttr path must not be empty");
  }

  const parts: PathPart[] = [];
  for (const segment of path.split(".")) {
    const match = PATH_SEGMENT.exec(segment);
    if (!match) {
      throw new MalformedModelError(`invalid getAttr path "${path}"`);
    }
    const [, key, indexes] = match;
    if (key.length > 0) {
      parts.push({ kind: "key", key });
    } else if (indexes.length === 0) {
      throw new MalformedModelError(`empty segment in getAttr path "${path}"`);
    }
    for (const index of indexes.matchAll(/\[(\d+)\]/g)) {
      parts.push({ kind: "index", index: Number(index[1]) });
    }
  }
  return parts;
}

/**
 * Walk a parsed path. A missing key, an out-of-range index or a step into a
 * scalar yields absent.
 */
export function readPath(value: MaybeValue, path: readonly PathPart[]): MaybeValue {
  let current = value;
  for (const part of path) {
    if (part.kind === "key") {
      if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part.key)) {
        return undefined;
      }
      current = current[part.key];
    } else {
      if (!Array.isArray(current) || part.index >= current.length) {
        return undefined;
      }
      current = current[part.index];
    }
  }
  return current;
}
