import { MalformedModelError } from "../rule-engine/errors";
import type { MaybeValue } from "../rule-engine/types";
import { describeValue } from "../rule-engine/values";

/**
 * Argument readers for rule functions. An absent argument reads as
 * undefined; a present argument of the wrong type is a model error.
 */

function argumentError(fn: string, position: number, expected: string, value: MaybeValue): MalformedModelError {
  return new MalformedModelError(
    `${fn} expects ${expected} as argument ${position + 1}, got ${describeValue(value)}`
  );
}

export function expectArity(fn: string, args: readonly MaybeValue[], count: number): void {
  if (args.length !== count) {
    throw new MalformedModelError(`${fn} expects ${count} argument(s), got ${args.length}`);
  }
}

export function stringArg(fn: string, args: readonly MaybeValue[], position: number): string | undefined {
  const value = args[position];
  if (value === undefined || typeof value === "string") return value;
  throw argumentError(fn, position, "a string", value);
}

export function booleanArg(fn: string, args: readonly MaybeValue[], position: number): boolean | undefined {
  const value = args[position];
  if (value === undefined || typeof value === "boolean") return value;
  throw argumentError(fn, position, "a boolean", value);
}

export function integerArg(fn: string, args: readonly MaybeValue[], position: number): number | undefined {
  const value = args[position];
  if (value === undefined || (typeof value === "number" && Number.isInteger(value))) return value;
  throw argumentError(fn, position, "an integer", value);
}
