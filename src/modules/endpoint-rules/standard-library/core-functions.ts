/**
 * Core rule functions: presence, boolean logic, string comparison and
 * string manipulation.
 */

import { MalformedModelError } from "../rule-engine/errors";
import type { RuleFunction } from "../rule-engine/function-registry";
import { parsePath, readPath } from "../rule-engine/values";
import { booleanArg, expectArity, integerArg, stringArg } from "./arguments";

export const isSet: RuleFunction = (args) => {
  expectArity("isSet", args, 1);
  return args[0] !== undefined;
};

export const not: RuleFunction = (args) => {
  expectArity("not", args, 1);
  const value = booleanArg("not", args, 0);
  return value === undefined ? undefined : !value;
};

export const booleanEquals: RuleFunction = (args) => {
  expectArity("booleanEquals", args, 2);
  const left = booleanArg("booleanEquals", args, 0);
  const right = booleanArg("booleanEquals", args, 1);
  return left !== undefined && right !== undefined && left === right;
};

export const stringEquals: RuleFunction = (args) => {
  expectArity("stringEquals", args, 2);
  const left = stringArg("stringEquals", args, 0);
  const right = stringArg("stringEquals", args, 1);
  return left !== undefined && right !== undefined && left === right;
};

/**
 * getAttr(value, "path[0].key")
 */
export const getAttr: RuleFunction = (args) => {
  expectArity("getAttr", args, 2);
  const path = stringArg("getAttr", args, 1);
  if (path === undefined) {
    throw new MalformedModelError("getAttr requires a literal path");
  }
  return readPath(args[0], parsePath(path));
};

/**
 * substring(input, start, stop, reverse). ASCII input only; with `reverse`
 * the offsets count from the end of the string.
 */
export const substring: RuleFunction = (args) => {
  expectArity("substring", args, 4);
  const input = stringArg("substring", args, 0);
  const start = integerArg("substring", args, 1);
  const stop = integerArg("substring", args, 2);
  const reverse = booleanArg("substring", args, 3);

  if (input === undefined || start === undefined || stop === undefined || reverse === undefined) {
    return undefined;
  }
  if (!/^[\x00-\x7f]*$/.test(input)) {
    return undefined;
  }
  if (start < 0 || start >= stop || stop > input.length) {
    return undefined;
  }

  return reverse ? input.slice(input.length - stop, input.length - start) : input.slice(start, stop);
};

const UNRESERVED = /[A-Za-z0-9\-._~]/;

/**
 * RFC 3986 percent-encoding; only unreserved characters pass through
 */
export const uriEncode: RuleFunction = (args) => {
  expectArity("uriEncode", args, 1);
  const input = stringArg("uriEncode", args, 0);
  if (input === undefined) {
    return undefined;
  }

  let encoded = "";
  for (const char of input) {
    if (UNRESERVED.test(char)) {
      encoded += char;
      continue;
    }
    for (const byte of Buffer.from(char, "utf8")) {
      encoded += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return encoded;
};
