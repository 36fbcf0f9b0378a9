/**
 * URL parsing for endpoint overrides
 */

import { isIPv4 } from "node:net";

import type { RuleFunction } from "../rule-engine/function-registry";
import type { RuleRecord } from "../rule-engine/types";
import { expectArity, stringArg } from "./arguments";

export type UrlDescriptor = {
  scheme: string;
  authority: string;
  path: string;
  normalizedPath: string;
  isIp: boolean;
};

const URL_SHAPE = /^(https?):\/\/([^/?#]+)(\/[^?#]*)?$/i;

/**
 * Path with exactly one leading and one trailing slash
 */
export function normalizePath(path: string): string {
  if (path.length === 0) {
    return "/";
  }
  const leading = path.startsWith("/") ? path : `/${path}`;
  return leading.endsWith("/") ? leading : `${leading}/`;
}

function hostOf(authority: string): string {
  const withoutUserInfo = authority.slice(authority.lastIndexOf("@") + 1);
  if (withoutUserInfo.startsWith("[")) {
    return withoutUserInfo.slice(0, withoutUserInfo.indexOf("]") + 1);
  }
  const port = withoutUserInfo.lastIndexOf(":");
  return port === -1 ? withoutUserInfo : withoutUserInfo.slice(0, port);
}

export type UrlParseResult = { success: true; url: UrlDescriptor } | { success: false; error: string };

/**
 * http(s) URLs without query string or fragment
 */
export function parseUrlString(input: string): UrlParseResult {
  const match = URL_SHAPE.exec(input);
  if (!match) {
    return { success: false, error: "URL must be http(s) with no query string or fragment" };
  }
  if (!URL.canParse(input)) {
    return { success: false, error: "URL is not valid" };
  }

  const [, scheme, authority, path = ""] = match;
  const host = hostOf(authority);

  return {
    success: true,
    url: {
      scheme: scheme.toLowerCase(),
      authority,
      path,
      normalizedPath: normalizePath(path),
      isIp: host.startsWith("[") || isIPv4(host),
    },
  };
}

export const parseURL: RuleFunction = (args, { diagnostics }) => {
  expectArity("parseURL", args, 1);
  const input = stringArg("parseURL", args, 0);
  if (input === undefined) {
    return undefined;
  }

  const parsed = parseUrlString(input);
  if (!parsed.success) {
    diagnostics.reportError(`${parsed.error}: "${input}"`);
    return undefined;
  }
  const descriptor: RuleRecord = parsed.url;
  return descriptor;
};
