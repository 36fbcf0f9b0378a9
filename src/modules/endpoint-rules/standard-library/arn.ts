/**
 * ARN parsing
 *
 * `arn:partition:service:region:account-id:resource` where region and
 * account id may be empty and the resource may contain further `:` or `/`
 * separators. The resource is split on both into `resourceId`.
 */

import type { RuleFunction } from "../rule-engine/function-registry";
import type { RuleRecord } from "../rule-engine/types";
import { expectArity, stringArg } from "./arguments";

export type ArnDescriptor = {
  partition: string;
  service: string;
  region: string;
  accountId: string;
  resourceId: string[];
};

export type ArnParseResult = { success: true; arn: ArnDescriptor } | { success: false; error: string };

export function parseArnString(input: string): ArnParseResult {
  const parts: string[] = [];
  let rest = input;
  for (let i = 0; i < 5; i++) {
    const separator = rest.indexOf(":");
    if (separator === -1) {
      return { success: false, error: "ARN must have 6 colon-separated components" };
    }
    parts.push(rest.slice(0, separator));
    rest = rest.slice(separator + 1);
  }

  const [prefix, partition, service, region, accountId] = parts;
  if (prefix !== "arn") {
    return { success: false, error: 'ARN must start with "arn"' };
  }
  if (partition.length === 0) {
    return { success: false, error: "ARN partition must not be empty" };
  }
  if (service.length === 0) {
    return { success: false, error: "ARN service must not be empty" };
  }
  if (rest.length === 0) {
    return { success: false, error: "ARN resource must not be empty" };
  }

  return {
    success: true,
    arn: { partition, service, region, accountId, resourceId: rest.split(/[:/]/) },
  };
}

export const parseArn: RuleFunction = (args, { diagnostics }) => {
  expectArity("aws.parseArn", args, 1);
  const input = stringArg("aws.parseArn", args, 0);
  if (input === undefined) {
    return undefined;
  }

  const parsed = parseArnString(input);
  if (!parsed.success) {
    diagnostics.reportError(`${parsed.error}: "${input}"`);
    return undefined;
  }
  const descriptor: RuleRecord = parsed.arn;
  return descriptor;
};
