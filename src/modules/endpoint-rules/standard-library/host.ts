/**
 * Host label validation for virtual-host style endpoints
 */

import type { RuleFunction } from "../rule-engine/function-registry";
import { booleanArg, expectArity, stringArg } from "./arguments";

const HOST_LABEL = /^[A-Za-z0-9][A-Za-z0-9-]{0,62}$/;
const BUCKET_SEGMENT = /^[a-z0-9][a-z0-9-]{1,61}[a-z0-9]$/;
const DOTS_AND_DASHES = /\.-|-\./;
const IPV4_LIKE = /^\d+\.\d+\.\d+\.\d+$/;

/**
 * A DNS label: 1-63 characters of letters, digits and hyphens, not starting
 * with a hyphen. With `allowSubDomains`, every dot-separated label must be
 * valid.
 */
export function isHostLabel(value: string, allowSubDomains: boolean): boolean {
  if (!allowSubDomains) {
    return HOST_LABEL.test(value);
  }
  return value.split(".").every((label) => HOST_LABEL.test(label));
}

function isBucketSegment(segment: string): boolean {
  return BUCKET_SEGMENT.test(segment);
}

/**
 * Bucket names usable as a virtual host: 3-63 lowercase characters per
 * label, no leading or trailing hyphen on a label, no `.-` or `-.`, not
 * shaped like an IPv4 address.
 */
export function isVirtualHostableBucket(value: string, allowSubDomains: boolean): boolean {
  if (IPV4_LIKE.test(value) || DOTS_AND_DASHES.test(value)) {
    return false;
  }
  if (!allowSubDomains) {
    return isBucketSegment(value);
  }
  return value.split(".").every(isBucketSegment);
}

export const isValidHostLabel: RuleFunction = (args) => {
  expectArity("isValidHostLabel", args, 2);
  const value = stringArg("isValidHostLabel", args, 0);
  const allowSubDomains = booleanArg("isValidHostLabel", args, 1);
  return value !== undefined && allowSubDomains !== undefined && isHostLabel(value, allowSubDomains);
};

export const isVirtualHostableS3Bucket: RuleFunction = (args) => {
  expectArity("aws.isVirtualHostableS3Bucket", args, 2);
  const value = stringArg("aws.isVirtualHostableS3Bucket", args, 0);
  const allowSubDomains = booleanArg("aws.isVirtualHostableS3Bucket", args, 1);
  return value !== undefined && allowSubDomains !== undefined && isVirtualHostableBucket(value, allowSubDomains);
};
