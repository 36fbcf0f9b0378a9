/**
 * Standard Library
 *
 * Registers the built-in rule functions on a registry. `aws.partition`
 * carries a partition table as extra state, created only by resolvers whose
 * model calls it.
 */

import type { FunctionRegistry } from "../rule-engine/function-registry";
import { parseArn } from "./arn";
import { booleanEquals, getAttr, isSet, not, stringEquals, substring, uriEncode } from "./core-functions";
import { isValidHostLabel, isVirtualHostableS3Bucket } from "./host";
import { partition, PartitionTable } from "./partition";
import { parseURL } from "./parse-url";

export interface StandardLibraryOptions {
  /**
   * Raw partition data replacing the bundled table and ENDPOINT_PARTITIONS_FILE
   */
  partitions?: unknown;
}

export function registerStandardLibrary(
  registry: FunctionRegistry,
  options: StandardLibraryOptions = {}
): FunctionRegistry {
  const createPartitionTable = () =>
    options.partitions === undefined ? PartitionTable.load() : PartitionTable.fromData(options.partitions);

  return registry
    .register("isSet", isSet)
    .register("not", not)
    .register("booleanEquals", booleanEquals)
    .register("stringEquals", stringEquals)
    .register("getAttr", getAttr)
    .register("substring", substring)
    .register("uriEncode", uriEncode)
    .register("isValidHostLabel", isValidHostLabel)
    .register("parseURL", parseURL)
    .register("aws.parseArn", parseArn)
    .register("aws.isVirtualHostableS3Bucket", isVirtualHostableS3Bucket)
    .registerWithState("aws.partition", createPartitionTable, partition);
}

export { parseArnString, type ArnDescriptor } from "./arn";
export { isHostLabel, isVirtualHostableBucket } from "./host";
export { PartitionTable, partitionsFileSchema, type PartitionOutputs, type PartitionsFile } from "./partition";
export { normalizePath, parseUrlString, type UrlDescriptor } from "./parse-url";
