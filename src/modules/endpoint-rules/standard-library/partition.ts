/**
 * Partition lookup
 *
 * Maps a region name to the partition it belongs to and that partition's
 * DNS settings. Resolution order:
 * 1. A partition listing the region explicitly (region overrides applied)
 * 2. The first partition whose regionRegex matches
 * 3. The "aws" partition
 *
 * The table is bundled as partitions.json and can be replaced through
 * ENDPOINT_PARTITIONS_FILE or by passing data to the state factory.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import { env } from "@/lib/env";
import { createLogger } from "@/lib/logger";

import { EndpointRulesError } from "../rule-engine/errors";
import type { StatefulRuleFunction } from "../rule-engine/function-registry";
import type { RuleRecord } from "../rule-engine/types";
import { expectArity, stringArg } from "./arguments";
import bundledPartitions from "./partitions.json";

const logger = createLogger("partition-table");

const DEFAULT_PARTITION_ID = "aws";

// ============================================================================
// SCHEMA
// ============================================================================

const partitionOutputsSchema = z.object({
  name: z.string().min(1),
  dnsSuffix: z.string().min(1),
  dualStackDnsSuffix: z.string().min(1),
  supportsFIPS: z.boolean(),
  supportsDualStack: z.boolean(),
  implicitGlobalRegion: z.string().min(1),
});

const partitionSchema = z.object({
  id: z.string().min(1),
  regionRegex: z.string().min(1),
  outputs: partitionOutputsSchema,
  regions: z.record(z.string(), partitionOutputsSchema.partial()).default({}),
});

export const partitionsFileSchema = z.object({
  version: z.string(),
  partitions: z.array(partitionSchema).min(1),
});

export type PartitionOutputs = z.infer<typeof partitionOutputsSchema>;
export type PartitionsFile = z.infer<typeof partitionsFileSchema>;

// ============================================================================
// TABLE
// ============================================================================

interface CompiledPartition {
  id: string;
  regionRegex: RegExp;
  outputs: PartitionOutputs;
  regions: Map<string, Partial<PartitionOutputs>>;
}

export class PartitionTable {
  private readonly partitions: CompiledPartition[];

  private constructor(partitions: CompiledPartition[]) {
    this.partitions = partitions;
  }

  /**
   * Validate and compile raw partition data
   */
  static fromData(data: unknown): PartitionTable {
    const parsed = partitionsFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "table"}: ${issue.message}`);
      throw new EndpointRulesError(`Invalid partition table: ${issues.join("; ")}`);
    }

    const partitions = parsed.data.partitions.map((partition) => {
      let regionRegex: RegExp;
      try {
        regionRegex = new RegExp(partition.regionRegex);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new EndpointRulesError(
          `Invalid partition table: partition "${partition.id}" has an invalid regionRegex: ${reason}`
        );
      }
      return {
        id: partition.id,
        regionRegex,
        outputs: partition.outputs,
        regions: new Map(Object.entries(partition.regions)),
      };
    });

    if (!partitions.some((partition) => partition.id === DEFAULT_PARTITION_ID)) {
      throw new EndpointRulesError(`Invalid partition table: no "${DEFAULT_PARTITION_ID}" partition`);
    }

    return new PartitionTable(partitions);
  }

  /**
   * Load from ENDPOINT_PARTITIONS_FILE when set, the bundled table otherwise
   */
  static load(): PartitionTable {
    const file = env.ENDPOINT_PARTITIONS_FILE;
    if (!file) {
      return PartitionTable.fromData(bundledPartitions);
    }

    logger.info("Loading partition table", { file });
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, "utf8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EndpointRulesError(`Invalid partition table: cannot read "${file}": ${reason}`);
    }
    return PartitionTable.fromData(raw);
  }

  resolve(region: string): PartitionOutputs {
    for (const partition of this.partitions) {
      const overrides = partition.regions.get(region);
      if (overrides) {
        return { ...partition.outputs, ...overrides };
      }
    }

    const matched = this.partitions.find((partition) => partition.regionRegex.test(region));
    if (matched) {
      return { ...matched.outputs };
    }

    const fallback = this.partitions.find((partition) => partition.id === DEFAULT_PARTITION_ID);
    if (!fallback) {
      throw new EndpointRulesError(`Invalid partition table: no "${DEFAULT_PARTITION_ID}" partition`);
    }
    return { ...fallback.outputs };
  }
}

// ============================================================================
// RULE FUNCTION
// ============================================================================

export const partition: StatefulRuleFunction<PartitionTable> = (args, { state }) => {
  expectArity("aws.partition", args, 1);
  const region = stringArg("aws.partition", args, 0);
  if (region === undefined) {
    return undefined;
  }
  const outputs: RuleRecord = state.resolve(region);
  return outputs;
};
