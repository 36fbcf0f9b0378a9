import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

/**
 * Runtime configuration, validated once on first import.
 */
export const env = createEnv({
  server: {
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
    // Replaces the bundled partition table used by aws.partition
    ENDPOINT_PARTITIONS_FILE: z.string().min(1).optional(),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
