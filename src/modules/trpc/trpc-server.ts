import { initTRPC } from "@trpc/server";

import type { RulesetCatalog } from "@/modules/endpoint-rules/ruleset-catalog";

/**
 * Request context shared by all procedures
 */
export interface TrpcContext {
  catalog: RulesetCatalog;
}

const t = initTRPC.context<TrpcContext>().create();

export const router = t.router;
export const procedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;
