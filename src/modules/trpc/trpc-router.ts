import { endpointRulesRouter } from "@/modules/endpoint-rules/endpoint-rules-router";

import { procedure, router } from "./trpc-server";

/**
 * Health check router
 */
const healthRouter = router({
  check: procedure.query(({ ctx }) => {
    return {
      status: "ok" as const,
      rulesets: ctx.catalog.list().length,
    };
  }),
});

/**
 * Main tRPC router
 *
 * Sub-routers:
 * - health: Service health check
 * - endpointRules: Ruleset listing, resolution and model validation
 */
export const trpcRouter = router({
  health: healthRouter,
  endpointRules: endpointRulesRouter,
});

export type TrpcRouter = typeof trpcRouter;
