/**
 * Endpoint Rules Router
 *
 * tRPC endpoints for previewing endpoint resolution against the registered
 * rulesets and for checking serialized models before they are deployed.
 */

import { TRPCError } from "@trpc/server";
import { z } from "zod";

import { procedure, router } from "@/modules/trpc/trpc-server";

// ============================================================================
// SCHEMAS
// ============================================================================

/**
 * Parameter values as sent by a client; null means "not supplied"
 */
const parameterValueSchema = z.union([z.string(), z.boolean(), z.array(z.string()), z.null()]);

const resolveSchema = z.object({
  rulesetId: z.string().min(1),
  params: z.record(parameterValueSchema).optional().default({}),
});

const validateSchema = z.object({
  model: z.unknown(),
});

// ============================================================================
// ROUTER
// ============================================================================

export const endpointRulesRouter = router({
  /**
   * List registered rulesets with their parameters
   */
  list: procedure.query(({ ctx }) => {
    return ctx.catalog.list();
  }),

  /**
   * Resolve an endpoint. A rule-defined error or an unmatched call is
   * returned as a failure; invalid parameters are a bad request.
   */
  resolve: procedure.input(resolveSchema).query(({ ctx, input }) => {
    const resolver = ctx.catalog.get(input.rulesetId);

    if (!resolver) {
      throw new TRPCError({
        code: "NOT_FOUND",
        message: `Ruleset "${input.rulesetId}" not found`,
      });
    }

    const result = resolver.resolve(input.params);

    if (!result.success && result.failure.kind === "InvalidParams") {
      throw new TRPCError({
        code: "BAD_REQUEST",
        message: result.failure.message,
      });
    }

    return result;
  }),

  /**
   * Validate a serialized rule model without registering it
   */
  validate: procedure.input(validateSchema).query(({ ctx, input }) => {
    return ctx.catalog.validate(input.model);
  }),
});
