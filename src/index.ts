export * from "./modules/endpoint-rules";
export { createLogger, type AppLogger } from "./lib/logger";
export { createCallerFactory, type TrpcContext } from "./modules/trpc/trpc-server";
export { trpcRouter, type TrpcRouter } from "./modules/trpc/trpc-router";
