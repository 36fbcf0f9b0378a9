/**
 * Endpoint Rules Module
 */

export * from "./rule-engine";
export * from "./standard-library";
export {
  BUNDLED_RULESETS_DIR,
  createDefaultCatalog,
  RulesetCatalog,
  type DefaultCatalogOptions,
  type ModelValidationResult,
  type RulesetSummary,
} from "./ruleset-catalog";
export { endpointRulesRouter } from "./endpoint-rules-router";
