/**
 * Ruleset Catalog
 *
 * Named endpoint resolvers sharing one function registry. Rulesets are
 * registered from serialized models, either programmatically or from a
 * directory of `<id>.json` files.
 */

import { readdirSync, readFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { createLogger } from "@/lib/logger";

import {
  EndpointResolver,
  EndpointRulesError,
  FunctionNotFoundError,
  FunctionRegistry,
  loadRuleModel,
  MalformedModelError,
  type Parameter,
} from "./rule-engine";
import { registerStandardLibrary, type StandardLibraryOptions } from "./standard-library";

const logger = createLogger("ruleset-catalog");

/**
 * Rulesets shipped with the package
 */
export const BUNDLED_RULESETS_DIR = fileURLToPath(new URL("./rulesets", import.meta.url));

export interface RulesetSummary {
  id: string;
  version: string;
  parameters: Parameter[];
  usedFunctions: string[];
}

export interface ModelValidationResult {
  valid: boolean;
  errors: string[];
}

export class RulesetCatalog {
  private readonly resolvers = new Map<string, EndpointResolver>();

  constructor(readonly registry: FunctionRegistry) {}

  /**
   * Load a model and register a resolver for it. Throws MalformedModelError
   * or FunctionNotFoundError for a bad model.
   */
  register(id: string, input: unknown): EndpointResolver {
    if (this.resolvers.has(id)) {
      throw new EndpointRulesError(`Ruleset "${id}" is already registered`);
    }

    const resolver = new EndpointResolver(loadRuleModel(input, this.registry), this.registry);
    this.resolvers.set(id, resolver);

    logger.info("Ruleset registered", { id, usedFunctions: [...resolver.usedFunctions] });

    return resolver;
  }

  /**
   * Register every `*.json` file in a directory under its file name
   */
  registerDirectory(directory: string): string[] {
    const files = readdirSync(directory)
      .filter((file) => extname(file) === ".json")
      .sort();

    return files.map((file) => {
      const id = basename(file, ".json");
      const raw: unknown = JSON.parse(readFileSync(join(directory, file), "utf8"));
      this.register(id, raw);
      return id;
    });
  }

  get(id: string): EndpointResolver | undefined {
    return this.resolvers.get(id);
  }

  has(id: string): boolean {
    return this.resolvers.has(id);
  }

  list(): RulesetSummary[] {
    return [...this.resolvers.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([id, resolver]) => ({
        id,
        version: resolver.model.version,
        parameters: [...resolver.parameters],
        usedFunctions: [...resolver.usedFunctions],
      }));
  }

  /**
   * Check a model without registering it
   */
  validate(input: unknown): ModelValidationResult {
    try {
      loadRuleModel(input, this.registry);
      return { valid: true, errors: [] };
    } catch (error) {
      if (error instanceof MalformedModelError) {
        return { valid: false, errors: error.issues };
      }
      if (error instanceof FunctionNotFoundError) {
        return { valid: false, errors: [error.message] };
      }
      throw error;
    }
  }
}

export interface DefaultCatalogOptions extends StandardLibraryOptions {
  rulesetsDir?: string;
}

/**
 * Catalog with the standard library and the bundled rulesets
 */
export function createDefaultCatalog(options: DefaultCatalogOptions = {}): RulesetCatalog {
  const registry = registerStandardLibrary(new FunctionRegistry(), options);
  const catalog = new RulesetCatalog(registry);
  catalog.registerDirectory(options.rulesetsDir ?? BUNDLED_RULESETS_DIR);
  return catalog;
}
