/**
 * Function Registry
 *
 * Maps function identifiers to implementations. Registration happens once
 * at startup; the registry is frozen before the first resolver is created.
 *
 * Functions that need extra state (a parsed partition table, for example)
 * register a state factory. The factory only runs for functions a model
 * actually uses.
 */

import type { DiagnosticsCollector } from "./diagnostics-collector";
import { EndpointRulesError, FunctionNotFoundError } from "./errors";
import { resultExpressions, walkExpression } from "./expression-walker";
import type { Expression, MaybeValue, RuleModel } from "./types";

export interface FunctionCallContext {
  diagnostics: DiagnosticsCollector;
}

export interface StatefulCallContext<S> extends FunctionCallContext {
  state: S;
}

/**
 * A rule function. Absent arguments arrive as `undefined`; returning
 * `undefined` means "no value".
 */
export type RuleFunction = (args: readonly MaybeValue[], context: FunctionCallContext) => MaybeValue;

export type StatefulRuleFunction<S> = (
  args: readonly MaybeValue[],
  context: StatefulCallContext<S>
) => MaybeValue;

/**
 * A function ready to be called by one resolver, with its state attached
 */
export type BoundRuleFunction = (args: readonly MaybeValue[], diagnostics: DiagnosticsCollector) => MaybeValue;

interface RegisteredFunction {
  id: string;
  needsExtraState: boolean;
  instantiate(): BoundRuleFunction;
}

export class FunctionRegistry {
  private readonly functions = new Map<string, RegisteredFunction>();
  private frozen = false;

  /**
   * Register a stateless function
   */
  register(id: string, impl: RuleFunction): this {
    return this.add({
      id,
      needsExtraState: false,
      instantiate: () => (args, diagnostics) => impl(args, { diagnostics }),
    });
  }

  /**
   * Register a function whose state is created once per resolver that uses it
   */
  registerWithState<S>(id: string, createState: () => S, impl: StatefulRuleFunction<S>): this {
    return this.add({
      id,
      needsExtraState: true,
      instantiate: () => {
        const state = createState();
        return (args, diagnostics) => impl(args, { state, diagnostics });
      },
    });
  }

  private add(entry: RegisteredFunction): this {
    if (this.frozen) {
      throw new EndpointRulesError(
        `Cannot register "${entry.id}": the function registry is frozen once a resolver exists`
      );
    }
    if (this.functions.has(entry.id)) {
      throw new EndpointRulesError(`Rule function "${entry.id}" is already registered`);
    }
    this.functions.set(entry.id, entry);
    return this;
  }

  has(id: string): boolean {
    return this.functions.has(id);
  }

  /**
   * Throws FunctionNotFoundError for an unknown id
   */
  lookup(id: string): { id: string; needsExtraState: boolean } {
    const entry = this.functions.get(id);
    if (!entry) {
      throw new FunctionNotFoundError(id);
    }
    return { id: entry.id, needsExtraState: entry.needsExtraState };
  }

  /**
   * All function ids a model references, sorted
   */
  usedFunctions(model: RuleModel): Set<string> {
    const ids = new Set<string>();
    const collect = (expression: Expression) =>
      walkExpression(expression, (node) => {
        if (node.kind === "call") ids.add(node.fn);
      });

    for (const condition of model.conditions) {
      ids.add(condition.fn);
      condition.argv.forEach(collect);
    }
    resultExpressions(model).forEach(({ expression }) => collect(expression));

    return new Set([...ids].sort());
  }

  /**
   * Bind the given functions, creating extra state only for these ids
   */
  instantiate(ids: Iterable<string>): ReadonlyMap<string, BoundRuleFunction> {
    const bound = new Map<string, BoundRuleFunction>();
    for (const id of ids) {
      const entry = this.functions.get(id);
      if (!entry) {
        throw new FunctionNotFoundError(id);
      }
      bound.set(id, entry.instantiate());
    }
    return bound;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.functions.size;
  }
}
