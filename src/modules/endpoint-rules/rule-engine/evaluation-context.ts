/**
 * Evaluation Context
 *
 * Per-call scratch space for variables bound by conditions. A name that was
 * bound to `undefined` has been tried and is absent; a name that was never
 * bound has not been evaluated on this path.
 */

import type { DiagnosticsCollector } from "./diagnostics-collector";
import { EndpointRulesError } from "./errors";
import type { MaybeValue, ParameterValues } from "./types";

export class EvaluationContext {
  private readonly bindings = new Map<string, MaybeValue>();
  private sealed = false;

  bind(name: string, value: MaybeValue): void {
    if (this.sealed) {
      throw new EndpointRulesError(`Cannot bind "${name}" after result rendering has started`);
    }
    this.bindings.set(name, value);
  }

  isBound(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Bound value, or undefined when absent or never bound
   */
  get(name: string): MaybeValue {
    return this.bindings.get(name);
  }

  /**
   * Called once a result starts rendering
   */
  seal(): void {
    this.sealed = true;
  }

  get boundNames(): string[] {
    return [...this.bindings.keys()];
  }
}

/**
 * Everything one resolve call threads through the evaluators
 */
export interface EvaluationFrame {
  params: ParameterValues;
  context: EvaluationContext;
  diagnostics: DiagnosticsCollector;
}
