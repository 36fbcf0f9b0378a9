import type { ResolveFailure } from "./types";

/**
 * Base class for errors thrown by the endpoint rule engine
 */
export class EndpointRulesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The rule model is structurally invalid: out-of-range indices, a cycle,
 * an unknown reference, a bad template. Raised while loading a model, and
 * at resolve time for the defensive checks that cannot run up front.
 */
export class MalformedModelError extends EndpointRulesError {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(
      list.length === 1
        ? `Malformed rule model: ${list[0]}`
        : `Malformed rule model (${list.length} issues): ${list.join("; ")}`
    );
    this.issues = list;
  }
}

/**
 * A model references a function that was never registered
 */
export class FunctionNotFoundError extends EndpointRulesError {
  constructor(readonly functionId: string) {
    super(`No rule function registered for "${functionId}"`);
  }
}

/**
 * Thrown by `resolveOrThrow` when resolution ends in a failure
 */
export class EndpointResolutionError extends EndpointRulesError {
  constructor(readonly failure: ResolveFailure) {
    super(failure.message);
  }
}
