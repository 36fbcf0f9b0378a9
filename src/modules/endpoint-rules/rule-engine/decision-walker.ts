/**
 * Decision Walker
 *
 * Traverses the decision diagram from the root until a terminal is reached.
 *
 * Outcomes are memoized per condition index, not per node: nodes that share
 * a condition share one evaluation and its one-time binding side effect.
 */

import type { ConditionEvaluator } from "./condition-evaluator";
import { MalformedModelError } from "./errors";
import type { EvaluationFrame } from "./evaluation-context";
import { decodeTerminal, isNodeRef, type RuleModel, type TerminalRef } from "./types";

const UNEVALUATED = 0;
const TRUE = 1;
const FALSE = 2;

export class DecisionWalker {
  constructor(
    private readonly model: RuleModel,
    private readonly conditions: ConditionEvaluator
  ) {}

  resolve(frame: EvaluationFrame): TerminalRef {
    const { nodes } = this.model;
    const memo = new Uint8Array(this.model.conditions.length);
    // An acyclic path visits each node at most once
    const stepBudget = nodes.length;

    let ref = this.model.root;
    let steps = 0;

    while (isNodeRef(ref)) {
      const node = nodes[ref];
      if (!node) {
        throw new MalformedModelError(`node reference ${ref} is out of range`);
      }
      if (steps >= stepBudget) {
        throw new MalformedModelError(
          `decision diagram traversal exceeded ${stepBudget} steps; the node graph has a cycle`
        );
      }
      steps++;
      if (node.conditionIndex >= memo.length) {
        throw new MalformedModelError(`nodes[${ref}] uses condition ${node.conditionIndex}, which does not exist`);
      }

      let state = memo[node.conditionIndex];
      if (state === UNEVALUATED) {
        state = this.conditions.evaluate(node.conditionIndex, frame) ? TRUE : FALSE;
        memo[node.conditionIndex] = state;
      }

      ref = state === TRUE ? node.highRef : node.lowRef;
    }

    return decodeTerminal(ref);
  }
}
