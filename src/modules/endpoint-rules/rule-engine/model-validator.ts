/**
 * Model Validator
 *
 * Build-time checks on a compiled rule model. Structural problems, including
 * a condition that reads a binding not evaluated on every path to it, are
 * collected and raised together as one MalformedModelError; an unknown
 * function raises FunctionNotFoundError.
 */

import { MalformedModelError } from "./errors";
import { resultExpressions, walkExpression } from "./expression-walker";
import type { FunctionRegistry } from "./function-registry";
import { decodeTerminal, isNodeRef, NO_MATCH_REF, type Expression, type RuleModel } from "./types";

function referencedNames(expression: Expression): string[] {
  const names: string[] = [];
  walkExpression(expression, (node) => {
    if (node.kind === "ref") names.push(node.name);
  });
  return names;
}

function checkNames(model: RuleModel, issues: string[]): void {
  const parameterNames = new Set<string>();
  for (const parameter of model.parameters) {
    if (parameterNames.has(parameter.name)) {
      issues.push(`parameter "${parameter.name}" is declared more than once`);
    }
    parameterNames.add(parameter.name);
  }

  // Binding name -> index of the condition that introduces it
  const bindings = new Map<string, number>();
  model.conditions.forEach((condition, index) => {
    if (!condition.assign) return;
    const { name } = condition.assign;
    if (parameterNames.has(name)) {
      issues.push(`conditions[${index}] binds "${name}", which is already a parameter`);
    } else if (bindings.has(name)) {
      issues.push(`conditions[${index}] binds "${name}", already bound by conditions[${bindings.get(name)}]`);
    } else {
      bindings.set(name, index);
    }
  });

  model.conditions.forEach((condition, index) => {
    for (const name of condition.argv.flatMap(referencedNames)) {
      if (parameterNames.has(name)) continue;
      const boundBy = bindings.get(name);
      if (boundBy === undefined) {
        issues.push(`conditions[${index}] references unknown name "${name}"`);
      } else if (boundBy >= index) {
        issues.push(`conditions[${index}] references "${name}", which is bound by conditions[${boundBy}]`);
      }
    }
  });

  for (const { where, expression } of resultExpressions(model)) {
    for (const name of referencedNames(expression)) {
      if (!parameterNames.has(name) && !bindings.has(name)) {
        issues.push(`${where} references unknown name "${name}"`);
      }
    }
  }
}

function checkRef(model: RuleModel, ref: number, where: string, issues: string[]): void {
  if (isNodeRef(ref)) {
    if (ref >= model.nodes.length) {
      issues.push(`${where} points at node ${ref}, but there are ${model.nodes.length} nodes`);
    }
    return;
  }
  if (ref === NO_MATCH_REF) return;

  const terminal = decodeTerminal(ref);
  if (terminal.kind === "result" && terminal.index >= model.results.length) {
    issues.push(`${where} points at result ${terminal.index}, but there are ${model.results.length} results`);
  }
}

function checkNodes(model: RuleModel, issues: string[]): void {
  checkRef(model, model.root, "root", issues);

  model.nodes.forEach((node, index) => {
    if (node.conditionIndex >= model.conditions.length) {
      issues.push(
        `nodes[${index}] uses condition ${node.conditionIndex}, but there are ${model.conditions.length} conditions`
      );
    }
    checkRef(model, node.highRef, `nodes[${index}].highRef`, issues);
    checkRef(model, node.lowRef, `nodes[${index}].lowRef`, issues);
  });
}

const WHITE = 0;
const GREY = 1;
const BLACK = 2;

/**
 * Iterative depth-first search; a back edge to a node on the stack is a cycle
 */
function findCycle(model: RuleModel): number | undefined {
  const { nodes } = model;
  const color = new Uint8Array(nodes.length);

  const children = (index: number) =>
    [nodes[index].highRef, nodes[index].lowRef].filter((ref) => isNodeRef(ref) && ref < nodes.length);

  for (let start = 0; start < nodes.length; start++) {
    if (color[start] !== WHITE) continue;

    const stack: Array<{ node: number; pending: number[] }> = [{ node: start, pending: children(start) }];
    color[start] = GREY;

    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      const next = top.pending.pop();

      if (next === undefined) {
        color[top.node] = BLACK;
        stack.pop();
      } else if (color[next] === GREY) {
        return next;
      } else if (color[next] === WHITE) {
        color[next] = GREY;
        stack.push({ node: next, pending: children(next) });
      }
    }
  }

  return undefined;
}

/**
 * Nodes reachable from the root, parents before children
 */
function topologicalOrder(model: RuleModel): number[] {
  const order: number[] = [];
  const visited = new Set<number>();

  const visit = (ref: number): void => {
    if (!isNodeRef(ref) || visited.has(ref)) return;
    visited.add(ref);
    visit(model.nodes[ref].highRef);
    visit(model.nodes[ref].lowRef);
    order.push(ref);
  };

  visit(model.root);
  return order.reverse();
}

/**
 * A condition may only read a binding whose condition is evaluated on every
 * path from the root to the node that tests it. Needs an acyclic graph.
 */
function checkBindingPaths(model: RuleModel, issues: string[]): void {
  const boundBy = new Map<string, number>();
  for (const condition of model.conditions) {
    if (condition.assign) boundBy.set(condition.assign.name, condition.index);
  }

  // Node index -> conditions evaluated on every path into it
  const evaluated = new Map<number, Set<number>>();
  if (isNodeRef(model.root)) {
    evaluated.set(model.root, new Set());
  }

  for (const index of topologicalOrder(model)) {
    const node = model.nodes[index];
    const before = evaluated.get(index) ?? new Set<number>();
    const condition = model.conditions[node.conditionIndex];

    for (const name of condition.argv.flatMap(referencedNames)) {
      const binder = boundBy.get(name);
      if (binder !== undefined && !before.has(binder)) {
        issues.push(
          `nodes[${index}] reads "${name}" in conditions[${condition.index}], ` +
            `but conditions[${binder}] is not evaluated on every path to it`
        );
      }
    }

    const after = new Set(before).add(node.conditionIndex);
    for (const child of [node.highRef, node.lowRef]) {
      if (!isNodeRef(child)) continue;
      const existing = evaluated.get(child);
      evaluated.set(child, existing ? new Set([...existing].filter((entry) => after.has(entry))) : new Set(after));
    }
  }
}

export function validateRuleModel(model: RuleModel, registry: FunctionRegistry): void {
  const issues: string[] = [];

  checkNames(model, issues);
  checkNodes(model, issues);

  if (issues.length === 0) {
    const cycleAt = findCycle(model);
    if (cycleAt !== undefined) {
      issues.push(`the decision diagram has a cycle through node ${cycleAt}`);
    } else {
      checkBindingPaths(model, issues);
    }
  }

  if (issues.length > 0) {
    throw new MalformedModelError(issues);
  }

  for (const id of registry.usedFunctions(model)) {
    registry.lookup(id);
  }
}
