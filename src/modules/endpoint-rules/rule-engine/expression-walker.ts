import type { Expression, RuleModel } from "./types";

/**
 * Visit an expression and all of its sub-expressions, parents first
 */
export function walkExpression(expression: Expression, visit: (node: Expression) => void): void {
  visit(expression);

  switch (expression.kind) {
    case "literal":
    case "ref":
      return;
    case "template":
      for (const part of expression.parts) {
        if (part.kind === "value") walkExpression(part.expression, visit);
      }
      return;
    case "getAttr":
      walkExpression(expression.target, visit);
      return;
    case "call":
    case "coalesce":
      expression.argv.forEach((arg) => walkExpression(arg, visit));
      return;
    case "array":
      expression.items.forEach((item) => walkExpression(item, visit));
      return;
    case "record":
      Object.values(expression.entries).forEach((entry) => walkExpression(entry, visit));
      return;
  }
}

/**
 * Top-level expressions of every result, with a label for error messages
 */
export function resultExpressions(model: RuleModel): Array<{ where: string; expression: Expression }> {
  const found: Array<{ where: string; expression: Expression }> = [];

  model.results.forEach((result, index) => {
    if (result.type === "error") {
      found.push({ where: `results[${index}].message`, expression: result.message });
      return;
    }
    found.push({ where: `results[${index}].url`, expression: result.url });
    for (const [name, values] of Object.entries(result.headers)) {
      values.forEach((expression, i) => found.push({ where: `results[${index}].headers.${name}[${i}]`, expression }));
    }
    for (const [name, expression] of Object.entries(result.properties)) {
      found.push({ where: `results[${index}].properties.${name}`, expression });
    }
  });

  return found;
}
