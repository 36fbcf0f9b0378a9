/**
 * Template strings
 *
 * `https://{Bucket}.s3.{PartitionResult#dnsSuffix}` interpolates a parameter
 * or bound variable, optionally followed by `#path` into its value.
 * `{{` and `}}` are literal braces.
 */

import { MalformedModelError } from "./errors";
import type { Expression, TemplatePart } from "./types";
import { parsePath } from "./values";

function interpolation(source: string, inner: string): Expression {
  const segments = inner.split("#");
  if (segments.length > 2 || segments.some((segment) => segment.length === 0)) {
    throw new MalformedModelError(`invalid interpolation "{${inner}}" in template "${source}"`);
  }
  const ref: Expression = { kind: "ref", name: segments[0] };
  return segments.length === 1 ? ref : { kind: "getAttr", target: ref, path: parsePath(segments[1]) };
}

export function parseTemplate(source: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = "";

  const flush = () => {
    if (text.length > 0) {
      parts.push({ kind: "text", text });
      text = "";
    }
  };

  let i = 0;
  while (i < source.length) {
    const char = source[i];

    if (char === "{" && source[i + 1] === "{") {
      text += "{";
      i += 2;
    } else if (char === "}" && source[i + 1] === "}") {
      text += "}";
      i += 2;
    } else if (char === "{") {
      const close = source.indexOf("}", i + 1);
      if (close === -1) {
        throw new MalformedModelError(`unclosed "{" in template "${source}"`);
      }
      flush();
      parts.push({ kind: "value", expression: interpolation(source, source.slice(i + 1, close)) });
      i = close + 1;
    } else if (char === "}") {
      throw new MalformedModelError(`unmatched "}" in template "${source}"`);
    } else {
      text += char;
      i++;
    }
  }

  flush();
  return parts;
}
