/**
 * Renderer for everything the dispatch table does not name
 *
 * Compile-time constants and sequences print their values, scalars print
 * themselves, and anything else prints its type name and a field dump.
 */

import {
  accessDiagnostics,
  constantValue,
  placeholderText,
  sequenceValues,
  takeElements,
} from "@tileprobe/frontend";
import type { LiveValue, TypeNode } from "@tileprobe/frontend";
import type { RenderContext, Renderer } from "../types.js";
import { block, formatList, formatTruncated, report } from "../types.js";
import { renderNested } from "../dispatch/render.js";
import { formatScalar } from "./containers.js";

const renderElements = (
  value: LiveValue,
  context: RenderContext
): [string, RenderContext] | undefined => {
  const taken = takeElements(value, context.options.maxElements);
  if (!taken.ok || taken.value.items.length === 0) {
    return undefined;
  }

  let current = context;
  const texts: string[] = [];
  for (const item of taken.value.items) {
    if (!item.ok) {
      texts.push(placeholderText(item.error));
      continue;
    }
    const [text, next] = renderNested(item.value, current);
    texts.push(text);
    current = next;
  }
  return [
    taken.value.truncated ? formatTruncated(texts, undefined) : `[${texts.join(", ")}]`,
    current,
  ];
};

const renderFields = (
  value: LiveValue,
  type: TypeNode,
  names: readonly string[],
  context: RenderContext
): [string, RenderContext] => {
  let current = context;
  const lines: string[] = [];
  for (const name of names) {
    const member = value.field(name);
    if (!member.ok) {
      lines.push(`${name}: ${placeholderText(member.error)}`);
      current = report(current, accessDiagnostics(member.error));
      continue;
    }
    const [text, next] = renderNested(member.value, current);
    lines.push(`${name}: ${text}`);
    current = next;
  }
  return [block(type.name, lines, context), current];
};

export const fallbackRenderer: Renderer = {
  name: "fallback",
  render: (value, type, context) => {
    const constant = constantValue(type);
    if (constant !== undefined) {
      return [String(constant), context];
    }
    const sequence = sequenceValues(type);
    if (sequence) {
      return [formatList(sequence), context];
    }

    const scalar = value.scalar();
    if (scalar.ok) {
      return [formatScalar(scalar.value), context];
    }

    const names = value.fieldNames();
    if (!names.ok) {
      return [
        `${type.name}{${placeholderText(names.error)}}`,
        report(context, accessDiagnostics(names.error)),
      ];
    }
    if (names.value.length === 0) {
      return renderElements(value, context) ?? [`${type.name}{}`, context];
    }
    return renderFields(value, type, names.value, context);
  },
};
