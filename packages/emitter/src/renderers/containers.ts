/**
 * tuple, array, multi_index and thread_buffer renderer
 *
 * An empty container prints as empty (`tuple<0 elements> {}`); one whose
 * storage cannot be read prints a placeholder (`tuple<unavailable>`).
 */

import {
  Container,
  ContainerElement,
  ScalarValue,
  dataTypeName,
  extractContainer,
  placeholderText,
} from "@tileprobe/frontend";
import type { RenderContext, Renderer } from "../types.js";
import { block, formatTruncated, report } from "../types.js";
import { renderNested } from "../dispatch/render.js";

export const formatScalar = (scalar: ScalarValue): string => String(scalar);

const renderElement = (
  element: ContainerElement,
  context: RenderContext
): [string, RenderContext] => {
  if (element.kind === "constant") {
    return [String(element.value), context];
  }
  if (!element.value.ok) {
    return [placeholderText(element.value.error), context];
  }
  const scalar = element.value.value.scalar();
  return scalar.ok
    ? [formatScalar(scalar.value), context]
    : renderNested(element.value.value, context, element.type);
};

const renderItems = (
  elements: readonly ContainerElement[],
  context: RenderContext
): [readonly string[], RenderContext] => {
  let current = context;
  const texts: string[] = [];
  for (const element of elements) {
    const [text, next] = renderElement(element, current);
    texts.push(text);
    current = next;
  }
  return [texts, current];
};

const countLabel = (count: number): string =>
  count === 1 ? "1 element" : `${count} elements`;

const renderTuple = (
  model: Container,
  context: RenderContext
): [string, RenderContext] => {
  if (!model.elements.ok) {
    return ["tuple<unavailable>", context];
  }

  const elements = model.elements.value;
  const count = model.size ?? elements.length;
  const header = `tuple<${countLabel(count)}> `;

  let current = context;
  const lines: string[] = [];
  for (const [index, element] of elements.entries()) {
    const [text, next] = renderElement(element, current);
    lines.push(`[${index}]: ${text}`);
    current = next;
  }
  if (model.truncated) {
    lines.push(model.size === undefined ? "..." : `... (${model.size} total)`);
  }

  return [block(header, lines, context), current];
};

const listText = (
  model: Container,
  context: RenderContext
): [string, RenderContext] => {
  if (!model.elements.ok) {
    return [placeholderText(model.elements.error), context];
  }
  const [texts, next] = renderItems(model.elements.value, context);
  return [
    model.truncated ? formatTruncated(texts, model.size) : `[${texts.join(", ")}]`,
    next,
  ];
};

const renderStorage = (
  model: Container,
  context: RenderContext
): [string, RenderContext] => {
  const size = model.size === undefined ? "?" : String(model.size);
  const elementType = model.elementType ? dataTypeName(model.elementType) : "?";
  const [list, next] = listText(model, context);

  switch (model.kind) {
    case "multi_index":
      return [`multi_index<${size}> = ${list}`, next];
    case "thread_buffer": {
      const shown = model.elements.ok ? model.elements.value.length : 0;
      const dataLabel = model.truncated ? `data (first ${shown})` : "data";
      return [
        block(
          `thread_buffer<${elementType}, ${size}>`,
          [`size: ${size}`, `${dataLabel}: ${list}`],
          context
        ),
        next,
      ];
    }
    default:
      return [`array<${elementType}, ${size}> = ${list}`, next];
  }
};

export const containerRenderer: Renderer = {
  name: "container",
  render: (value, type, context) => {
    const { model, diagnostics } = extractContainer(value, type, {
      maxElements: context.options.maxElements,
    });
    const reported = report(context, diagnostics);
    return model.kind === "tuple"
      ? renderTuple(model, reported)
      : renderStorage(model, reported);
  },
};
