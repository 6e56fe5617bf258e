/**
 * tensor_view renderer
 */

import { TensorView, extractTensorView, placeholderText } from "@tileprobe/frontend";
import type { RenderContext, Renderer } from "../types.js";
import { block, formatResult, isTooDeep, report } from "../types.js";
import { formatDescriptor } from "./descriptor.js";

/**
 * Text for an already extracted view. The descriptor is shown one level
 * deeper than the view itself.
 */
export const formatTensorView = (view: TensorView, context: RenderContext): string => {
  const lines = [`data_type: ${formatResult(view.dataType, (name) => name)}`];
  if (view.isConst) {
    lines.push("const: true");
  }
  lines.push(`address_space: ${formatResult(view.addressSpace, (space) => space)}`);

  const { descriptor } = view;
  const nested = { ...context, depth: context.depth + 1 };
  if (!descriptor.ok) {
    lines.push(`descriptor: ${placeholderText(descriptor.error)}`);
  } else if (isTooDeep(nested)) {
    lines.push(`descriptor: ${descriptor.value.entity}{...}`);
  } else {
    lines.push(`descriptor: ${formatDescriptor(descriptor.value, nested)}`);
  }

  return block("tensor_view", lines, context);
};

export const viewRenderer: Renderer = {
  name: "tensor_view",
  render: (value, type, context) => {
    const { model, diagnostics } = extractTensorView(value, type);
    return [formatTensorView(model, context), report(context, diagnostics)];
  },
};
