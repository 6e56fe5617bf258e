/**
 * tensor_coordinate and tensor_adaptor_coordinate renderer
 */

import { extractCoordinate } from "@tileprobe/frontend";
import type { Renderer } from "../types.js";
import { block, formatCount, formatIds, report } from "../types.js";

export const coordinateRenderer: Renderer = {
  name: "coordinate",
  render: (value, type, context) => {
    const { model, diagnostics } = extractCoordinate(value, type, {
      maxElements: context.options.maxElements,
    });

    const lines = [
      `ndim_hidden: ${formatCount(model.ndimHidden)}`,
      `idx_hidden_ (data): ${formatIds(model.hiddenIndex)}`,
      `bottom_dimension_ids: ${formatIds(model.bottomDimensionIds)}`,
      `top_dimension_ids: ${formatIds(model.topDimensionIds)}`,
      `top_index: ${formatIds(model.topIndex)}`,
      `bottom_index: ${formatIds(model.bottomIndex)}`,
    ];
    if (model.offset) {
      lines.push(`offset: ${formatCount(model.offset)}`);
    }

    return [block(model.entity, lines, context), report(context, diagnostics)];
  },
};
