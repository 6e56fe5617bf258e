/**
 * Tile windows, distributed tensors and scatter/gather windows
 */

import {
  AccessFailure,
  Result,
  TileDistribution,
  extractDistributedTensor,
  extractScatterGather,
  extractTileWindow,
  placeholderText,
} from "@tileprobe/frontend";
import type { RenderContext, Renderer } from "../types.js";
import { block, formatIds, formatResult, isTooDeep, report } from "../types.js";
import { renderNested } from "../dispatch/render.js";
import { formatTileDistribution } from "./distribution.js";
import { formatTensorView } from "./view.js";

const nestedDistribution = (
  label: string,
  distribution: Result<TileDistribution, AccessFailure>,
  context: RenderContext
): string => {
  if (!distribution.ok) {
    return `${label}: ${placeholderText(distribution.error)}`;
  }
  const nested = { ...context, depth: context.depth + 1 };
  return isTooDeep(nested)
    ? `${label}: tile_distribution{...}`
    : `${label}: ${formatTileDistribution(distribution.value, nested)}`;
};

export const windowRenderer: Renderer = {
  name: "tile_window",
  render: (value, type, context) => {
    const { model, diagnostics } = extractTileWindow(value, type);

    const lines = [
      `data_type: ${formatResult(model.dataType, (name) => name)}`,
      `window_lengths: ${formatIds(model.windowLengths)}`,
      `window_origin: ${formatIds(model.windowOrigin)}`,
    ];
    if (model.distribution) {
      lines.push(nestedDistribution("tile_dstr_", model.distribution, context));
    }

    const nested = { ...context, depth: context.depth + 1 };
    if (!model.bottomView.ok) {
      lines.push(`bottom_tensor_view_: ${placeholderText(model.bottomView.error)}`);
    } else if (isTooDeep(nested)) {
      lines.push("bottom_tensor_view_: tensor_view{...}");
    } else {
      lines.push(`bottom_tensor_view_: ${formatTensorView(model.bottomView.value, nested)}`);
    }

    if (model.hasPrecomputedCoords) {
      lines.push("pre_computed_coords_: present");
    }

    return [block(model.variant, lines, context), report(context, diagnostics)];
  },
};

export const distributedTensorRenderer: Renderer = {
  name: "static_distributed_tensor",
  render: (value, type, context) => {
    const { model, diagnostics } = extractDistributedTensor(value, type);
    let current = report(context, diagnostics);

    const lines = [`data_type: ${formatResult(model.dataType, (name) => name)}`];
    if (model.threadBuffer.ok) {
      const [buffer, next] = renderNested(model.threadBuffer.value, current);
      lines.push(`thread_buffer: ${buffer}`);
      current = next;
    } else {
      lines.push(`thread_buffer: ${placeholderText(model.threadBuffer.error)}`);
    }
    lines.push(nestedDistribution("tile_distribution", model.distribution, context));

    return [block("static_distributed_tensor", lines, context), current];
  },
};

export const scatterGatherRenderer: Renderer = {
  name: "tile_scatter_gather",
  render: (value, type, context) => {
    const { model, diagnostics } = extractScatterGather(value, type, {
      maxElements: context.options.maxElements,
    });

    const lines = [
      `data_type: ${formatResult(model.dataType, (name) => name)}`,
      `tile_lengths: ${formatIds(model.tileLengths)}`,
      `memory_operation: ${formatResult(model.memoryOperation, (name) => name)}`,
      nestedDistribution("tile_distribution", model.distribution, context),
    ];

    return [block("tile_scatter_gather", lines, context), report(context, diagnostics)];
  },
};
