/**
 * The built-in dispatch table
 *
 * Longer names come before the names they extend:
 * `tensor_adaptor_coordinate` before `tensor_adaptor`,
 * `tile_distribution_encoding` before `tile_distribution` and the window
 * variants before `tile_window`.
 */

import { formatDiagnostic } from "@tileprobe/frontend";
import type { DispatchTable, Renderer } from "../types.js";
import { buildDispatchTable, createRegistry, register } from "./registry.js";
import { containerRenderer } from "../renderers/containers.js";
import { coordinateRenderer } from "../renderers/coordinate.js";
import { descriptorRenderer } from "../renderers/descriptor.js";
import {
  distributionRenderer,
  encodingRenderer,
} from "../renderers/distribution.js";
import { fallbackRenderer } from "../renderers/fallback.js";
import { viewRenderer } from "../renderers/view.js";
import {
  distributedTensorRenderer,
  scatterGatherRenderer,
  windowRenderer,
} from "../renderers/window.js";

export const DEFAULT_ENTRIES: readonly (readonly [string, Renderer])[] = [
  ["tensor_adaptor_coordinate", coordinateRenderer],
  ["tensor_coordinate", coordinateRenderer],
  ["tensor_adaptor", descriptorRenderer],
  ["tensor_descriptor", descriptorRenderer],
  ["tensor_view", viewRenderer],
  ["tile_distribution_encoding", encodingRenderer],
  ["tile_distribution", distributionRenderer],
  ["tile_window_with_static_distribution", windowRenderer],
  ["tile_window_with_static_lengths", windowRenderer],
  ["tile_window", windowRenderer],
  ["static_distributed_tensor", distributedTensorRenderer],
  ["tile_scatter_gather", scatterGatherRenderer],
  ["tuple", containerRenderer],
  ["array", containerRenderer],
  ["multi_index", containerRenderer],
  ["thread_buffer", containerRenderer],
];

const buildDefaultTable = (): DispatchTable => {
  const registry = DEFAULT_ENTRIES.reduce(
    (current, [pattern, renderer]) => register(current, pattern, renderer),
    createRegistry()
  );
  const table = buildDispatchTable(registry, fallbackRenderer);
  if (!table.ok) {
    throw new Error(
      `Invalid built-in dispatch table:\n${table.error.diagnostics
        .map(formatDiagnostic)
        .join("\n")}`
    );
  }
  return table.value;
};

let defaultTable: DispatchTable | undefined;

/**
 * The process-wide table, built on first use and frozen
 */
export const getDefaultDispatchTable = (): DispatchTable => {
  defaultTable ??= buildDefaultTable();
  return defaultTable;
};
