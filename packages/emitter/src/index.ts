/**
 * tileprobe emitter - printer dispatch, text renderers and diagrams
 */

export * from "./types.js";
export * from "./dispatch/registry.js";
export { renderDispatched, renderNested } from "./dispatch/render.js";
export { DEFAULT_ENTRIES, getDefaultDispatchTable } from "./dispatch/default-table.js";
export { formatDescriptor, descriptorRenderer } from "./renderers/descriptor.js";
export { coordinateRenderer } from "./renderers/coordinate.js";
export { formatTensorView, viewRenderer } from "./renderers/view.js";
export {
  formatTileDistribution,
  distributionRenderer,
  encodingRenderer,
} from "./renderers/distribution.js";
export {
  windowRenderer,
  distributedTensorRenderer,
  scatterGatherRenderer,
} from "./renderers/window.js";
export { containerRenderer, formatScalar } from "./renderers/containers.js";
export { fallbackRenderer } from "./renderers/fallback.js";
export { renderValue, renderType } from "./emitter.js";
export * from "./diagram/index.js";
