/**
 * Emitter types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export type {
  RenderOptions,
  Renderer,
  DispatchEntry,
  DispatchTable,
  RenderContext,
  RenderResult,
} from "./emitter-types/index.js";
export {
  DEFAULT_RENDER_OPTIONS,
  createContext,
  report,
  withNested,
  isTooDeep,
  getIndent,
  indentLines,
  block,
  formatList,
  formatNested,
  formatTruncated,
  formatResult,
  formatCount,
  formatIds,
} from "./emitter-types/index.js";
