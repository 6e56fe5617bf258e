/**
 * Emitter types - Public API
 */

export type {
  RenderOptions,
  Renderer,
  DispatchEntry,
  DispatchTable,
  RenderContext,
  RenderResult,
} from "./core.js";
export { DEFAULT_RENDER_OPTIONS } from "./core.js";
export { createContext, report, withNested, isTooDeep } from "./context.js";
export {
  getIndent,
  indentLines,
  block,
  formatList,
  formatNested,
  formatTruncated,
  formatResult,
  formatCount,
  formatIds,
} from "./formatting.js";
