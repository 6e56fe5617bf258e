/**
 * Context creation and manipulation functions
 */

import {
  Diagnostic,
  addDiagnostics,
  createDiagnosticsCollector,
} from "@tileprobe/frontend";
import {
  DEFAULT_RENDER_OPTIONS,
  DispatchTable,
  RenderContext,
  RenderOptions,
} from "./core.js";

/**
 * Create a new render context with default values
 */
export const createContext = (
  table: DispatchTable,
  options: Partial<RenderOptions> = {}
): RenderContext => ({
  options: { ...DEFAULT_RENDER_OPTIONS, ...options },
  table,
  depth: 0,
  diagnostics: createDiagnosticsCollector(),
});

/**
 * Record findings made while rendering
 */
export const report = (
  context: RenderContext,
  diagnostics: readonly Diagnostic[]
): RenderContext =>
  diagnostics.length === 0
    ? context
    : { ...context, diagnostics: addDiagnostics(context.diagnostics, diagnostics) };

/**
 * Run a render one level deeper.
 *
 * The depth is restored afterwards while diagnostics gathered by the
 * nested render are kept.
 */
export const withNested = <T>(
  context: RenderContext,
  render: (ctx: RenderContext) => [T, RenderContext]
): [T, RenderContext] => {
  const [result, innerContext] = render({ ...context, depth: context.depth + 1 });
  return [result, { ...innerContext, depth: context.depth }];
};

export const isTooDeep = (context: RenderContext): boolean =>
  context.depth >= context.options.maxDepth;
