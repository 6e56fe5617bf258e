/**
 * Core emitter types
 */

import type {
  Diagnostic,
  DiagnosticsCollector,
  LiveValue,
  TypeNode,
} from "@tileprobe/frontend";

/**
 * Options for text rendering
 */
export type RenderOptions = {
  /** Spaces per nesting level */
  readonly indent: number;
  /** Most elements shown from any one collection */
  readonly maxElements: number;
  /** Nesting depth beyond which values are elided as `name{...}` */
  readonly maxDepth: number;
};

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  indent: 2,
  maxElements: 20,
  maxDepth: 8,
};

/**
 * Renders one family of values to text.
 *
 * `type` is the already-parsed type of `value`. Continuation lines of the
 * returned text are indented relative to its first line; the caller places
 * the block.
 */
export type Renderer = {
  readonly name: string;
  readonly render: (
    value: LiveValue,
    type: TypeNode,
    context: RenderContext
  ) => [string, RenderContext];
};

export type DispatchEntry = {
  /** Matches every base type name it is a prefix of */
  readonly pattern: string;
  readonly renderer: Renderer;
};

/**
 * Validated, ordered dispatch entries. The first matching entry wins and
 * `fallback` takes every name nothing matches.
 */
export type DispatchTable = {
  readonly entries: readonly DispatchEntry[];
  readonly fallback: Renderer;
};

export type RenderContext = {
  readonly options: RenderOptions;
  readonly table: DispatchTable;
  /** Nesting depth of the value being rendered */
  readonly depth: number;
  readonly diagnostics: DiagnosticsCollector;
};

/**
 * Text for one inspected value plus the findings made while producing it
 */
export type RenderResult = {
  readonly text: string;
  readonly diagnostics: readonly Diagnostic[];
};
