/**
 * Printer dispatch
 *
 * Entries are tried in order and a pattern matches every base type name
 * it is a prefix of, so `tile_window` also matches
 * `tile_window_with_static_distribution`. An entry whose pattern extends
 * an earlier one could never be reached; such tables are rejected when
 * built rather than silently misrouting values.
 */

import {
  Diagnostic,
  Result,
  createDiagnostic,
  error,
  ok,
} from "@tileprobe/frontend";
import type { DispatchEntry, DispatchTable, Renderer } from "../types.js";

/**
 * Entries collected before validation, in registration order
 */
export type DispatchRegistry = {
  readonly entries: readonly DispatchEntry[];
};

export type DispatchTableError = {
  readonly kind: "dispatch-table-error";
  readonly diagnostics: readonly Diagnostic[];
};

export const createRegistry = (): DispatchRegistry => ({ entries: [] });

export const register = (
  registry: DispatchRegistry,
  pattern: string,
  renderer: Renderer
): DispatchRegistry => ({
  entries: [...registry.entries, { pattern, renderer }],
});

const orderingDiagnostics = (
  entries: readonly DispatchEntry[]
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  entries.forEach((later, laterIndex) => {
    const earlierIndex = entries.findIndex(
      (earlier, index) =>
        index < laterIndex && later.pattern.startsWith(earlier.pattern)
    );
    const earlier = entries[earlierIndex];
    if (!earlier) {
      return;
    }

    diagnostics.push(
      earlier.pattern === later.pattern
        ? createDiagnostic(
            "TP4002",
            "error",
            `pattern '${later.pattern}' at [${laterIndex}] duplicates the entry at [${earlierIndex}]`
          )
        : createDiagnostic(
            "TP4001",
            "error",
            `pattern '${later.pattern}' at [${laterIndex}] is unreachable behind '${earlier.pattern}' at [${earlierIndex}]`,
            undefined,
            `register '${later.pattern}' before '${earlier.pattern}'`
          )
    );
  });

  return diagnostics;
};

/**
 * Validate a registry and freeze it into a dispatch table.
 */
export const buildDispatchTable = (
  registry: DispatchRegistry,
  fallback: Renderer
): Result<DispatchTable, DispatchTableError> => {
  const diagnostics = orderingDiagnostics(registry.entries);
  if (diagnostics.length > 0) {
    return error({ kind: "dispatch-table-error", diagnostics });
  }

  return ok(
    Object.freeze({
      entries: Object.freeze(
        registry.entries.map((entry) => Object.freeze({ ...entry }))
      ),
      fallback,
    })
  );
};

export const matchEntry = (
  table: DispatchTable,
  typeName: string
): DispatchEntry | undefined =>
  table.entries.find((entry) => typeName.startsWith(entry.pattern));

/**
 * Renderer for a base type name; the fallback when nothing matches.
 */
export const resolveRenderer = (
  table: DispatchTable,
  typeName: string
): Renderer => matchEntry(table, typeName)?.renderer ?? table.fallback;

/**
 * One line per entry in dispatch order, the fallback last.
 */
export const formatDispatchTable = (table: DispatchTable): string => {
  const width = Math.max(
    0,
    ...table.entries.map((entry) => entry.pattern.length)
  );
  const lines = table.entries.map(
    (entry, index) =>
      `${String(index + 1).padStart(3)}. ${entry.pattern.padEnd(width)}  -> ${entry.renderer.name}`
  );
  lines.push(`   *  ${"(anything else)".padEnd(width)}  -> ${table.fallback.name}`);
  return lines.join("\n");
};
