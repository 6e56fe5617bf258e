/**
 * Text rendering - Public API
 */

import {
  LiveValue,
  createDiagnostic,
  parseTypeSignature,
  typeOnlyValue,
} from "@tileprobe/frontend";
import type { DispatchTable, RenderOptions, RenderResult } from "./types.js";
import { createContext } from "./types.js";
import { getDefaultDispatchTable } from "./dispatch/default-table.js";
import { renderDispatched } from "./dispatch/render.js";

/**
 * Render a live value as indented text
 */
export const renderValue = (
  value: LiveValue,
  options: Partial<RenderOptions> = {},
  table: DispatchTable = getDefaultDispatchTable()
): RenderResult => {
  const [text, context] = renderDispatched(value, createContext(table, options));
  return { text, diagnostics: context.diagnostics.diagnostics };
};

/**
 * Render what a type signature alone tells about a value.
 * A signature that cannot be parsed is returned as it is.
 */
export const renderType = (
  typeString: string,
  options: Partial<RenderOptions> = {},
  table: DispatchTable = getDefaultDispatchTable()
): RenderResult => {
  const parsed = parseTypeSignature(typeString);
  if (!parsed.ok) {
    return {
      text: typeString,
      diagnostics: [
        createDiagnostic(parsed.error.code, "error", parsed.error.message, "type"),
      ],
    };
  }

  const [text, context] = renderDispatched(
    typeOnlyValue(typeString),
    createContext(table, options),
    parsed.value.tree
  );
  return {
    text,
    diagnostics: [...parsed.value.diagnostics, ...context.diagnostics.diagnostics],
  };
};
