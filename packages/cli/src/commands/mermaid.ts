/**
 * mermaid command - dimension-flow diagram of a descriptor
 */

import {
  Diagnostic,
  createDiagnostic,
  error,
  ok,
  parseTypeSignature,
  snapshotValue,
  typeOnlyValue,
} from "@tileprobe/frontend";
import { Diagram, diagramForValue } from "@tileprobe/emitter";
import type { CommandOutput, ResolvedConfig, Result } from "../types.js";
import { readSnapshotFile, selectValues } from "./snapshot.js";

export type MermaidSource =
  | { readonly kind: "snapshot"; readonly path: string; readonly name?: string }
  | { readonly kind: "type"; readonly typeString: string };

const toOutput = (diagram: Result<Diagram, Diagnostic>): Result<CommandOutput, Diagnostic> =>
  diagram.ok
    ? ok({ text: diagram.value.text, diagnostics: diagram.value.diagnostics })
    : diagram;

const diagramForType = (
  typeString: string,
  config: ResolvedConfig
): Result<CommandOutput, Diagnostic> => {
  const parsed = parseTypeSignature(typeString);
  if (!parsed.ok) {
    return error(createDiagnostic(parsed.error.code, "error", parsed.error.message, "type"));
  }

  const diagram = diagramForValue(typeOnlyValue(typeString), config.diagram, parsed.value.tree);
  return diagram.ok
    ? ok({
        text: diagram.value.text,
        diagnostics: [...parsed.value.diagnostics, ...diagram.value.diagnostics],
      })
    : diagram;
};

/**
 * Without a value name the first value holding a descriptor is drawn
 */
const diagramForSnapshot = (
  path: string,
  name: string | undefined,
  config: ResolvedConfig
): Result<CommandOutput, Diagnostic> => {
  const document = readSnapshotFile(path);
  if (!document.ok) {
    return document;
  }

  const selected = selectValues(document.value, name);
  if (!selected.ok) {
    return selected;
  }

  let last: Result<Diagram, Diagnostic> | undefined;
  for (const entry of selected.value) {
    last = diagramForValue(snapshotValue(entry.snapshot, entry.name), config.diagram);
    if (last.ok) {
      break;
    }
  }

  return last
    ? toOutput(last)
    : error(createDiagnostic("TP5006", "error", "snapshot holds no values", path));
};

export const mermaidCommand = (
  source: MermaidSource,
  config: ResolvedConfig
): Result<CommandOutput, Diagnostic> =>
  source.kind === "type"
    ? diagramForType(source.typeString, config)
    : diagramForSnapshot(source.path, source.name, config);
