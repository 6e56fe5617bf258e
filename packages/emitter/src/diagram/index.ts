/**
 * Diagrams - Public API
 */

import {
  Diagnostic,
  LiveValue,
  Result,
  TypeNode,
  createDiagnostic,
  error,
  ok,
} from "@tileprobe/frontend";
import { findDescriptor } from "./find.js";
import { DEFAULT_DIAGRAM_TITLE, DiagramGraph, buildDiagramGraph } from "./graph.js";
import { MermaidOptions, emitMermaid } from "./mermaid.js";

export * from "./graph.js";
export * from "./mermaid.js";
export { findDescriptor } from "./find.js";

export type DiagramOptions = Partial<MermaidOptions> & {
  readonly title?: string;
};

export type Diagram = {
  readonly graph: DiagramGraph;
  readonly text: string;
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Mermaid diagram of the first descriptor reachable from `value`
 */
export const diagramForValue = (
  value: LiveValue,
  options: DiagramOptions = {},
  type?: TypeNode
): Result<Diagram, Diagnostic> => {
  const found = findDescriptor(value, type);
  if (!found) {
    return error(
      createDiagnostic(
        "TP5008",
        "error",
        "value holds no tensor descriptor or adaptor",
        value.path,
        "diagrams are drawn for descriptors, adaptors, views, windows and distributions"
      )
    );
  }

  const graph = buildDiagramGraph(found.model, options.title ?? DEFAULT_DIAGRAM_TITLE);
  return ok({
    graph,
    text: emitMermaid(graph, options),
    diagnostics: found.diagnostics,
  });
};
