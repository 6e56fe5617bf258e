/**
 * Mermaid flowchart text for a dimension-flow graph
 */

import type { TransformKind } from "@tileprobe/frontend";
import type { DiagramGraph, DiagramNode } from "./graph.js";

export type DiagramDirection = "BT" | "TD" | "TB" | "LR" | "RL";

export const DIAGRAM_DIRECTIONS: readonly DiagramDirection[] = [
  "BT",
  "TD",
  "TB",
  "LR",
  "RL",
];

export const isDiagramDirection = (text: string): text is DiagramDirection =>
  DIAGRAM_DIRECTIONS.some((direction) => direction === text);

export type MermaidOptions = {
  readonly direction: DiagramDirection;
  /** Emit `style` lines colouring nodes by role and producing transform */
  readonly styles: boolean;
};

export const DEFAULT_MERMAID_OPTIONS: MermaidOptions = {
  direction: "BT",
  styles: true,
};

const BOTTOM_FILL = "#e1f5fe";
const TOP_FILL = "#c8e6c9";
const DEFAULT_FILL = "#f5f5f5";

const TRANSFORM_FILLS: Readonly<Partial<Record<TransformKind, string>>> = {
  embed: "#fff3e0",
  unmerge: "#fce4ec",
  merge: "#e8f5e9",
  merge_v2: "#e8f5e9",
  pass_through: "#f3e5f5",
  replicate: "#e3f2fd",
  xor: "#ffebee",
  pad: "#fff9c4",
  left_pad: "#fff9c4",
  right_pad: "#fff9c4",
  slice: "#efebe9",
  freeze: "#eceff1",
};

export const nodeFill = (node: DiagramNode): string => {
  switch (node.role) {
    case "bottom":
    case "bottom-top":
      return BOTTOM_FILL;
    case "top":
      return TOP_FILL;
    default:
      return (node.producedBy && TRANSFORM_FILLS[node.producedBy]) ?? DEFAULT_FILL;
  }
};

const escapeLabel = (text: string): string => text.replace(/"/g, "#quot;");

const singleLine = (text: string): string => text.replace(/\s*\n\s*/g, " ").trim();

export const emitMermaid = (
  graph: DiagramGraph,
  options: Partial<MermaidOptions> = {}
): string => {
  const { direction, styles } = { ...DEFAULT_MERMAID_OPTIONS, ...options };
  const indent = "    ";

  const lines = ["```mermaid", `graph ${direction}`];
  const title = singleLine(graph.title);
  if (title.length > 0) {
    lines.push(`${indent}%% ${title}`);
  }

  for (const node of graph.nodes) {
    lines.push(`${indent}${node.id}["${escapeLabel(node.label)}"]`);
  }
  for (const edge of graph.edges) {
    lines.push(`${indent}${edge.from} -->|${escapeLabel(edge.label)}| ${edge.to}`);
  }
  if (styles) {
    for (const node of graph.nodes) {
      lines.push(`${indent}style ${node.id} fill:${nodeFill(node)}`);
    }
  }

  lines.push("```");
  return lines.join("\n");
};
