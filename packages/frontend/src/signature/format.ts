/**
 * Indented dump of a type tree
 */

import { TypeNode, qualifiedName } from "./type-node.js";
import { serializeTypeNode } from "./parser.js";

const describeNode = (node: TypeNode): string => {
  const parts = [node.cast ? `(${serializeTypeNode(node.cast)})${node.name}` : qualifiedName(node)];
  const { qualifiers } = node;
  const flags = [
    qualifiers.isConst ? "const" : undefined,
    qualifiers.isVolatile ? "volatile" : undefined,
    qualifiers.pointerDepth > 0 ? "*".repeat(qualifiers.pointerDepth) : undefined,
    qualifiers.reference,
  ].filter((flag): flag is string => flag !== undefined);
  if (flags.length > 0) {
    parts.push(`[${flags.join(" ")}]`);
  }
  if (node.owner) {
    parts.push(`(member of ${serializeTypeNode(node.owner)})`);
  }
  if (node.templated && node.args.length === 0) {
    parts.push("<>");
  }
  return parts.join(" ");
};

export const formatTypeTree = (node: TypeNode, indentWidth = 2): string => {
  const lines: string[] = [];
  const visit = (current: TypeNode, depth: number): void => {
    lines.push(`${" ".repeat(depth * indentWidth)}${describeNode(current)}`);
    for (const arg of current.args) {
      visit(arg, depth + 1);
    }
  };
  visit(node, 0);
  return lines.join("\n");
};
