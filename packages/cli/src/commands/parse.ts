/**
 * parse command - dump the parsed type tree
 */

import {
  Diagnostic,
  createDiagnostic,
  error,
  formatTypeTree,
  ok,
  parseTypeSignature,
  serializeTypeNode,
} from "@tileprobe/frontend";
import type { CommandOutput, ResolvedConfig, Result } from "../types.js";

/**
 * The normalized signature followed by one line per node
 */
export const parseCommand = (
  typeString: string,
  config: ResolvedConfig
): Result<CommandOutput, Diagnostic> => {
  const parsed = parseTypeSignature(typeString);
  if (!parsed.ok) {
    const { code, message, position } = parsed.error;
    return error(
      createDiagnostic(code, "error", message, "type", `at character ${position}`)
    );
  }

  const { tree, diagnostics } = parsed.value;
  return ok({
    text: [serializeTypeNode(tree), "", formatTypeTree(tree, config.render.indent)].join("\n"),
    diagnostics,
  });
};
