/**
 * print command - render snapshot values as text
 */

import { Diagnostic, ok, snapshotValue } from "@tileprobe/frontend";
import { renderValue } from "@tileprobe/emitter";
import type { CommandOutput, ResolvedConfig, Result } from "../types.js";
import { readSnapshotFile, selectValues } from "./snapshot.js";

/**
 * Render one value when `name` is given, otherwise every value as `name = text`
 */
export const printCommand = (
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

  const rendered = selected.value.map((entry) => ({
    name: entry.name,
    ...renderValue(snapshotValue(entry.snapshot, entry.name), config.render),
  }));

  return ok({
    text:
      name !== undefined
        ? rendered.map((entry) => entry.text).join("\n")
        : rendered.map((entry) => `${entry.name} = ${entry.text}`).join("\n\n"),
    diagnostics: rendered.flatMap((entry) => entry.diagnostics),
  });
};
