/**
 * Snapshot files - reading and value selection shared by print and mermaid
 */

import { readFileSync, existsSync } from "node:fs";
import {
  Diagnostic,
  SnapshotDocument,
  ValueSnapshot,
  createDiagnostic,
  error,
  ok,
  ownEntry,
  parseSnapshotDocument,
} from "@tileprobe/frontend";
import type { Result } from "../types.js";

/** Path naming standard input */
export const STDIN_PATH = "-";

export type NamedSnapshot = {
  readonly name: string;
  readonly snapshot: ValueSnapshot;
};

const readText = (path: string): Result<string, Diagnostic> => {
  if (path === STDIN_PATH) {
    return ok(readFileSync(0, "utf-8"));
  }
  if (!existsSync(path)) {
    return error(
      createDiagnostic("TP5004", "error", `Snapshot file not found: ${path}`)
    );
  }
  return ok(readFileSync(path, "utf-8"));
};

/**
 * Read and validate a snapshot document
 */
export const readSnapshotFile = (
  path: string
): Result<SnapshotDocument, Diagnostic> => {
  const text = readText(path);
  if (!text.ok) {
    return text;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.value);
  } catch (thrown) {
    return error(
      createDiagnostic(
        "TP5005",
        "error",
        `Invalid JSON: ${thrown instanceof Error ? thrown.message : String(thrown)}`,
        path
      )
    );
  }

  const document = parseSnapshotDocument(raw);
  return document.ok
    ? document
    : error(createDiagnostic("TP5006", "error", document.error, path));
};

/**
 * The named value, or every value in document order when no name is given
 */
export const selectValues = (
  document: SnapshotDocument,
  name?: string
): Result<readonly NamedSnapshot[], Diagnostic> => {
  const names = Object.keys(document.values);

  if (name === undefined) {
    return names.length === 0
      ? error(createDiagnostic("TP5006", "error", "snapshot holds no values"))
      : ok(
          Object.entries(document.values).map(([entry, snapshot]) => ({
            name: entry,
            snapshot,
          }))
        );
  }

  const snapshot = ownEntry(document.values, name);
  return snapshot
    ? ok([{ name, snapshot }])
    : error(
        createDiagnostic(
          "TP5004",
          "error",
          `No value named '${name}' in snapshot`,
          undefined,
          names.length > 0 ? `available values: ${names.join(", ")}` : undefined
        )
      );
};
