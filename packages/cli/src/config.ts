/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { Diagnostic, createDiagnostic, error, ok } from "@tileprobe/frontend";
import {
  DEFAULT_DIAGRAM_TITLE,
  DEFAULT_MERMAID_OPTIONS,
  DEFAULT_RENDER_OPTIONS,
  DIAGRAM_DIRECTIONS,
  isDiagramDirection,
} from "@tileprobe/emitter";
import type {
  TileprobeConfig,
  TileprobeDiagramConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "tileprobe.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = (configPath: string, message: string): Diagnostic =>
  createDiagnostic("TP5007", "error", message, configPath);

const readCount = (
  raw: Record<string, unknown>,
  key: string,
  minimum: number
): Result<number | undefined, string> => {
  const value = raw[key];
  if (value === undefined) {
    return ok(undefined);
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < minimum) {
    return error(`'${key}' must be an integer >= ${minimum}`);
  }
  return ok(value);
};

const validateDiagram = (raw: unknown): Result<TileprobeDiagramConfig, string> => {
  if (!isRecord(raw)) {
    return error("'diagram' must be an object");
  }

  const { direction, styles, title } = raw;
  if (direction !== undefined) {
    if (typeof direction !== "string" || !isDiagramDirection(direction)) {
      return error(`'diagram.direction' must be one of ${DIAGRAM_DIRECTIONS.join(", ")}`);
    }
  }
  if (styles !== undefined && typeof styles !== "boolean") {
    return error("'diagram.styles' must be a boolean");
  }
  if (title !== undefined && typeof title !== "string") {
    return error("'diagram.title' must be a string");
  }

  return ok({
    ...(direction !== undefined ? { direction } : {}),
    ...(styles !== undefined ? { styles } : {}),
    ...(title !== undefined ? { title } : {}),
  });
};

/**
 * Check a parsed tileprobe.json document
 */
export const validateConfig = (raw: unknown): Result<TileprobeConfig, string> => {
  if (!isRecord(raw)) {
    return error("configuration must be a JSON object");
  }

  const indent = readCount(raw, "indent", 0);
  if (!indent.ok) return indent;
  const maxElements = readCount(raw, "maxElements", 1);
  if (!maxElements.ok) return maxElements;
  const maxDepth = readCount(raw, "maxDepth", 1);
  if (!maxDepth.ok) return maxDepth;

  let diagram: TileprobeDiagramConfig | undefined;
  if (raw.diagram !== undefined) {
    const result = validateDiagram(raw.diagram);
    if (!result.ok) return result;
    diagram = result.value;
  }

  return ok({
    ...(indent.value !== undefined ? { indent: indent.value } : {}),
    ...(maxElements.value !== undefined ? { maxElements: maxElements.value } : {}),
    ...(maxDepth.value !== undefined ? { maxDepth: maxDepth.value } : {}),
    ...(diagram ? { diagram } : {}),
  });
};

/**
 * Load tileprobe.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<TileprobeConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic("TP5004", "error", `Config file not found: ${configPath}`)
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (thrown) {
    return error(
      invalid(
        configPath,
        `Failed to parse ${CONFIG_FILE_NAME}: ${thrown instanceof Error ? thrown.message : String(thrown)}`
      )
    );
  }

  const config = validateConfig(raw);
  return config.ok ? config : error(invalid(configPath, config.error));
};

/**
 * Find tileprobe.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file and CLI options
 */
export const resolveConfig = (
  config: TileprobeConfig,
  cliOptions: CliOptions
): ResolvedConfig => ({
  render: {
    indent: cliOptions.indent ?? config.indent ?? DEFAULT_RENDER_OPTIONS.indent,
    maxElements:
      cliOptions.maxElements ?? config.maxElements ?? DEFAULT_RENDER_OPTIONS.maxElements,
    maxDepth: cliOptions.maxDepth ?? config.maxDepth ?? DEFAULT_RENDER_OPTIONS.maxDepth,
  },
  diagram: {
    direction:
      cliOptions.direction ??
      config.diagram?.direction ??
      DEFAULT_MERMAID_OPTIONS.direction,
    styles: cliOptions.noStyles
      ? false
      : config.diagram?.styles ?? DEFAULT_MERMAID_OPTIONS.styles,
    title: cliOptions.title ?? config.diagram?.title ?? DEFAULT_DIAGRAM_TITLE,
  },
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
