/**
 * CLI argument parser
 */

import { Diagnostic, createDiagnostic } from "@tileprobe/frontend";
import { DIAGRAM_DIRECTIONS, isDiagramDirection } from "@tileprobe/emitter";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  /** Snapshot path, or the type signature for type-print and parse */
  input?: string;
  /** Value name inside a snapshot */
  name?: string;
  options: CliOptions;
  /** First malformed option; the dispatcher refuses to run when set */
  error?: Diagnostic;
};

const missingValue = (option: string): Diagnostic =>
  createDiagnostic("TP5002", "error", `Option '${option}' requires a value`);

const invalidValue = (option: string, value: string, expected: string): Diagnostic =>
  createDiagnostic(
    "TP5003",
    "error",
    `Invalid value '${value}' for '${option}': expected ${expected}`
  );

const parseCount = (
  option: string,
  value: string,
  minimum: number
): number | Diagnostic => {
  const count = Number(value);
  return /^\d+$/.test(value) && count >= minimum
    ? count
    : invalidValue(option, value, `an integer >= ${minimum}`);
};

const VALUE_OPTIONS = new Set([
  "-c",
  "--config",
  "--indent",
  "--max-elements",
  "--max-depth",
  "-d",
  "--direction",
  "--title",
  "-t",
  "--type",
]);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let input: string | undefined;
  let name: string | undefined;
  const failures: Diagnostic[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positionals; a lone "-" names stdin
    if (command && (!arg.startsWith("-") || arg === "-")) {
      if (input === undefined) {
        input = arg;
      } else if (name === undefined) {
        name = arg;
      } else {
        failures.push(createDiagnostic("TP5001", "error", `Unexpected argument '${arg}'`));
      }
      continue;
    }

    // Options taking a value consume the next argument
    let value: string | undefined;
    if (VALUE_OPTIONS.has(arg)) {
      value = args[++i];
      if (value === undefined) {
        failures.push(missingValue(arg));
        continue;
      }
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        if (value !== undefined) options.config = value;
        break;
      }
      case "--indent":
      case "--max-elements":
      case "--max-depth": {
        if (value === undefined) break;
        const count = parseCount(arg, value, arg === "--indent" ? 0 : 1);
        if (typeof count !== "number") {
          failures.push(count);
        } else if (arg === "--indent") {
          options.indent = count;
        } else if (arg === "--max-elements") {
          options.maxElements = count;
        } else {
          options.maxDepth = count;
        }
        break;
      }
      case "-d":
      case "--direction": {
        if (value === undefined) break;
        const direction = value.toUpperCase();
        if (isDiagramDirection(direction)) {
          options.direction = direction;
        } else {
          failures.push(invalidValue(arg, value, `one of ${DIAGRAM_DIRECTIONS.join(", ")}`));
        }
        break;
      }
      case "--title": {
        if (value !== undefined) options.title = value;
        break;
      }
      case "--no-styles":
        options.noStyles = true;
        break;
      case "-t":
      case "--type": {
        if (value !== undefined) options.type = value;
        break;
      }
      default:
        failures.push(createDiagnostic("TP5001", "error", `Unknown option '${arg}'`));
    }
  }

  return {
    command,
    ...(input !== undefined ? { input } : {}),
    ...(name !== undefined ? { name } : {}),
    options,
    ...(failures[0] ? { error: failures[0] } : {}),
  };
};
