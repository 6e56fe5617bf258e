/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import { Diagnostic, createDiagnostic, formatDiagnostic, ok } from "@tileprobe/frontend";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import type { CommandOutput, ResolvedConfig, Result, TileprobeConfig } from "../types.js";
import { printCommand } from "../commands/print.js";
import { typePrintCommand } from "../commands/type-print.js";
import { parseCommand } from "../commands/parse.js";
import { mermaidCommand } from "../commands/mermaid.js";
import { printersCommand } from "../commands/printers.js";
import { STDIN_PATH } from "../commands/snapshot.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { ParsedArgs, parseArgs } from "./parser.js";

const USAGE: Readonly<Record<string, string>> = {
  print: "tileprobe print <snapshot.json> [name]",
  "type-print": "tileprobe type-print <type>",
  parse: "tileprobe parse <type>",
  mermaid: "tileprobe mermaid <snapshot.json> [name] | tileprobe mermaid --type <type>",
  printers: "tileprobe printers",
};

/**
 * Exit code for a failure: 2 unknown command or option, 3 input not found,
 * 4 invalid input, 1 anything else
 */
export const exitCodeFor = (diagnostic: Diagnostic): number => {
  switch (diagnostic.code) {
    case "TP5001":
      return 2;
    case "TP5004":
      return 3;
    case "TP1001":
    case "TP1002":
    case "TP5002":
    case "TP5003":
    case "TP5005":
    case "TP5006":
    case "TP5007":
    case "TP5008":
      return 4;
    default:
      return 1;
  }
};

const fail = (diagnostic: Diagnostic): number => {
  console.error(`Error: ${formatDiagnostic(diagnostic)}`);
  return exitCodeFor(diagnostic);
};

const report = (output: CommandOutput, config: ResolvedConfig): number => {
  console.log(output.text);

  for (const diagnostic of output.diagnostics) {
    if (config.quiet) break;
    if (diagnostic.severity === "info" && !config.verbose) continue;
    console.error(formatDiagnostic(diagnostic));
  }

  const firstError = output.diagnostics.find((d) => d.severity === "error");
  return firstError ? exitCodeFor(firstError) : 0;
};

const loadResolvedConfig = (
  parsed: ParsedArgs,
  cwd: string
): Result<ResolvedConfig, Diagnostic> => {
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: TileprobeConfig = {};
  if (configPath) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) {
      return loaded;
    }
    fileConfig = loaded.value;
    if (parsed.options.verbose) {
      console.error(`Using config: ${configPath}`);
    }
  }

  return ok(resolveConfig(fileConfig, parsed.options));
};

const runCommand = (
  parsed: ParsedArgs,
  config: ResolvedConfig,
  cwd: string
): Result<CommandOutput, Diagnostic> | undefined => {
  const { command, input, name } = parsed;
  const snapshotPath = (path: string): string =>
    path === STDIN_PATH ? path : resolve(cwd, path);

  switch (command) {
    case "print":
      return input !== undefined
        ? printCommand(snapshotPath(input), name, config)
        : undefined;
    case "type-print":
      return input !== undefined
        ? ok(typePrintCommand(input, config))
        : undefined;
    case "parse":
      return input !== undefined ? parseCommand(input, config) : undefined;
    case "mermaid": {
      const typeString = parsed.options.type;
      if (typeString !== undefined) {
        return mermaidCommand({ kind: "type", typeString }, config);
      }
      return input !== undefined
        ? mermaidCommand(
            {
              kind: "snapshot",
              path: snapshotPath(input),
              ...(name !== undefined ? { name } : {}),
            },
            config
          )
        : undefined;
    }
    default:
      return ok(printersCommand());
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[], cwd = process.cwd()): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "help" || parsed.command === "") {
    showHelp();
    return 0;
  }

  if (parsed.command === "version") {
    console.log(`tileprobe v${VERSION}`);
    return 0;
  }

  const usage = USAGE[parsed.command];
  if (usage === undefined) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'tileprobe --help' for usage information");
    return 2;
  }

  if (parsed.error) {
    return fail(parsed.error);
  }

  const config = loadResolvedConfig(parsed, cwd);
  if (!config.ok) {
    return fail(config.error);
  }

  const result = runCommand(parsed, config.value, cwd);
  if (result === undefined) {
    const code = fail(
      createDiagnostic("TP5002", "error", `'${parsed.command}' is missing an argument`)
    );
    console.error(`Usage: ${usage}`);
    return code;
  }
  if (!result.ok) {
    return fail(result.error);
  }

  return report(result.value, config.value);
};
