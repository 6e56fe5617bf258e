/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli, exitCodeFor } from "./cli/index.js";
export type { ParsedArgs } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
