/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
tileprobe - inspect ck_tile tensor descriptors, views, windows and distributions v${VERSION}

USAGE:
  tileprobe <command> [options]

COMMANDS:
  print <snapshot> [name]   Render snapshot values as text
  type-print <type>         Render what a type signature alone tells
  parse <type>              Dump the parsed type tree
  mermaid <snapshot> [name] Draw the dimension flow of a descriptor
  mermaid --type <type>     Draw a descriptor known only by its type
  printers                  List the dispatch table in match order

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress diagnostics
  -c, --config <file>       Config file path (default: tileprobe.json)

RENDER OPTIONS:
  --indent <n>              Spaces per nesting level (default: 2)
  --max-elements <n>        Elements shown before truncating (default: 20)
  --max-depth <n>           Nesting levels rendered in full (default: 8)

MERMAID OPTIONS:
  -d, --direction <dir>     Flow direction: BT, TD, TB, LR or RL (default: BT)
  --title <text>            Diagram title comment
  --no-styles               Leave out node colouring
  -t, --type <type>         Draw from a type signature instead of a snapshot

A snapshot path of '-' reads the document from standard input.

EXAMPLES:
  tileprobe print values.json desc
  tileprobe type-print "ck_tile::tuple<ck_tile::constant<4>>"
  tileprobe parse "ck_tile::sequence<1, 2, 3>"
  tileprobe mermaid values.json --direction LR
  tileprobe printers
`);
};
