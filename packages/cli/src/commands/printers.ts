/**
 * printers command - list the dispatch table in match order
 */

import { formatDispatchTable, getDefaultDispatchTable } from "@tileprobe/emitter";
import type { CommandOutput } from "../types.js";

export const printersCommand = (): CommandOutput => ({
  text: formatDispatchTable(getDefaultDispatchTable()),
  diagnostics: [],
});
