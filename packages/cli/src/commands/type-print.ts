/**
 * type-print command - render what a type signature alone tells
 */

import { renderType } from "@tileprobe/emitter";
import type { CommandOutput, ResolvedConfig } from "../types.js";

export const typePrintCommand = (
  typeString: string,
  config: ResolvedConfig
): CommandOutput => renderType(typeString, config.render);
