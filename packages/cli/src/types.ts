/**
 * CLI types
 */

import type { Diagnostic } from "@tileprobe/frontend";
import type { DiagramDirection, RenderOptions } from "@tileprobe/emitter";

export type { Result } from "@tileprobe/frontend";

/**
 * Diagram settings in tileprobe.json
 */
export type TileprobeDiagramConfig = {
  readonly direction?: DiagramDirection;
  readonly styles?: boolean;
  readonly title?: string;
};

/**
 * tileprobe.json
 */
export type TileprobeConfig = {
  readonly indent?: number;
  readonly maxElements?: number;
  readonly maxDepth?: number;
  readonly diagram?: TileprobeDiagramConfig;
};

/**
 * CLI options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  indent?: number;
  maxElements?: number;
  maxDepth?: number;
  direction?: DiagramDirection;
  title?: string;
  noStyles?: boolean;
  type?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly render: RenderOptions;
  readonly diagram: {
    readonly direction: DiagramDirection;
    readonly styles: boolean;
    readonly title: string;
  };
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * What a command hands back to the dispatcher for printing
 */
export type CommandOutput = {
  readonly text: string;
  readonly diagnostics: readonly Diagnostic[];
};
