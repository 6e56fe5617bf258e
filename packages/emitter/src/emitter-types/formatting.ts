/**
 * Formatting helper functions
 */

import {
  AccessFailure,
  Result,
  placeholderText,
} from "@tileprobe/frontend";
import { RenderContext } from "./core.js";

/**
 * Indentation string for one nesting level
 */
export const getIndent = (context: RenderContext, levels = 1): string =>
  " ".repeat(context.options.indent * levels);

/**
 * Prefix every non-empty line of `text`
 */
export const indentLines = (text: string, prefix: string): string =>
  text
    .split("\n")
    .map((line) => (line.length === 0 ? line : `${prefix}${line}`))
    .join("\n");

/**
 * `name{` + one indented line per entry + `}`; `name{}` when empty
 */
export const block = (
  name: string,
  lines: readonly string[],
  context: RenderContext
): string => {
  if (lines.length === 0) {
    return `${name}{}`;
  }
  const unit = getIndent(context);
  return [`${name}{`, ...lines.map((line) => indentLines(line, unit)), "}"].join(
    "\n"
  );
};

export const formatList = (values: readonly (number | string)[]): string =>
  `[${values.join(", ")}]`;

export const formatNested = (
  values: readonly (readonly number[])[]
): string => `[${values.map(formatList).join(", ")}]`;

/**
 * A shown prefix of a longer list: `[1, 2, ... (8 total)]`
 */
export const formatTruncated = (
  values: readonly string[],
  total: number | undefined
): string =>
  total === undefined
    ? `[${[...values, "..."].join(", ")}]`
    : `[${[...values, `... (${total} total)`].join(", ")}]`;

export const formatResult = <T>(
  result: Result<T, AccessFailure>,
  format: (value: T) => string
): string => (result.ok ? format(result.value) : placeholderText(result.error));

export const formatCount = (result: Result<number, AccessFailure>): string =>
  formatResult(result, String);

export const formatIds = (
  result: Result<readonly number[], AccessFailure>
): string => formatResult(result, formatList);
