/**
 * Rendering through the dispatch table
 */

import {
  AccessFailure,
  LiveValue,
  TypeNode,
  accessDiagnostics,
  ok,
  placeholderText,
  resolveMemberTypedef,
  valueType,
} from "@tileprobe/frontend";
import type { RenderContext } from "../types.js";
import { isTooDeep, report, withNested } from "../types.js";
import { resolveRenderer } from "./registry.js";

/**
 * Render a value with whichever renderer its base type name selects.
 * `type` skips parsing when the caller already knows it. Member typedefs
 * dispatch on the type they alias.
 */
export const renderDispatched = (
  value: LiveValue,
  context: RenderContext,
  type?: TypeNode
): [string, RenderContext] => {
  const resolved = type
    ? ok<TypeNode, AccessFailure>(resolveMemberTypedef(type))
    : valueType(value);
  if (!resolved.ok) {
    return [
      placeholderText(resolved.error),
      report(context, accessDiagnostics(resolved.error)),
    ];
  }

  const node = resolved.value;
  if (isTooDeep(context)) {
    return [`${node.name}{...}`, context];
  }
  return resolveRenderer(context.table, node.name).render(value, node, context);
};

/**
 * Render a member of the value currently being rendered
 */
export const renderNested = (
  value: LiveValue,
  context: RenderContext,
  type?: TypeNode
): [string, RenderContext] =>
  withNested(context, (ctx) => renderDispatched(value, ctx, type));
