/**
 * tile_distribution and tile_distribution_encoding renderers
 */

import {
  AccessFailure,
  Descriptor,
  DimensionMapping,
  DistributionEncoding,
  Result,
  TileDistribution,
  extractEncoding,
  extractTileDistribution,
  placeholderText,
} from "@tileprobe/frontend";
import type { RenderContext, Renderer } from "../types.js";
import {
  block,
  formatList,
  formatNested,
  getIndent,
  isTooDeep,
  report,
} from "../types.js";
import { formatDescriptor } from "./descriptor.js";

const formatMapping = (mapping: DimensionMapping): string =>
  mapping.length === undefined
    ? mapping.target
    : `${mapping.target} (length=${mapping.length})`;

const encodingLines = (
  encoding: DistributionEncoding,
  context: RenderContext
): readonly string[] => {
  const one = getIndent(context);
  const two = getIndent(context, 2);

  return [
    `RsLengths: ${formatList(encoding.rsLengths)}`,
    `HsLengthss: ${formatNested(encoding.hsLengthss)}`,
    `Ps2RHssMajor: ${formatNested(encoding.ps2RhssMajor)}`,
    `Ps2RHssMinor: ${formatNested(encoding.ps2RhssMinor)}`,
    `Ys2RHsMajor: ${formatList(encoding.ys2RhsMajor)}`,
    `Ys2RHsMinor: ${formatList(encoding.ys2RhsMinor)}`,
    "Ps mappings (with lengths):",
    ...encoding.pMappings.flatMap((mappings, p) => [
      `${one}P[${p}]:`,
      ...mappings.map((mapping) => `${two}-> ${formatMapping(mapping)}`),
    ]),
    "Ys mappings (with lengths):",
    ...encoding.yMappings.map(
      (mapping, y) => `${one}Y[${y}] -> ${formatMapping(mapping)}`
    ),
  ];
};

const formatEncoding = (
  name: string,
  encoding: Result<DistributionEncoding, AccessFailure>,
  context: RenderContext
): string =>
  encoding.ok
    ? block(name, encodingLines(encoding.value, context), context)
    : `${name}{${placeholderText(encoding.error)}}`;

const nestedDescriptor = (
  label: string,
  descriptor: Result<Descriptor, AccessFailure>,
  context: RenderContext
): string => {
  if (!descriptor.ok) {
    return `${label}: ${placeholderText(descriptor.error)}`;
  }
  const nested = { ...context, depth: context.depth + 1 };
  return isTooDeep(nested)
    ? `${label}: ${descriptor.value.entity}{...}`
    : `${label}: ${formatDescriptor(descriptor.value, nested)}`;
};

/**
 * Text for an already extracted distribution
 */
export const formatTileDistribution = (
  distribution: TileDistribution,
  context: RenderContext
): string =>
  block(
    "tile_distribution",
    [
      `encoding: ${formatEncoding("", distribution.encoding, context)}`,
      nestedDescriptor("ps_ys_to_xs_", distribution.psYsToXs, context),
      nestedDescriptor("ys_to_d_", distribution.ysToD, context),
    ],
    context
  );

export const distributionRenderer: Renderer = {
  name: "tile_distribution",
  render: (value, type, context) => {
    const { model, diagnostics } = extractTileDistribution(value, type);
    return [formatTileDistribution(model, context), report(context, diagnostics)];
  },
};

export const encodingRenderer: Renderer = {
  name: "tile_distribution_encoding",
  render: (value, type, context) => [
    formatEncoding(
      "tile_distribution_encoding",
      extractEncoding(type, value.path),
      context
    ),
    context,
  ],
};
