/**
 * tensor_descriptor and tensor_adaptor renderer
 *
 *   tensor_descriptor{
 *     element_space_size: 64
 *     ...
 *     top_dimension_ids: [3, 4]
 *
 *     Transforms:
 *       [0] embed
 *           lower: [0]
 *           upper: [1, 2, 3]
 *           up_lengths: [2, 4, 8]
 *   }
 */

import {
  Descriptor,
  Transform,
  TransformParameter,
  describeFailure,
  extractDescriptor,
  placeholderText,
} from "@tileprobe/frontend";
import type { RenderContext, Renderer } from "../types.js";
import {
  block,
  formatCount,
  formatIds,
  formatList,
  formatResult,
  getIndent,
  indentLines,
  report,
} from "../types.js";

const formatParameter = (parameter: TransformParameter): string =>
  `${parameter.key}: ${formatResult(parameter.value, (value) =>
    typeof value === "number" ? String(value) : formatList(value)
  )}`;

const transformDetails = (transform: Transform): readonly string[] => {
  if (transform.failure) {
    return [`error: ${describeFailure(transform.failure)}`];
  }

  const details = [
    `lower: ${formatList(transform.lowerDims)}`,
    `upper: ${formatList(transform.upperDims)}`,
    ...transform.parameters.map(formatParameter),
  ];
  for (const field of transform.rawFields ?? []) {
    details.push(`${field.name}: ${formatResult(field.text, (text) => text)}`);
  }
  return details;
};

const formatTransform = (
  transform: Transform,
  index: number,
  context: RenderContext
): string => {
  const detailIndent = getIndent(context, 2);
  return [
    `[${index}] ${transform.name}`,
    ...transformDetails(transform).map((line) => `${detailIndent}${line}`),
  ].join("\n");
};

const transformLines = (
  descriptor: Descriptor,
  context: RenderContext
): readonly string[] => {
  const { transforms } = descriptor;
  if (!transforms.ok) {
    return [`Transforms: ${placeholderText(transforms.error)}`];
  }
  if (transforms.value.length === 0) {
    return ["Transforms: []"];
  }
  const unit = getIndent(context);
  return [
    "Transforms:",
    ...transforms.value.map((transform, index) =>
      indentLines(formatTransform(transform, index, context), unit)
    ),
  ];
};

/**
 * Text for an already extracted descriptor or adaptor
 */
export const formatDescriptor = (
  descriptor: Descriptor,
  context: RenderContext
): string => {
  if (descriptor.uninitialized) {
    return `${descriptor.entity}{[UNINITIALIZED]}`;
  }

  const lines: string[] = [];
  if (descriptor.elementSpaceSize) {
    lines.push(`element_space_size: ${formatCount(descriptor.elementSpaceSize)}`);
  }
  lines.push(
    `ntransform: ${formatCount(descriptor.ntransform)}`,
    `ndim_hidden: ${formatCount(descriptor.ndimHidden)}`,
    `ndim_top: ${formatCount(descriptor.ndimTop)}`,
    `ndim_bottom: ${formatCount(descriptor.ndimBottom)}`,
    `bottom_dimension_ids: ${formatIds(descriptor.bottomDimensionIds)}`,
    `top_dimension_ids: ${formatIds(descriptor.topDimensionIds)}`,
    "",
    ...transformLines(descriptor, context)
  );

  return block(descriptor.entity, lines, context);
};

export const descriptorRenderer: Renderer = {
  name: "descriptor",
  render: (value, type, context) => {
    const { model, diagnostics } = extractDescriptor(value, type);
    return [formatDescriptor(model, context), report(context, diagnostics)];
  },
};
