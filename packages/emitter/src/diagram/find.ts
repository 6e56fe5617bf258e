/**
 * Locate the descriptor a value is built on
 *
 * Descriptors and adaptors are used as they are. Views, windows and
 * distributions lead to the descriptor they hold, and tuples are searched
 * member by member.
 */

import {
  Descriptor,
  Diagnostic,
  Extraction,
  LiveValue,
  TypeNode,
  extractContainer,
  extractDescriptor,
  extractTensorView,
  extractTileDistribution,
  extractTileWindow,
  isDescriptorEntity,
  resolveMemberTypedef,
  serializeTypeNode,
  typeOnlyValue,
  valueType,
} from "@tileprobe/frontend";

const MAX_SEARCH_DEPTH = 8;

const withDiagnostics = (
  descriptor: Descriptor,
  diagnostics: readonly Diagnostic[]
): Extraction<Descriptor> => ({ model: descriptor, diagnostics });

const tupleMembers = (
  value: LiveValue,
  node: TypeNode
): readonly { readonly value: LiveValue; readonly type?: TypeNode }[] => {
  const { model } = extractContainer(value, node);
  if (model.elements.ok) {
    return model.elements.value.flatMap((element) =>
      element.kind === "value" && element.value.ok
        ? [{ value: element.value.value, ...(element.type ? { type: element.type } : {}) }]
        : []
    );
  }
  return node.args.map((arg, index) => ({
    value: typeOnlyValue(serializeTypeNode(arg), `${value.path}[${index}]`),
    type: arg,
  }));
};

const typeOf = (
  value: LiveValue,
  type: TypeNode | undefined
): TypeNode | undefined => {
  if (type) {
    return resolveMemberTypedef(type);
  }
  const parsed = valueType(value);
  return parsed.ok ? parsed.value : undefined;
};

const search = (
  value: LiveValue,
  type: TypeNode | undefined,
  depth: number
): Extraction<Descriptor> | undefined => {
  const resolved = typeOf(value, type);
  if (!resolved || depth > MAX_SEARCH_DEPTH) {
    return undefined;
  }

  const name = resolved.name;
  if (isDescriptorEntity(name)) {
    return extractDescriptor(value, resolved);
  }
  if (name === "tensor_view") {
    const { model, diagnostics } = extractTensorView(value, resolved);
    return model.descriptor.ok
      ? withDiagnostics(model.descriptor.value, diagnostics)
      : undefined;
  }
  if (name.startsWith("tile_window")) {
    const { model, diagnostics } = extractTileWindow(value, resolved);
    return model.bottomView.ok && model.bottomView.value.descriptor.ok
      ? withDiagnostics(model.bottomView.value.descriptor.value, diagnostics)
      : undefined;
  }
  if (name === "tile_distribution") {
    const { model, diagnostics } = extractTileDistribution(value, resolved);
    return model.psYsToXs.ok
      ? withDiagnostics(model.psYsToXs.value, diagnostics)
      : undefined;
  }
  if (name === "tuple") {
    for (const member of tupleMembers(value, resolved)) {
      const found = search(member.value, member.type, depth + 1);
      if (found) {
        return found;
      }
    }
  }
  return undefined;
};

/**
 * The first descriptor or adaptor reachable from `value`, if any
 */
export const findDescriptor = (
  value: LiveValue,
  type?: TypeNode
): Extraction<Descriptor> | undefined => search(value, type, 0);
