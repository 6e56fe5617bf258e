/**
 * Tensor views and their buffers
 *
 *   tensor_view<buffer_view<AddressSpace, T, ...>, TensorDesc, ...>
 */

import { Result, ok, error } from "../types/result.js";
import { AccessFailure } from "../types/errors.js";
import { Diagnostic } from "../types/diagnostic.js";
import { TypeNode, findNode, integerValue } from "../signature/type-node.js";
import { LiveValue } from "../value/live-value.js";
import {
  Extraction,
  SourcedValue,
  ValueSource,
  memberOrType,
  missingFromType,
  valueType,
} from "./common.js";
import { Descriptor, extractDescriptor } from "./descriptor.js";

const DATA_TYPE_NAMES: ReadonlyMap<string, string> = new Map([
  ["_Float16", "float16"],
  ["half_t", "float16"],
  ["__bf16", "bfloat16"],
  ["bfloat16_t", "bfloat16"],
  ["bf16_t", "bfloat16"],
  ["fp8_t", "fp8"],
  ["bf8_t", "bf8"],
  ["float", "float"],
  ["double", "double"],
  ["int", "int"],
  ["signed char", "int8"],
  ["int8_t", "int8"],
  ["unsigned char", "uint8"],
  ["uint8_t", "uint8"],
]);

/** ck_tile address_space_enum, in declaration order */
const ADDRESS_SPACES = ["generic", "global", "lds", "sgpr", "constant", "vgpr"];

export const dataTypeName = (node: TypeNode): string =>
  DATA_TYPE_NAMES.get(node.name) ?? node.name;

export const addressSpaceName = (node: TypeNode): string | undefined => {
  const value = integerValue(node);
  if (value !== undefined) {
    return ADDRESS_SPACES[value] ?? `address_space(${value})`;
  }
  return ADDRESS_SPACES.includes(node.name) ? node.name : undefined;
};

export type TensorView = {
  readonly dataType: Result<string, AccessFailure>;
  readonly isConst: boolean;
  readonly addressSpace: Result<string, AccessFailure>;
  readonly descriptor: Result<Descriptor, AccessFailure>;
  readonly descriptorSource?: ValueSource;
};

/**
 * Element type of the buffer a view (or anything containing one) reads.
 */
export const bufferDataType = (
  type: TypeNode | undefined,
  path: string
): Result<string, AccessFailure> => {
  const buffer = type ? findNode(type, "buffer_view") : undefined;
  const element = buffer?.args[1];
  return element ? ok(dataTypeName(element)) : error(missingFromType(path, "data type"));
};

const descriptorOf = (
  sourced: SourcedValue | undefined,
  path: string
): Extraction<Result<Descriptor, AccessFailure>> => {
  if (!sourced) {
    return { model: error(missingFromType(path, "descriptor")), diagnostics: [] };
  }
  const extraction = extractDescriptor(sourced.value, sourced.type);
  return { model: ok(extraction.model), diagnostics: extraction.diagnostics };
};

export const extractTensorView = (
  value: LiveValue,
  type?: TypeNode
): Extraction<TensorView> => {
  const resolved = type ? ok<TypeNode, AccessFailure>(type) : valueType(value);
  const node = resolved.ok ? resolved.value : undefined;
  const path = value.path;

  const buffer = node ? findNode(node, "buffer_view") : undefined;
  const spaceArg = buffer?.args[0];
  const space = spaceArg ? addressSpaceName(spaceArg) : undefined;
  const element = buffer?.args[1];

  const sourced = memberOrType(value, "desc_", node?.args[1]);
  const descriptor = descriptorOf(sourced, path);
  const diagnostics: Diagnostic[] = [...descriptor.diagnostics];

  return {
    model: {
      dataType: bufferDataType(node, path),
      isConst: Boolean(node?.qualifiers.isConst || element?.qualifiers.isConst),
      addressSpace: space ? ok(space) : error(missingFromType(path, "address space")),
      descriptor: descriptor.model,
      ...(sourced ? { descriptorSource: sourced.source } : {}),
    },
    diagnostics,
  };
};
