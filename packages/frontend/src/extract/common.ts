/**
 * Shared plumbing for the extractors
 */

import { Result, ok, error } from "../types/result.js";
import { AccessFailure, accessFailure } from "../types/errors.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { parseTypeSignature, serializeTypeNode } from "../signature/parser.js";
import { TypeNode } from "../signature/type-node.js";
import { LiveValue, typeOnlyValue } from "../value/live-value.js";

/**
 * A recovered model plus whatever was noticed on the way.
 */
export type Extraction<T> = {
  readonly model: T;
  readonly diagnostics: readonly Diagnostic[];
};

export type ValueSource = "runtime" | "type";

export type SourcedValue = {
  readonly value: LiveValue;
  readonly type: TypeNode | undefined;
  readonly source: ValueSource;
};

export type ExtractOptions = {
  /** Upper bound on elements read from any single collection */
  readonly maxElements: number;
};

export const DEFAULT_MAX_DIMS = 20;

export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  maxElements: DEFAULT_MAX_DIMS,
};

type MemberTypedefs = {
  readonly owner: (name: string) => boolean;
  /** Member name to the owner's template argument it aliases */
  readonly members: ReadonlyMap<string, number>;
};

const MEMBER_TYPEDEFS: readonly MemberTypedefs[] = [
  {
    owner: (name) => name === "tensor_view",
    members: new Map([
      ["BufferView", 0],
      ["TensorDesc", 1],
    ]),
  },
  {
    owner: (name) => name.startsWith("tile_window"),
    members: new Map([
      ["BottomTensorView", 0],
      ["WindowLengths", 1],
      ["TileDistribution", 2],
      ["TileDstr", 2],
    ]),
  },
  {
    owner: (name) => name === "static_distributed_tensor",
    members: new Map([
      ["TileDistribution", 1],
      ["StaticTileDistribution", 1],
      ["TileDstr", 1],
    ]),
  },
];

/**
 * Replace a member typedef such as `tensor_view<...>::TensorDesc` with the
 * template argument of its owner that it names. Unknown members and owners
 * without that argument come back unchanged.
 */
export const resolveMemberTypedef = (node: TypeNode): TypeNode => {
  if (!node.owner) {
    return node;
  }
  const owner = resolveMemberTypedef(node.owner);
  const index = MEMBER_TYPEDEFS.find((entry) => entry.owner(owner.name))?.members.get(
    node.name
  );
  const target = index !== undefined ? owner.args[index] : undefined;
  return target ? resolveMemberTypedef(target) : node;
};

/**
 * Parse the type of a live value, resolving member typedefs.
 */
export const valueType = (value: LiveValue): Result<TypeNode, AccessFailure> => {
  const typeString = value.typeString();
  if (!typeString.ok) {
    return typeString;
  }
  // Hosts are untyped at runtime; a missing type must not reach the parser
  const raw: unknown = typeString.value;
  if (typeof raw !== "string") {
    return error(accessFailure(value.path, "unavailable", "type name is not a string"));
  }
  const parsed = parseTypeSignature(raw);
  return parsed.ok
    ? ok(resolveMemberTypedef(parsed.value.tree))
    : error(
        accessFailure(
          value.path,
          "unavailable",
          `type is not readable: ${parsed.error.message}`
        )
      );
};

/**
 * Read a member from runtime storage, or fall back to a value built from
 * the type argument that describes it.
 */
export const memberOrType = (
  value: LiveValue,
  fieldName: string,
  typeArg: TypeNode | undefined
): SourcedValue | undefined => {
  const member = value.field(fieldName);
  if (member.ok) {
    const memberType = valueType(member.value);
    return {
      value: member.value,
      type: memberType.ok ? memberType.value : typeArg,
      source: "runtime",
    };
  }
  if (!typeArg) {
    return undefined;
  }
  return {
    value: typeOnlyValue(serializeTypeNode(typeArg), `${value.path}.${fieldName}`),
    type: typeArg,
    source: "type",
  };
};

/**
 * Diagnostic for a failed access, or nothing when the value simply has no
 * runtime storage.
 */
export const accessDiagnostics = (
  failure: AccessFailure
): readonly Diagnostic[] =>
  failure.reason === "no-storage"
    ? []
    : [
        createDiagnostic(
          "TP2001",
          "warning",
          `${failure.reason}: ${failure.message}`,
          failure.path
        ),
      ];

export const missingFromType = (
  path: string,
  what: string
): AccessFailure =>
  accessFailure(path, "unavailable", `${what} is not recorded in the type`);
