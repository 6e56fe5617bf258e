/**
 * Tile windows, distributed tensors and scatter/gather tiles
 *
 *   tile_window_with_static_distribution<BottomView, WindowLengths, Distribution, NumCoord>
 *   tile_window_with_static_lengths<BottomView, WindowLengths>
 *   static_distributed_tensor<DataType, Distribution>
 *   tile_scatter_gather<BottomView, WindowLengths, Distribution, PageIdxArray, ...>
 */

import { Result, ok, error } from "../types/result.js";
import { AccessFailure } from "../types/errors.js";
import { Diagnostic } from "../types/diagnostic.js";
import { TypeNode, findNode, integerValue } from "../signature/type-node.js";
import { LiveValue } from "../value/live-value.js";
import {
  DEFAULT_EXTRACT_OPTIONS,
  ExtractOptions,
  Extraction,
  SourcedValue,
  memberOrType,
  missingFromType,
  valueType,
} from "./common.js";
import { readIntegerList, readIntegerListField, typeIntegers } from "./integers.js";
import { TensorView, bufferDataType, dataTypeName, extractTensorView } from "./view.js";
import { TileDistribution, extractTileDistribution } from "./distribution.js";

export type WindowVariant =
  | "tile_window_with_static_distribution"
  | "tile_window_with_static_lengths"
  | "tile_window";

export type TileWindow = {
  readonly variant: WindowVariant;
  readonly dataType: Result<string, AccessFailure>;
  readonly windowLengths: Result<readonly number[], AccessFailure>;
  readonly windowOrigin: Result<readonly number[], AccessFailure>;
  /** Static-distribution windows only */
  readonly distribution?: Result<TileDistribution, AccessFailure>;
  readonly bottomView: Result<TensorView, AccessFailure>;
  readonly hasPrecomputedCoords: boolean;
};

export type DistributedTensor = {
  readonly dataType: Result<string, AccessFailure>;
  /** Thread-local buffer; rendered as a container */
  readonly threadBuffer: Result<LiveValue, AccessFailure>;
  readonly distribution: Result<TileDistribution, AccessFailure>;
};

export type MemoryOperation = "set" | "atomic_add" | "atomic_max" | "add";

export type ScatterGather = {
  readonly dataType: Result<string, AccessFailure>;
  readonly tileLengths: Result<readonly number[], AccessFailure>;
  readonly memoryOperation: Result<string, AccessFailure>;
  readonly distribution: Result<TileDistribution, AccessFailure>;
};

/** ck_tile memory_operation_enum, in declaration order */
const MEMORY_OPERATIONS: readonly MemoryOperation[] = [
  "set",
  "atomic_add",
  "atomic_max",
  "add",
];

const resolveType = (value: LiveValue, type: TypeNode | undefined) =>
  type ? ok<TypeNode, AccessFailure>(type) : valueType(value);

const lengthsOf = (
  value: LiveValue,
  fieldName: string,
  typeArg: TypeNode | undefined,
  path: string
): Result<readonly number[], AccessFailure> => {
  const fromType = typeArg ? typeIntegers(typeArg) : undefined;
  if (fromType) {
    return ok(fromType);
  }
  const live = readIntegerListField(value, fieldName);
  return live.ok || typeArg ? live : error(missingFromType(path, fieldName));
};

const distributionOf = (
  sourced: SourcedValue | undefined,
  path: string,
  diagnostics: Diagnostic[]
): Result<TileDistribution, AccessFailure> => {
  if (!sourced) {
    return error(missingFromType(path, "tile distribution"));
  }
  const extraction = extractTileDistribution(sourced.value, sourced.type);
  diagnostics.push(...extraction.diagnostics);
  return ok(extraction.model);
};

export const windowVariantOf = (name: string): WindowVariant =>
  name === "tile_window_with_static_distribution" ||
  name === "tile_window_with_static_lengths"
    ? name
    : "tile_window";

export const extractTileWindow = (
  value: LiveValue,
  type?: TypeNode
): Extraction<TileWindow> => {
  const resolved = resolveType(value, type);
  const node = resolved.ok ? resolved.value : undefined;
  const variant = windowVariantOf(node?.name ?? "tile_window");
  const path = value.path;
  const diagnostics: Diagnostic[] = [];

  const viewSource = memberOrType(value, "bottom_tensor_view_", node?.args[0]);
  let bottomView: Result<TensorView, AccessFailure> = error(
    missingFromType(path, "bottom tensor view")
  );
  if (viewSource) {
    const extraction = extractTensorView(viewSource.value, viewSource.type);
    diagnostics.push(...extraction.diagnostics);
    bottomView = ok(extraction.model);
  }

  const distribution =
    variant === "tile_window_with_static_distribution"
      ? distributionOf(
          memberOrType(value, "tile_dstr_", node?.args[2]),
          path,
          diagnostics
        )
      : undefined;

  const windowOrigin = readIntegerListField(value, "window_origin_");

  return {
    model: {
      variant,
      dataType: bufferDataType(node?.args[0], path),
      windowLengths: lengthsOf(value, "window_lengths_", node?.args[1], path),
      windowOrigin,
      ...(distribution ? { distribution } : {}),
      bottomView,
      hasPrecomputedCoords: value.field("pre_computed_coords_").ok,
    },
    diagnostics,
  };
};

export const extractDistributedTensor = (
  value: LiveValue,
  type?: TypeNode
): Extraction<DistributedTensor> => {
  const resolved = resolveType(value, type);
  const node = resolved.ok ? resolved.value : undefined;
  const path = value.path;
  const diagnostics: Diagnostic[] = [];
  const dataArg = node?.args[0];

  return {
    model: {
      dataType: dataArg ? ok(dataTypeName(dataArg)) : error(missingFromType(path, "data type")),
      threadBuffer: value.field("thread_buf_"),
      distribution: distributionOf(
        memberOrType(value, "tile_dstr_", node?.args[1]),
        path,
        diagnostics
      ),
    },
    diagnostics,
  };
};

const memoryOperationOf = (
  node: TypeNode | undefined,
  path: string
): Result<string, AccessFailure> => {
  const enumArg = node?.args.find((arg) => arg.cast?.name === "memory_operation_enum");
  const code = enumArg ? integerValue(enumArg) : undefined;
  if (code === undefined) {
    return error(missingFromType(path, "memory operation"));
  }
  return ok(MEMORY_OPERATIONS[code] ?? `memory_operation(${code})`);
};

export const extractScatterGather = (
  value: LiveValue,
  type?: TypeNode,
  options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS
): Extraction<ScatterGather> => {
  const resolved = resolveType(value, type);
  const node = resolved.ok ? resolved.value : undefined;
  const path = value.path;
  const diagnostics: Diagnostic[] = [];
  const distributionArg = node ? findNode(node, "tile_distribution") : undefined;

  const lengthsMember = value.field("window_lengths_");
  const tileLengths = lengthsMember.ok
    ? readIntegerList(lengthsMember.value, options.maxElements)
    : lengthsOf(value, "window_lengths_", node?.args[1], path);

  return {
    model: {
      dataType: bufferDataType(node?.args[0], path),
      tileLengths,
      memoryOperation: memoryOperationOf(node, path),
      distribution: distributionOf(
        memberOrType(value, "tile_dstr_", distributionArg),
        path,
        diagnostics
      ),
    },
    diagnostics,
  };
};
