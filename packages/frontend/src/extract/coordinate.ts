/**
 * Tensor coordinates
 *
 *   tensor_adaptor_coordinate<NDimHidden, BottomIds, TopIds>
 *   tensor_coordinate<NDimHidden, TopIds>      (bottom id is always 0)
 *
 * Runtime storage is the hidden index `idx_hidden_`; top and bottom
 * indices are projections of it.
 */

import { Result, ok, error, flatMap } from "../types/result.js";
import { AccessFailure, accessFailure } from "../types/errors.js";
import { TypeNode, sequenceValues } from "../signature/type-node.js";
import { LiveValue } from "../value/live-value.js";
import {
  DEFAULT_EXTRACT_OPTIONS,
  ExtractOptions,
  Extraction,
  accessDiagnostics,
  missingFromType,
  valueType,
} from "./common.js";
import { readIntegerListField, typeInteger } from "./integers.js";

export type CoordinateEntity = "tensor_coordinate" | "tensor_adaptor_coordinate";

export type Coordinate = {
  readonly entity: CoordinateEntity;
  readonly ndimHidden: Result<number, AccessFailure>;
  readonly hiddenIndex: Result<readonly number[], AccessFailure>;
  readonly bottomDimensionIds: Result<readonly number[], AccessFailure>;
  readonly topDimensionIds: Result<readonly number[], AccessFailure>;
  readonly topIndex: Result<readonly number[], AccessFailure>;
  readonly bottomIndex: Result<readonly number[], AccessFailure>;
  /** Linear offset, for tensor coordinates only */
  readonly offset?: Result<number, AccessFailure>;
};

const project = (
  hidden: readonly number[],
  ids: readonly number[],
  path: string
): Result<readonly number[], AccessFailure> => {
  const values: number[] = [];
  for (const id of ids) {
    const value = hidden[id];
    if (value === undefined) {
      return error(
        accessFailure(path, "unavailable", `hidden index has no entry ${id}`)
      );
    }
    values.push(value);
  }
  return ok(values);
};

const idsFromType = (
  arg: TypeNode | undefined,
  path: string,
  what: string
): Result<readonly number[], AccessFailure> => {
  const values = arg ? sequenceValues(arg) : undefined;
  return values ? ok(values) : error(missingFromType(path, what));
};

export const extractCoordinate = (
  value: LiveValue,
  type?: TypeNode,
  options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS
): Extraction<Coordinate> => {
  const resolved = type ? ok<TypeNode, AccessFailure>(type) : valueType(value);
  const node = resolved.ok ? resolved.value : undefined;
  const entity: CoordinateEntity =
    node?.name === "tensor_adaptor_coordinate"
      ? "tensor_adaptor_coordinate"
      : "tensor_coordinate";
  const path = value.path;

  const ndimArg = node?.args[0];
  const declaredHidden = ndimArg ? typeInteger(ndimArg) : undefined;
  const ndimHidden =
    declaredHidden === undefined
      ? error<number, AccessFailure>(missingFromType(path, "hidden dimension count"))
      : ok<number, AccessFailure>(declaredHidden);

  const bottomDimensionIds =
    entity === "tensor_coordinate"
      ? ok<readonly number[], AccessFailure>([0])
      : idsFromType(node?.args[1], path, "bottom dimension ids");
  const topDimensionIds = idsFromType(
    node?.args[entity === "tensor_coordinate" ? 1 : 2],
    path,
    "top dimension ids"
  );

  const hiddenIndex = readIntegerListField(
    value,
    "idx_hidden_",
    Math.min(declaredHidden ?? options.maxElements, options.maxElements)
  );

  const topIndex = flatMap(hiddenIndex, (hidden) =>
    flatMap(topDimensionIds, (ids) => project(hidden, ids, path))
  );
  const bottomIndex = flatMap(hiddenIndex, (hidden) =>
    flatMap(bottomDimensionIds, (ids) => project(hidden, ids, path))
  );

  const model: Coordinate = {
    entity,
    ndimHidden,
    hiddenIndex,
    bottomDimensionIds,
    topDimensionIds,
    topIndex,
    bottomIndex,
    ...(entity === "tensor_coordinate"
      ? {
          offset: flatMap(bottomIndex, ([first]) =>
            first === undefined
              ? error<number, AccessFailure>(
                  accessFailure(path, "unavailable", "bottom index is empty")
                )
              : ok<number, AccessFailure>(first)
          ),
        }
      : {}),
  };

  return {
    model,
    diagnostics: hiddenIndex.ok ? [] : accessDiagnostics(hiddenIndex.error),
  };
};
