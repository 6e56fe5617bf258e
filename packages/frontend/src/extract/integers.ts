/**
 * Integer reading from live values and types
 *
 * Integers in ck_tile objects come in three shapes: compile-time
 * `constant<N>` types with no storage, plain integer scalars, and wrapper
 * structs holding a `value` member. Lists come from `sequence<...>` types,
 * tuples of constants, or array storage.
 */

import { Result, ok, error, flatMap } from "../types/result.js";
import { AccessFailure, accessFailure } from "../types/errors.js";
import {
  TypeNode,
  constantValue,
  integerValue,
  sequenceValues,
} from "../signature/type-node.js";
import { LiveValue, ScalarValue, takeElements } from "../value/live-value.js";
import { DEFAULT_MAX_DIMS, valueType } from "./common.js";

/** Values beyond this magnitude come from uninitialized storage. */
export const MAX_SANE_VALUE = 100_000_000;

const checkSane = (path: string, value: number): Result<number, AccessFailure> =>
  Math.abs(value) > MAX_SANE_VALUE
    ? error(
        accessFailure(
          path,
          "uninitialized",
          `${value} is outside the plausible range`
        )
      )
    : ok(value);

export const toInteger = (scalar: ScalarValue): number | undefined => {
  if (typeof scalar === "number") {
    return Number.isInteger(scalar) ? scalar : undefined;
  }
  if (typeof scalar === "bigint") {
    const value = Number(scalar);
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof scalar === "string" && /^-?\d+$/.test(scalar.trim())) {
    return Number.parseInt(scalar, 10);
  }
  return undefined;
};

/**
 * Integer carried by a type alone (`constant<4>`, a literal argument).
 */
export const typeInteger = (node: TypeNode): number | undefined =>
  constantValue(node) ?? integerValue(node);

/**
 * Integer list carried by a type alone: `sequence<...>` or a tuple whose
 * members are all constants.
 */
export const typeIntegers = (
  node: TypeNode
): readonly number[] | undefined => {
  const sequence = sequenceValues(node);
  if (sequence) {
    return sequence;
  }
  if (node.name !== "tuple" || !node.templated) {
    return undefined;
  }
  const values: number[] = [];
  for (const arg of node.args) {
    const value = typeInteger(arg);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }
  return values;
};

export const readInteger = (value: LiveValue): Result<number, AccessFailure> => {
  const type = valueType(value);
  const fromType = type.ok ? constantValue(type.value) : undefined;
  if (fromType !== undefined) {
    return checkSane(value.path, fromType);
  }

  const scalar = value.scalar();
  if (scalar.ok) {
    const integer = toInteger(scalar.value);
    return integer === undefined
      ? error(
          accessFailure(
            value.path,
            "not-scalar",
            `'${String(scalar.value)}' is not an integer`
          )
        )
      : checkSane(value.path, integer);
  }
  if (scalar.error.reason !== "not-scalar") {
    return scalar;
  }

  const wrapped = value.field("value");
  return wrapped.ok ? readInteger(wrapped.value) : scalar;
};

export const readIntegerField = (
  value: LiveValue,
  fieldName: string
): Result<number, AccessFailure> => flatMap(value.field(fieldName), readInteger);

const STORAGE_CONTAINERS = new Set(["array", "multi_index", "thread_buffer"]);

/**
 * Declared element count of an array-like type.
 */
export const declaredLength = (node: TypeNode): number | undefined => {
  const lengthArg =
    node.name === "multi_index" ? node.args[0] : node.args[1];
  return lengthArg ? typeInteger(lengthArg) : undefined;
};

export const readIntegerList = (
  value: LiveValue,
  limit = DEFAULT_MAX_DIMS
): Result<readonly number[], AccessFailure> => {
  const type = valueType(value);
  const node = type.ok ? type.value : undefined;

  const fromType = node ? typeIntegers(node) : undefined;
  if (fromType) {
    return ok(fromType);
  }

  let source = value;
  let count = limit;
  if (node && STORAGE_CONTAINERS.has(node.name)) {
    const data = value.field("data");
    if (data.ok) {
      source = data.value;
    }
    count = Math.min(limit, declaredLength(node) ?? limit);
  }

  const taken = takeElements(source, count);
  if (!taken.ok) {
    return taken;
  }

  const values: number[] = [];
  for (const [index, item] of taken.value.items.entries()) {
    const declared =
      node?.name === "tuple" ? node.args[index] : undefined;
    const constant = declared ? typeInteger(declared) : undefined;
    if (constant !== undefined) {
      values.push(constant);
      continue;
    }
    const integer = flatMap(item, readInteger);
    if (!integer.ok) {
      return integer;
    }
    values.push(integer.value);
  }
  return ok(values);
};

export const readIntegerListField = (
  value: LiveValue,
  fieldName: string,
  limit = DEFAULT_MAX_DIMS
): Result<readonly number[], AccessFailure> =>
  flatMap(value.field(fieldName), (member) => readIntegerList(member, limit));
