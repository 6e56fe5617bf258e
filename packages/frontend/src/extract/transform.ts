/**
 * Coordinate transforms
 *
 * A transform maps lower dimension ids to upper dimension ids. Its kind is
 * looked up by exact base name, so `right_pad` never reads as `pad`.
 */

import { Result, ok, error } from "../types/result.js";
import {
  AccessFailure,
  AccessFailureReason,
  ExtractionFailure,
  accessFailure,
  extractionInconsistency,
} from "../types/errors.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { TypeNode } from "../signature/type-node.js";
import { LiveValue } from "../value/live-value.js";
import { accessDiagnostics, valueType } from "./common.js";
import {
  readInteger,
  readIntegerList,
  typeInteger,
  typeIntegers,
} from "./integers.js";

export type TransformKind =
  | "pass_through"
  | "embed"
  | "unmerge"
  | "merge"
  | "merge_v2"
  | "replicate"
  | "pad"
  | "left_pad"
  | "right_pad"
  | "xor"
  | "slice"
  | "freeze"
  | "unknown";

export type ParameterKey =
  | "up_lengths"
  | "low_lengths"
  | "coefficients"
  | "left_pad_length"
  | "right_pad_length"
  | "slice_begin"
  | "slice_end"
  | "low_idx";

export type TransformParameter = {
  readonly key: ParameterKey;
  readonly value: Result<number | readonly number[], AccessFailure>;
};

export type RawField = {
  readonly name: string;
  readonly text: Result<string, AccessFailure>;
};

export type Transform = {
  readonly kind: TransformKind;
  /** Base type name as found, e.g. `merge_v2_magic_division` */
  readonly name: string;
  readonly lowerDims: readonly number[];
  readonly upperDims: readonly number[];
  readonly parameters: readonly TransformParameter[];
  /** Field dump for kinds this library does not know */
  readonly rawFields?: readonly RawField[];
  /** Set on placeholders standing in for a transform that could not be read */
  readonly failure?: ExtractionFailure;
};

type DimensionRule = { readonly min: number; readonly max?: number };

type ParameterRule = {
  readonly key: ParameterKey;
  readonly shape: "list" | "scalar";
  /** Type argument holding the compile-time value */
  readonly typeArg: number;
  /** Optional parameters are left out when they cannot be read */
  readonly optional?: boolean;
};

type KindRule = {
  readonly lower: DimensionRule;
  readonly upper: DimensionRule;
  readonly parameters: readonly ParameterRule[];
};

const ONE: DimensionRule = { min: 1, max: 1 };
const SOME: DimensionRule = { min: 1 };
const NONE: DimensionRule = { min: 0, max: 0 };
const TWO: DimensionRule = { min: 2, max: 2 };

const upLengths = (typeArg: number, optional = false): ParameterRule => ({
  key: "up_lengths",
  shape: "list",
  typeArg,
  optional,
});

const KIND_RULES: Readonly<Record<Exclude<TransformKind, "unknown">, KindRule>> = {
  pass_through: { lower: ONE, upper: ONE, parameters: [upLengths(0, true)] },
  embed: {
    lower: ONE,
    upper: SOME,
    parameters: [
      upLengths(0),
      { key: "coefficients", shape: "list", typeArg: 1 },
    ],
  },
  unmerge: { lower: ONE, upper: SOME, parameters: [upLengths(0)] },
  merge: {
    lower: SOME,
    upper: ONE,
    parameters: [{ key: "low_lengths", shape: "list", typeArg: 0 }],
  },
  merge_v2: {
    lower: SOME,
    upper: ONE,
    parameters: [{ key: "low_lengths", shape: "list", typeArg: 0 }],
  },
  replicate: { lower: NONE, upper: SOME, parameters: [upLengths(0, true)] },
  pad: {
    lower: ONE,
    upper: ONE,
    parameters: [
      { key: "left_pad_length", shape: "scalar", typeArg: 1 },
      { key: "right_pad_length", shape: "scalar", typeArg: 2 },
    ],
  },
  left_pad: {
    lower: ONE,
    upper: ONE,
    parameters: [{ key: "left_pad_length", shape: "scalar", typeArg: 1 }],
  },
  right_pad: {
    lower: ONE,
    upper: ONE,
    parameters: [{ key: "right_pad_length", shape: "scalar", typeArg: 1 }],
  },
  xor: { lower: TWO, upper: TWO, parameters: [upLengths(0, true)] },
  slice: {
    lower: ONE,
    upper: ONE,
    parameters: [
      { key: "slice_begin", shape: "scalar", typeArg: 1 },
      { key: "slice_end", shape: "scalar", typeArg: 2 },
    ],
  },
  freeze: {
    lower: ONE,
    upper: NONE,
    parameters: [{ key: "low_idx", shape: "scalar", typeArg: 0, optional: true }],
  },
};

const KIND_NAMES: ReadonlyMap<string, Exclude<TransformKind, "unknown">> =
  new Map([
    ["pass_through", "pass_through"],
    ["embed", "embed"],
    ["unmerge", "unmerge"],
    ["merge", "merge"],
    ["merge_v3_division_mod", "merge"],
    ["merge_v2", "merge_v2"],
    ["merge_v2_magic_division", "merge_v2"],
    ["replicate", "replicate"],
    ["pad", "pad"],
    ["left_pad", "left_pad"],
    ["right_pad", "right_pad"],
    ["xor", "xor"],
    ["xor_t", "xor"],
    ["slice", "slice"],
    ["freeze", "freeze"],
  ]);

export const transformKindOf = (name: string): TransformKind =>
  KIND_NAMES.get(name) ?? "unknown";

const describeRule = (rule: DimensionRule): string =>
  rule.max === undefined
    ? `at least ${rule.min}`
    : rule.max === rule.min
      ? `exactly ${rule.min}`
      : `${rule.min} to ${rule.max}`;

const fits = (rule: DimensionRule, count: number): boolean =>
  count >= rule.min && (rule.max === undefined || count <= rule.max);

const readParameter = (
  live: LiveValue | undefined,
  type: TypeNode,
  rule: ParameterRule,
  path: string
): Result<number | readonly number[], AccessFailure> => {
  const fieldName = `${rule.key}_`;
  const member = live?.field(fieldName);
  if (member?.ok) {
    const fromLive =
      rule.shape === "list"
        ? readIntegerList(member.value)
        : readInteger(member.value);
    if (fromLive.ok) {
      return fromLive;
    }
  }

  const typeArg = type.args[rule.typeArg];
  if (typeArg) {
    const scalar = typeInteger(typeArg);
    const fromType =
      rule.shape === "scalar"
        ? scalar
        : (typeIntegers(typeArg) ?? (scalar === undefined ? undefined : [scalar]));
    if (fromType !== undefined) {
      return ok(fromType);
    }
  }

  if (member && !member.ok) {
    return error(member.error);
  }
  return error(
    live
      ? accessFailure(`${path}.${fieldName}`, "unavailable", `${fieldName} is not readable`)
      : accessFailure(`${path}.${fieldName}`, "no-storage", `${fieldName} is not recorded in the type`)
  );
};

const readRawFields = (live: LiveValue): readonly RawField[] => {
  const names = live.fieldNames();
  if (!names.ok) {
    return [];
  }
  return names.value.map((name): RawField => {
    const member = live.field(name);
    if (!member.ok) {
      return { name, text: member };
    }
    const list = readIntegerList(member.value);
    if (list.ok) {
      return { name, text: ok(`[${list.value.join(", ")}]`) };
    }
    const scalar = member.value.scalar();
    if (scalar.ok) {
      return { name, text: ok(String(scalar.value)) };
    }
    return { name, text: member.value.typeString() };
  });
};

export type TransformInput = {
  readonly path: string;
  /** Type from the enclosing descriptor's transform list */
  readonly type?: TypeNode;
  /**
   * Runtime storage of the transform. Undefined when the descriptor has
   * none at all; an error when this element alone could not be read.
   */
  readonly live?: Result<LiveValue, AccessFailure>;
  readonly lowerDims: readonly number[] | undefined;
  readonly upperDims: readonly number[] | undefined;
};

export type TransformExtraction = {
  readonly transform: Transform;
  readonly diagnostics: readonly Diagnostic[];
};

const placeholder = (
  name: string,
  failure: ExtractionFailure
): TransformExtraction => ({
  transform: {
    kind: "unknown",
    name,
    lowerDims: [],
    upperDims: [],
    parameters: [],
    failure,
  },
  diagnostics:
    failure.kind === "access-failure"
      ? accessDiagnostics(failure)
      : [createDiagnostic("TP3001", "warning", failure.message, failure.path)],
});

const UNREADABLE: ReadonlySet<AccessFailureReason> = new Set<AccessFailureReason>([
  "unavailable",
  "optimized-out",
]);

export const extractTransform = (input: TransformInput): TransformExtraction => {
  const { path, live } = input;

  if (live && !live.ok) {
    return placeholder(input.type?.name ?? "unknown", live.error);
  }
  const liveValue = live?.value;
  const probe = liveValue?.fieldNames();
  if (probe && !probe.ok && UNREADABLE.has(probe.error.reason)) {
    return placeholder(input.type?.name ?? "unknown", probe.error);
  }

  const liveType = liveValue ? valueType(liveValue) : undefined;
  const type = input.type ?? (liveType?.ok ? liveType.value : undefined);
  if (!type) {
    return placeholder(
      "unknown",
      liveType && !liveType.ok
        ? liveType.error
        : accessFailure(path, "unavailable", "transform type is unknown")
    );
  }

  const name = type.name;
  const { lowerDims, upperDims } = input;
  if (!lowerDims || !upperDims) {
    return placeholder(
      name,
      extractionInconsistency(
        path,
        name,
        "dimension ids are missing from the descriptor type"
      )
    );
  }

  const kind = transformKindOf(name);
  if (kind === "unknown") {
    return {
      transform: {
        kind,
        name,
        lowerDims,
        upperDims,
        parameters: [],
        rawFields: liveValue ? readRawFields(liveValue) : [],
      },
      diagnostics: [
        createDiagnostic(
          "TP3002",
          "info",
          `unrecognized transform '${name}'`,
          path
        ),
      ],
    };
  }

  const rule = KIND_RULES[kind];
  if (!fits(rule.lower, lowerDims.length) || !fits(rule.upper, upperDims.length)) {
    return placeholder(
      name,
      extractionInconsistency(
        path,
        name,
        `${name} expects ${describeRule(rule.lower)} lower and ${describeRule(rule.upper)} upper dimension(s), found ${lowerDims.length} and ${upperDims.length}`
      )
    );
  }

  const parameters: TransformParameter[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const parameterRule of rule.parameters) {
    const value = readParameter(liveValue, type, parameterRule, path);
    if (!value.ok && parameterRule.optional) {
      continue;
    }
    if (!value.ok) {
      diagnostics.push(...accessDiagnostics(value.error));
    }
    parameters.push({ key: parameterRule.key, value });
  }

  return {
    transform: { kind, name, lowerDims, upperDims, parameters },
    diagnostics,
  };
};
