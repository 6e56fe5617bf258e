/**
 * Tile distributions and their encodings
 *
 *   tile_distribution<PsYs2XsAdaptor, Ys2DDescriptor, Encoding, Detail>
 *   tile_distribution_encoding<RsLengths, HsLengthss, Ps2RHssMajor,
 *                              Ps2RHssMinor, Ys2RHsMajor, Ys2RHsMinor>
 *
 * A major index of 0 points into R; major k points into H(k-1).
 */

import { Result, ok, error } from "../types/result.js";
import { AccessFailure } from "../types/errors.js";
import { Diagnostic } from "../types/diagnostic.js";
import { TypeNode, findNode, sequenceValues } from "../signature/type-node.js";
import { LiveValue } from "../value/live-value.js";
import {
  Extraction,
  memberOrType,
  missingFromType,
  valueType,
} from "./common.js";
import { Descriptor, extractDescriptor } from "./descriptor.js";

export type DimensionMapping = {
  /** `R[i]` or `Hk[i]` */
  readonly target: string;
  readonly length?: number;
};

export type DistributionEncoding = {
  readonly rsLengths: readonly number[];
  readonly hsLengthss: readonly (readonly number[])[];
  readonly ps2RhssMajor: readonly (readonly number[])[];
  readonly ps2RhssMinor: readonly (readonly number[])[];
  readonly ys2RhsMajor: readonly number[];
  readonly ys2RhsMinor: readonly number[];
  readonly pMappings: readonly (readonly DimensionMapping[])[];
  readonly yMappings: readonly DimensionMapping[];
};

export type TileDistribution = {
  readonly encoding: Result<DistributionEncoding, AccessFailure>;
  readonly psYsToXs: Result<Descriptor, AccessFailure>;
  readonly ysToD: Result<Descriptor, AccessFailure>;
};

const sequenceList = (
  node: TypeNode | undefined
): readonly (readonly number[])[] | undefined => {
  if (!node || node.name !== "tuple") {
    return undefined;
  }
  const lists: (readonly number[])[] = [];
  for (const arg of node.args) {
    const values = sequenceValues(arg);
    if (!values) {
      return undefined;
    }
    lists.push(values);
  }
  return lists;
};

const mapDimension = (
  major: number,
  minor: number,
  rsLengths: readonly number[],
  hsLengthss: readonly (readonly number[])[]
): DimensionMapping => {
  const length =
    major === 0 ? rsLengths[minor] : hsLengthss[major - 1]?.[minor];
  const target = major === 0 ? `R[${minor}]` : `H${major - 1}[${minor}]`;
  return length === undefined ? { target } : { target, length };
};

const zipMappings = (
  majors: readonly number[],
  minors: readonly number[],
  rsLengths: readonly number[],
  hsLengthss: readonly (readonly number[])[]
): readonly DimensionMapping[] =>
  majors.flatMap((major, index) => {
    const minor = minors[index];
    return minor === undefined
      ? []
      : [mapDimension(major, minor, rsLengths, hsLengthss)];
  });

export const extractEncoding = (
  node: TypeNode,
  path: string
): Result<DistributionEncoding, AccessFailure> => {
  const [rs, hs, pMajor, pMinor, yMajor, yMinor] = node.args;
  const rsLengths = rs ? sequenceValues(rs) : undefined;
  const hsLengthss = sequenceList(hs);
  const ps2RhssMajor = sequenceList(pMajor);
  const ps2RhssMinor = sequenceList(pMinor);
  const ys2RhsMajor = yMajor ? sequenceValues(yMajor) : undefined;
  const ys2RhsMinor = yMinor ? sequenceValues(yMinor) : undefined;

  if (
    !rsLengths ||
    !hsLengthss ||
    !ps2RhssMajor ||
    !ps2RhssMinor ||
    !ys2RhsMajor ||
    !ys2RhsMinor
  ) {
    return error(missingFromType(path, "distribution encoding"));
  }

  return ok({
    rsLengths,
    hsLengthss,
    ps2RhssMajor,
    ps2RhssMinor,
    ys2RhsMajor,
    ys2RhsMinor,
    pMappings: ps2RhssMajor.map((majors, index) =>
      zipMappings(majors, ps2RhssMinor[index] ?? [], rsLengths, hsLengthss)
    ),
    yMappings: zipMappings(ys2RhsMajor, ys2RhsMinor, rsLengths, hsLengthss),
  });
};

const encodingNode = (node: TypeNode): TypeNode | undefined => {
  const declared = node.args[2];
  return declared?.name === "tile_distribution_encoding"
    ? declared
    : findNode(node, "tile_distribution_encoding");
};

const nestedDescriptor = (
  value: LiveValue,
  fieldName: string,
  typeArg: TypeNode | undefined,
  diagnostics: Diagnostic[]
): Result<Descriptor, AccessFailure> => {
  const sourced = memberOrType(value, fieldName, typeArg);
  if (!sourced) {
    return error(missingFromType(`${value.path}.${fieldName}`, fieldName));
  }
  const extraction = extractDescriptor(sourced.value, sourced.type);
  diagnostics.push(...extraction.diagnostics);
  return ok(extraction.model);
};

export const extractTileDistribution = (
  value: LiveValue,
  type?: TypeNode
): Extraction<TileDistribution> => {
  const resolved = type ? ok<TypeNode, AccessFailure>(type) : valueType(value);
  if (!resolved.ok) {
    return {
      model: {
        encoding: resolved,
        psYsToXs: resolved,
        ysToD: resolved,
      },
      diagnostics: [],
    };
  }

  const node = resolved.value;
  const diagnostics: Diagnostic[] = [];
  const encoding = encodingNode(node);

  return {
    model: {
      encoding: encoding
        ? extractEncoding(encoding, value.path)
        : error(missingFromType(value.path, "distribution encoding")),
      psYsToXs: nestedDescriptor(value, "ps_ys_to_xs_", node.args[0], diagnostics),
      ysToD: nestedDescriptor(value, "ys_to_d_", node.args[1], diagnostics),
    },
    diagnostics,
  };
};
