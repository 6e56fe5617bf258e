/**
 * Tensor descriptors and tensor adaptors
 *
 * Dimension id lists live in the type:
 *   tensor_descriptor<Transforms, LowerIdss, UpperIdss, TopIds, ElementSpaceSize, ...>
 *   tensor_adaptor<Transforms, LowerIdss, UpperIdss, BottomIds, TopIds>
 * A descriptor's only bottom dimension is hidden id 0. Counts are read
 * from runtime storage first and derived from the type otherwise.
 */

import { Result, ok, error } from "../types/result.js";
import { AccessFailure } from "../types/errors.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { TypeNode, sequenceValues } from "../signature/type-node.js";
import { LiveValue, takeElements } from "../value/live-value.js";
import {
  Extraction,
  accessDiagnostics,
  missingFromType,
  valueType,
} from "./common.js";
import { readIntegerField, typeInteger } from "./integers.js";
import { Transform, extractTransform } from "./transform.js";
import { validateDimensionFlow } from "./validate.js";

export type DescriptorEntity = "tensor_descriptor" | "tensor_adaptor";

export type Descriptor = {
  readonly entity: DescriptorEntity;
  readonly transforms: Result<readonly Transform[], AccessFailure>;
  readonly bottomDimensionIds: Result<readonly number[], AccessFailure>;
  readonly topDimensionIds: Result<readonly number[], AccessFailure>;
  /** Only descriptors have an element space */
  readonly elementSpaceSize?: Result<number, AccessFailure>;
  readonly ntransform: Result<number, AccessFailure>;
  readonly ndimHidden: Result<number, AccessFailure>;
  readonly ndimTop: Result<number, AccessFailure>;
  readonly ndimBottom: Result<number, AccessFailure>;
  /** Some count held garbage: the object was never constructed */
  readonly uninitialized: boolean;
};

const MAX_TRANSFORMS = 64;

type Layout = {
  readonly bottomArg?: number;
  readonly topArg: number;
  readonly elementSpaceArg?: number;
};

const LAYOUTS: Readonly<Record<DescriptorEntity, Layout>> = {
  tensor_descriptor: { topArg: 3, elementSpaceArg: 4 },
  tensor_adaptor: { bottomArg: 3, topArg: 4 },
};

export const isDescriptorEntity = (name: string): name is DescriptorEntity =>
  name === "tensor_descriptor" || name === "tensor_adaptor";

const idsAt = (
  type: TypeNode,
  index: number,
  path: string,
  what: string
): Result<readonly number[], AccessFailure> => {
  const arg = type.args[index];
  const values = arg ? sequenceValues(arg) : undefined;
  return values ? ok(values) : error(missingFromType(path, what));
};

const idsPerTransform = (
  type: TypeNode,
  index: number
): readonly (readonly number[] | undefined)[] =>
  (type.args[index]?.args ?? []).map(sequenceValues);

const distinctIds = (lists: readonly (readonly number[] | undefined)[]): number => {
  const seen = new Set<number>();
  for (const list of lists) {
    for (const id of list ?? []) {
      seen.add(id);
    }
  }
  return seen.size;
};

const readCount = (
  value: LiveValue,
  fieldName: string,
  derived: number | undefined
): Result<number, AccessFailure> => {
  const live = readIntegerField(value, fieldName);
  if (live.ok || live.error.reason === "uninitialized" || derived === undefined) {
    return live;
  }
  return ok(derived);
};

type TransformList = {
  readonly transforms: Result<readonly Transform[], AccessFailure>;
  readonly diagnostics: readonly Diagnostic[];
};

const extractTransforms = (
  value: LiveValue,
  type: TypeNode
): TransformList => {
  const path = `${value.path}.transforms_`;
  const transformTuple = type.args[0];
  const typeArgs = transformTuple?.templated ? transformTuple.args : undefined;
  const lowers = idsPerTransform(type, 1);
  const uppers = idsPerTransform(type, 2);
  const diagnostics: Diagnostic[] = [];

  const member = value.field("transforms_");
  const taken = member.ok ? takeElements(member.value, MAX_TRANSFORMS) : member;
  if (!taken.ok) {
    diagnostics.push(...accessDiagnostics(taken.error));
  }
  const liveItems = taken.ok ? taken.value.items : undefined;

  if (!typeArgs && !liveItems) {
    return {
      transforms: taken.ok ? ok([]) : error(taken.error),
      diagnostics,
    };
  }

  const count = Math.max(typeArgs?.length ?? 0, liveItems?.length ?? 0);
  const transforms: Transform[] = [];
  for (let index = 0; index < count; index += 1) {
    const extraction = extractTransform({
      path: `${path}[${index}]`,
      type: typeArgs?.[index],
      live: liveItems?.[index],
      lowerDims: lowers[index],
      upperDims: uppers[index],
    });
    transforms.push(extraction.transform);
    diagnostics.push(...extraction.diagnostics);
  }

  return { transforms: ok(transforms), diagnostics };
};

/**
 * Recover a descriptor or adaptor model from a live value. `type` may be
 * passed when the caller already parsed it.
 */
export const extractDescriptor = (
  value: LiveValue,
  type?: TypeNode
): Extraction<Descriptor> => {
  const resolved = type ? ok<TypeNode, AccessFailure>(type) : valueType(value);
  const node = resolved.ok ? resolved.value : undefined;
  const entity: DescriptorEntity =
    node && isDescriptorEntity(node.name) ? node.name : "tensor_descriptor";
  const layout = LAYOUTS[entity];
  const path = value.path;

  if (!node) {
    const failure = resolved.ok ? undefined : resolved.error;
    const unavailable = error<never, AccessFailure>(
      failure ?? missingFromType(path, "descriptor type")
    );
    return {
      model: {
        entity,
        transforms: unavailable,
        bottomDimensionIds: unavailable,
        topDimensionIds: unavailable,
        ...(entity === "tensor_descriptor" ? { elementSpaceSize: unavailable } : {}),
        ntransform: unavailable,
        ndimHidden: unavailable,
        ndimTop: unavailable,
        ndimBottom: unavailable,
        uninitialized: false,
      },
      diagnostics: failure ? accessDiagnostics(failure) : [],
    };
  }

  const bottomDimensionIds =
    layout.bottomArg === undefined
      ? ok<readonly number[], AccessFailure>([0])
      : idsAt(node, layout.bottomArg, path, "bottom dimension ids");
  const topDimensionIds = idsAt(node, layout.topArg, path, "top dimension ids");

  const { transforms, diagnostics: transformDiagnostics } = extractTransforms(
    value,
    node
  );

  const lowers = idsPerTransform(node, 1);
  const uppers = idsPerTransform(node, 2);
  const elementSpaceArg =
    layout.elementSpaceArg === undefined ? undefined : node.args[layout.elementSpaceArg];

  const transformTuple = node.args[0];
  const ntransform = readCount(
    value,
    "ntransform_",
    transformTuple?.templated ? transformTuple.args.length : undefined
  );
  const ndimHidden = readCount(
    value,
    "ndim_hidden_",
    bottomDimensionIds.ok && topDimensionIds.ok && node.args[1] && node.args[2]
      ? distinctIds([
          bottomDimensionIds.value,
          topDimensionIds.value,
          ...lowers,
          ...uppers,
        ])
      : undefined
  );
  const ndimTop = readCount(
    value,
    "ndim_top_",
    topDimensionIds.ok ? topDimensionIds.value.length : undefined
  );
  const ndimBottom = readCount(
    value,
    "ndim_bottom_",
    bottomDimensionIds.ok ? bottomDimensionIds.value.length : undefined
  );
  const elementSpaceSize =
    entity === "tensor_descriptor"
      ? readCount(
          value,
          "element_space_size_",
          elementSpaceArg ? typeInteger(elementSpaceArg) : undefined
        )
      : undefined;

  const counts = [elementSpaceSize, ntransform, ndimHidden, ndimTop, ndimBottom];
  const uninitialized = counts.some(
    (count) => count !== undefined && !count.ok && count.error.reason === "uninitialized"
  );

  const model: Descriptor = {
    entity,
    transforms,
    bottomDimensionIds,
    topDimensionIds,
    ...(elementSpaceSize ? { elementSpaceSize } : {}),
    ntransform,
    ndimHidden,
    ndimTop,
    ndimBottom,
    uninitialized,
  };

  const diagnostics: Diagnostic[] = [...transformDiagnostics];
  if (uninitialized) {
    diagnostics.push(
      createDiagnostic(
        "TP3004",
        "warning",
        `${entity} holds implausible counts and is probably uninitialized`,
        path
      )
    );
  } else {
    diagnostics.push(...validateDimensionFlow(model, path));
  }

  return { model, diagnostics };
};
