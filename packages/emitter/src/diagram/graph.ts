/**
 * Dimension-flow graph of a descriptor or adaptor
 *
 * One node per distinct dimension id, in the order bottom ids, transform
 * ids (storage order, lower before upper), top ids. One edge per
 * (transform, lower id, upper id), labelled with the transform kind.
 */

import type { Descriptor, Transform, TransformKind } from "@tileprobe/frontend";

export type DimensionRole = "bottom" | "top" | "bottom-top" | "hidden";

export type DiagramNode = {
  readonly id: string;
  readonly dimension: number;
  readonly role: DimensionRole;
  readonly label: string;
  /** Kind of the transform that produces this dimension */
  readonly producedBy?: TransformKind;
};

export type DiagramEdge = {
  readonly from: string;
  readonly to: string;
  readonly label: string;
  readonly kind: TransformKind;
};

export type DiagramGraph = {
  readonly title: string;
  readonly nodes: readonly DiagramNode[];
  readonly edges: readonly DiagramEdge[];
};

export const DEFAULT_DIAGRAM_TITLE = "Tensor Transform Flow";

export const nodeId = (dimension: number): string =>
  dimension < 0 ? `Dm${-dimension}` : `D${dimension}`;

const roleOf = (
  dimension: number,
  bottom: ReadonlySet<number>,
  top: ReadonlySet<number>
): DimensionRole => {
  if (bottom.has(dimension)) {
    return top.has(dimension) ? "bottom-top" : "bottom";
  }
  return top.has(dimension) ? "top" : "hidden";
};

const LABEL_PREFIXES: Readonly<Record<DimensionRole, string>> = {
  bottom: "Bottom",
  top: "Top",
  "bottom-top": "Bottom/Top",
  hidden: "Dim",
};

export const buildDiagramGraph = (
  descriptor: Descriptor,
  title: string = DEFAULT_DIAGRAM_TITLE
): DiagramGraph => {
  const bottomIds = descriptor.bottomDimensionIds.ok
    ? descriptor.bottomDimensionIds.value
    : [];
  const topIds = descriptor.topDimensionIds.ok ? descriptor.topDimensionIds.value : [];
  const transforms: readonly Transform[] = descriptor.transforms.ok
    ? descriptor.transforms.value.filter((transform) => !transform.failure)
    : [];

  const order: number[] = [];
  const seen = new Set<number>();
  const visit = (dimension: number): void => {
    if (!seen.has(dimension)) {
      seen.add(dimension);
      order.push(dimension);
    }
  };

  bottomIds.forEach(visit);
  const producers = new Map<number, TransformKind>();
  for (const transform of transforms) {
    transform.lowerDims.forEach(visit);
    transform.upperDims.forEach(visit);
    for (const upper of transform.upperDims) {
      if (!producers.has(upper)) {
        producers.set(upper, transform.kind);
      }
    }
  }
  topIds.forEach(visit);

  const bottom = new Set(bottomIds);
  const top = new Set(topIds);
  const nodes = order.map((dimension): DiagramNode => {
    const role = roleOf(dimension, bottom, top);
    const producedBy = producers.get(dimension);
    return {
      id: nodeId(dimension),
      dimension,
      role,
      label: `${LABEL_PREFIXES[role]}[${dimension}]`,
      ...(producedBy ? { producedBy } : {}),
    };
  });

  const edges = transforms.flatMap((transform) =>
    transform.lowerDims.flatMap((lower) =>
      transform.upperDims.map(
        (upper): DiagramEdge => ({
          from: nodeId(lower),
          to: nodeId(upper),
          label: transform.kind === "unknown" ? transform.name : transform.kind,
          kind: transform.kind,
        })
      )
    )
  );

  return { title, nodes, edges };
};
