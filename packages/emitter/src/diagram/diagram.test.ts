import { describe, it } from "mocha";
import { expect } from "chai";
import {
  AccessFailure,
  Descriptor,
  Transform,
  TransformKind,
  ok,
  snapshotValue,
  typeOnlyValue,
} from "@tileprobe/frontend";
import {
  DESCRIPTOR_TYPE,
  PASS_THROUGH_TYPE,
  descriptorSnapshot,
  embedSnapshot,
  tensorViewSnapshot,
  tupleSnapshot,
} from "@tileprobe/frontend/testing";
import { buildDiagramGraph } from "./graph.js";
import { emitMermaid } from "./mermaid.js";
import { diagramForValue } from "./index.js";

const transform = (
  kind: TransformKind,
  lowerDims: readonly number[],
  upperDims: readonly number[]
): Transform => ({ kind, name: kind, lowerDims, upperDims, parameters: [] });

const adaptor = (
  transforms: readonly Transform[],
  bottom: readonly number[],
  top: readonly number[]
): Descriptor => ({
  entity: "tensor_adaptor",
  transforms: ok(transforms),
  bottomDimensionIds: ok(bottom),
  topDimensionIds: ok(top),
  ntransform: ok<number, AccessFailure>(transforms.length),
  ndimHidden: ok<number, AccessFailure>(0),
  ndimTop: ok<number, AccessFailure>(top.length),
  ndimBottom: ok<number, AccessFailure>(bottom.length),
  uninitialized: false,
});

describe("Diagrams", () => {
  describe("buildDiagramGraph", () => {
    it("should order nodes bottom first, then by transform, then top", () => {
      const graph = buildDiagramGraph(
        adaptor(
          [transform("unmerge", [0], [2, 1]), transform("merge", [1, 2], [3])],
          [0],
          [3]
        )
      );

      expect(graph.nodes.map((node) => node.label)).to.deep.equal([
        "Bottom[0]",
        "Dim[2]",
        "Dim[1]",
        "Top[3]",
      ]);
      expect(graph.edges.map((edge) => `${edge.from}>${edge.to}:${edge.label}`)).to.deep.equal([
        "D0>D2:unmerge",
        "D0>D1:unmerge",
        "D1>D3:merge",
        "D2>D3:merge",
      ]);
    });

    it("should add the nodes of a replicate transform without edges", () => {
      const transforms = [
        transform("replicate", [], [1, 2]),
        transform("merge", [0, 1, 2], [3]),
      ];
      const graph = buildDiagramGraph(adaptor(transforms, [0], [3]));

      expect(graph.nodes.map((node) => node.label)).to.deep.equal([
        "Bottom[0]",
        "Dim[1]",
        "Dim[2]",
        "Top[3]",
      ]);
      expect(graph.nodes[1]?.producedBy).to.equal("replicate");
      expect(graph.edges).to.have.length(
        transforms.reduce((sum, t) => sum + t.lowerDims.length * t.upperDims.length, 0)
      );
      expect(graph.edges.map((edge) => `${edge.from}>${edge.to}:${edge.label}`)).to.deep.equal([
        "D0>D3:merge",
        "D1>D3:merge",
        "D2>D3:merge",
      ]);
    });

    it("should label a dimension that is both bottom and top", () => {
      const graph = buildDiagramGraph(adaptor([], [0], [0]));
      expect(graph.nodes.map((node) => node.label)).to.deep.equal(["Bottom/Top[0]"]);
      expect(graph.edges).to.deep.equal([]);
    });

    it("should leave out transforms that could not be read", () => {
      const result = diagramForValue(
        snapshotValue(
          descriptorSnapshot([
            embedSnapshot(),
            { type: PASS_THROUGH_TYPE, status: "unavailable" },
          ])
        )
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.graph.nodes).to.have.length(5);
        expect(result.value.graph.edges.map((edge) => edge.label)).to.deep.equal([
          "embed",
          "embed",
          "embed",
        ]);
      }
    });
  });

  describe("diagramForValue", () => {
    it("should find the descriptor inside a tuple of views", () => {
      const result = diagramForValue(snapshotValue(tupleSnapshot([tensorViewSnapshot()])));

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const { graph, text } = result.value;
        expect(graph.nodes).to.have.length(5);
        expect(graph.edges).to.have.length(4);
        expect(text).to.equal(
          [
            "```mermaid",
            "graph BT",
            "    %% Tensor Transform Flow",
            '    D0["Bottom[0]"]',
            '    D1["Dim[1]"]',
            '    D2["Dim[2]"]',
            '    D3["Top[3]"]',
            '    D4["Top[4]"]',
            "    D0 -->|embed| D1",
            "    D0 -->|embed| D2",
            "    D0 -->|embed| D3",
            "    D1 -->|pass_through| D4",
            "    style D0 fill:#e1f5fe",
            "    style D1 fill:#fff3e0",
            "    style D2 fill:#fff3e0",
            "    style D3 fill:#c8e6c9",
            "    style D4 fill:#c8e6c9",
            "```",
          ].join("\n")
        );
      }
    });

    it("should draw a descriptor known only by its type", () => {
      const result = diagramForValue(typeOnlyValue(DESCRIPTOR_TYPE), { title: "desc" });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.graph.title).to.equal("desc");
        expect(result.value.graph.edges).to.have.length(4);
      }
    });

    it("should refuse a value without a descriptor", () => {
      const result = diagramForValue(snapshotValue({ type: "int", value: 3 }));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TP5008");
      }
    });
  });

  describe("emitMermaid", () => {
    it("should honour direction, title and style options", () => {
      const graph = buildDiagramGraph(
        adaptor([transform("pass_through", [0], [1])], [0], [1]),
        "My\nadaptor"
      );

      expect(emitMermaid(graph, { direction: "LR", styles: false })).to.equal(
        [
          "```mermaid",
          "graph LR",
          "    %% My adaptor",
          '    D0["Bottom[0]"]',
          '    D1["Top[1]"]',
          "    D0 -->|pass_through| D1",
          "```",
        ].join("\n")
      );
    });

    it("should colour hidden dimensions by the transform producing them", () => {
      const graph = buildDiagramGraph(
        adaptor(
          [transform("xor", [0, 1], [2, 3]), transform("freeze", [2], [])],
          [0, 1],
          [3]
        )
      );
      const styles = emitMermaid(graph)
        .split("\n")
        .filter((line) => line.includes("style"));

      expect(styles).to.deep.equal([
        "    style D0 fill:#e1f5fe",
        "    style D1 fill:#e1f5fe",
        "    style D2 fill:#ffebee",
        "    style D3 fill:#c8e6c9",
      ]);
    });
  });
});
