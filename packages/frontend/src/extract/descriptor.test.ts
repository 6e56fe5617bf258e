import { describe, it } from "mocha";
import { expect } from "chai";
import { snapshotValue } from "../value/snapshot.js";
import { typeOnlyValue } from "../value/live-value.js";
import {
  ADAPTOR_TYPE,
  DESCRIPTOR_TYPE,
  PASS_THROUGH_TYPE,
  descriptorSnapshot,
  embedSnapshot,
} from "../testing/fixtures.js";
import { extractDescriptor } from "./descriptor.js";

describe("extractDescriptor", () => {
  it("should recover transforms in storage order with dimension ids", () => {
    const { model, diagnostics } = extractDescriptor(
      snapshotValue(descriptorSnapshot())
    );

    expect(model.entity).to.equal("tensor_descriptor");
    expect(model.transforms.ok).to.equal(true);
    if (model.transforms.ok) {
      expect(
        model.transforms.value.map((t) => [t.kind, t.lowerDims, t.upperDims])
      ).to.deep.equal([
        ["embed", [0], [1, 2, 3]],
        ["pass_through", [1], [4]],
      ]);
    }
    expect(model.bottomDimensionIds).to.deep.equal({ ok: true, value: [0] });
    expect(model.topDimensionIds).to.deep.equal({ ok: true, value: [3, 4] });
    expect(diagnostics).to.deep.equal([]);
  });

  it("should read counts live and derive the rest from the type", () => {
    const { model } = extractDescriptor(snapshotValue(descriptorSnapshot()));

    expect(model.elementSpaceSize).to.deep.equal({ ok: true, value: 64 });
    expect(model.ntransform).to.deep.equal({ ok: true, value: 2 });
    expect(model.ndimHidden).to.deep.equal({ ok: true, value: 5 });
    expect(model.ndimTop).to.deep.equal({ ok: true, value: 2 });
    expect(model.ndimBottom).to.deep.equal({ ok: true, value: 1 });
    expect(model.uninitialized).to.equal(false);
  });

  it("should keep every other field when one field is unreadable", () => {
    const { model } = extractDescriptor(
      snapshotValue(
        descriptorSnapshot(undefined, { type: "long", status: "optimizedOut" })
      )
    );

    expect(model.elementSpaceSize?.ok).to.equal(false);
    if (model.elementSpaceSize && !model.elementSpaceSize.ok) {
      expect(model.elementSpaceSize.error.reason).to.equal("optimized-out");
    }
    expect(model.ntransform).to.deep.equal({ ok: true, value: 2 });
    expect(model.transforms.ok && model.transforms.value.length).to.equal(2);
  });

  it("should put a placeholder where a transform cannot be read", () => {
    const { model, diagnostics } = extractDescriptor(
      snapshotValue(
        descriptorSnapshot([
          embedSnapshot(),
          { type: PASS_THROUGH_TYPE, status: "unavailable" },
        ])
      )
    );

    const transforms = model.transforms.ok ? model.transforms.value : [];
    expect(transforms.map((t) => t.kind)).to.deep.equal(["embed", "unknown"]);
    expect(transforms[1]?.failure?.path).to.equal("value.transforms_[1]");
    expect(diagnostics.map((d) => d.code)).to.deep.equal(["TP2001", "TP3003"]);
    expect(diagnostics[1]?.message).to.equal("top dimension 4 is never produced");
  });

  it("should flag garbage counts as uninitialized", () => {
    const { model, diagnostics } = extractDescriptor(
      snapshotValue(descriptorSnapshot(undefined, { type: "long", value: 999999999 }))
    );
    expect(model.uninitialized).to.equal(true);
    expect(diagnostics.map((d) => d.code)).to.deep.equal(["TP3004"]);
  });

  it("should extract from the type alone", () => {
    const { model, diagnostics } = extractDescriptor(typeOnlyValue(DESCRIPTOR_TYPE));

    const transforms = model.transforms.ok ? model.transforms.value : [];
    expect(transforms.map((t) => t.parameters)).to.deep.equal([
      [
        { key: "up_lengths", value: { ok: true, value: [2, 4, 8] } },
        { key: "coefficients", value: { ok: true, value: [32, 8, 1] } },
      ],
      [{ key: "up_lengths", value: { ok: true, value: [2] } }],
    ]);
    expect(model.elementSpaceSize?.ok).to.equal(false);
    expect(diagnostics).to.deep.equal([]);
  });

  it("should read adaptor bottom ids from the type", () => {
    const { model } = extractDescriptor(typeOnlyValue(ADAPTOR_TYPE));

    expect(model.entity).to.equal("tensor_adaptor");
    expect(model.elementSpaceSize).to.be.undefined;
    expect(model.bottomDimensionIds).to.deep.equal({ ok: true, value: [0] });
    expect(model.topDimensionIds).to.deep.equal({ ok: true, value: [1] });
    expect(model.ndimHidden).to.deep.equal({ ok: true, value: 2 });
  });

  it("should mark everything unavailable when the type cannot be parsed", () => {
    const { model } = extractDescriptor(typeOnlyValue("ck_tile::tensor_descriptor<"));
    expect(model.transforms.ok).to.equal(false);
    expect(model.topDimensionIds.ok).to.equal(false);
  });
});
