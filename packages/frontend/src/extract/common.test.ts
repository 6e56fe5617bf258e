import { describe, it } from "mocha";
import { expect } from "chai";
import { parseTypeSignature } from "../signature/parser.js";
import { TypeNode } from "../signature/type-node.js";
import { typeOnlyValue } from "../value/live-value.js";
import { ValueSnapshot, snapshotValue } from "../value/snapshot.js";
import {
  DISTRIBUTION_TYPE,
  TENSOR_VIEW_TYPE,
  WINDOW_TYPE,
} from "../testing/fixtures.js";
import { resolveMemberTypedef, valueType } from "./common.js";

const tree = (typeString: string): TypeNode => {
  const parsed = parseTypeSignature(typeString);
  if (!parsed.ok) {
    throw new Error(parsed.error.message);
  }
  return parsed.value.tree;
};

describe("resolveMemberTypedef", () => {
  it("should resolve the members of a tensor view", () => {
    expect(resolveMemberTypedef(tree(`${TENSOR_VIEW_TYPE}::TensorDesc`)).name).to.equal(
      "tensor_descriptor"
    );
    expect(resolveMemberTypedef(tree(`${TENSOR_VIEW_TYPE}::BufferView`)).name).to.equal(
      "buffer_view"
    );
  });

  it("should resolve the members of a tile window", () => {
    const member = (name: string): string =>
      resolveMemberTypedef(tree(`${WINDOW_TYPE}::${name}`)).name;

    expect(member("BottomTensorView")).to.equal("tensor_view");
    expect(member("WindowLengths")).to.equal("tuple");
    expect(member("TileDistribution")).to.equal("tile_distribution");
    expect(member("TileDstr")).to.equal("tile_distribution");
  });

  it("should resolve the distribution of a distributed tensor", () => {
    const type = `ck_tile::static_distributed_tensor<float, ${DISTRIBUTION_TYPE}>::TileDistribution`;
    expect(resolveMemberTypedef(tree(type)).name).to.equal("tile_distribution");
  });

  it("should leave unknown members and plain types unchanged", () => {
    const unknown = tree(`${TENSOR_VIEW_TYPE}::DataType`);
    expect(resolveMemberTypedef(unknown)).to.equal(unknown);

    const plain = tree(TENSOR_VIEW_TYPE);
    expect(resolveMemberTypedef(plain)).to.equal(plain);
  });

  it("should resolve the type of a live value", () => {
    const resolved = valueType(typeOnlyValue(`${TENSOR_VIEW_TYPE}::TensorDesc`));
    expect(resolved.ok && resolved.value.name).to.equal("tensor_descriptor");
  });
});

describe("valueType", () => {
  it("should fail on a value whose type name is not a string", () => {
    const untyped: ValueSnapshot = JSON.parse('{"type":null}');
    const resolved = valueType(snapshotValue(untyped, "x"));

    expect(resolved).to.deep.equal({
      ok: false,
      error: {
        kind: "access-failure",
        path: "x",
        reason: "unavailable",
        message: "type name is not a string",
      },
    });
  });
});
