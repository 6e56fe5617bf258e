import { describe, it } from "mocha";
import { expect } from "chai";
import { ParsedSignature, parseTypeSignature, serializeTypeNode } from "./parser.js";
import { formatTypeTree } from "./format.js";
import {
  constantValue,
  findNode,
  integerValue,
  sequenceValues,
} from "./type-node.js";

const parsed = (input: string): ParsedSignature => {
  const result = parseTypeSignature(input);
  if (!result.ok) {
    throw new Error(`parse failed: ${result.error.message}`);
  }
  return result.value;
};

describe("parseTypeSignature", () => {
  it("should split namespace paths from base names", () => {
    const { tree, complete } = parsed(
      "ck_tile::tuple<ck_tile::constant<8192l>, int>"
    );

    expect(complete).to.equal(true);
    expect(tree.name).to.equal("tuple");
    expect(tree.scope).to.deep.equal(["ck_tile"]);
    expect(tree.args.map((arg) => arg.name)).to.deep.equal([
      "constant",
      "int",
    ]);
    expect(tree.args[0]?.args[0]?.name).to.equal("8192");
  });

  it("should join multi-word builtin names", () => {
    const { tree } = parsed("ck_tile::array<unsigned long, 4ul>");
    expect(tree.args.map((arg) => arg.name)).to.deep.equal([
      "unsigned long",
      "4",
    ]);
  });

  it("should normalize hexadecimal literals", () => {
    const { tree } = parsed("ck_tile::array<int, 0x10>");
    expect(tree.args[1]?.name).to.equal("16");
  });

  it("should record qualifiers", () => {
    const view = parsed("const ck_tile::tensor_view<float> &").tree;
    expect(view.qualifiers).to.deep.equal({
      isConst: true,
      isVolatile: false,
      pointerDepth: 0,
      reference: "&",
    });

    expect(parsed("int**").tree.qualifiers.pointerDepth).to.equal(2);
    expect(parsed("float&&").tree.qualifiers.reference).to.equal("&&");
    expect(parsed("struct ck_tile::null_type").tree.name).to.equal(
      "null_type"
    );
  });

  it("should parse cast literals", () => {
    const { tree } = parsed(
      "ck_tile::buffer_view<(ck_tile::address_space_enum)1, float>"
    );
    const space = tree.args[0];

    expect(space?.name).to.equal("1");
    expect(space?.cast?.name).to.equal("address_space_enum");
    expect(space?.cast?.scope).to.deep.equal(["ck_tile"]);
    expect(space ? integerValue(space) : undefined).to.equal(1);
  });

  it("should attach member typedefs to their owner", () => {
    const { tree } = parsed("ck_tile::tensor_view<float>::TensorDesc");
    expect(tree.name).to.equal("TensorDesc");
    expect(tree.scope).to.deep.equal([]);
    expect(tree.owner?.name).to.equal("tensor_view");
  });

  it("should keep an anonymous namespace in the scope", () => {
    const { tree, complete } = parsed("(anonymous namespace)::helper<int>");
    expect(complete).to.equal(true);
    expect(tree.scope).to.deep.equal(["(anonymous namespace)"]);
    expect(tree.name).to.equal("helper");
  });

  it("should distinguish an empty argument list from none", () => {
    const empty = parsed("ck_tile::tuple<>").tree;
    expect(empty.templated).to.equal(true);
    expect(empty.args).to.deep.equal([]);
    expect(parsed("int").tree.templated).to.equal(false);
  });

  describe("errors", () => {
    it("should reject empty input", () => {
      const result = parseTypeSignature("   ");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TP1001");
      }
    });

    it("should reject an unclosed bracket", () => {
      const result = parseTypeSignature("tuple<int");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("TP1002");
        expect(result.error.position).to.equal(5);
        expect(result.error.message).to.equal(
          "'<' opened at position 5 is never closed"
        );
      }
    });

    it("should reject a closing bracket without an opener", () => {
      const result = parseTypeSignature("tuple<int>>");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.position).to.equal(10);
      }
    });

    it("should reject mismatched bracket kinds", () => {
      const result = parseTypeSignature("foo<int)");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "')' at position 7 closes '<' opened at position 3"
        );
      }
    });
  });

  describe("recoverable irregularities", () => {
    it("should close truncated output implicitly", () => {
      const { tree, complete, diagnostics } = parsed(
        "ck_tile::tuple<ck_tile::sequence<0, 1>, ck_tile::sequence<2..."
      );

      expect(complete).to.equal(false);
      expect(tree.args).to.have.length(2);
      const second = tree.args[1];
      expect(second ? sequenceValues(second) : undefined).to.deep.equal([2]);
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["TP1003"]);
    });

    it("should absorb empty arguments", () => {
      const { tree, complete, diagnostics } = parsed("tuple<int,,float>");
      expect(tree.args.map((arg) => arg.name)).to.deep.equal(["int", "float"]);
      expect(complete).to.equal(false);
      expect(diagnostics[0]?.code).to.equal("TP1004");
    });

    it("should absorb trailing text", () => {
      const { tree, complete } = parsed("int x");
      expect(tree.name).to.equal("int x");
      expect(complete).to.equal(true);

      const stray = parsed("tuple<int> {...}");
      expect(stray.tree.name).to.equal("tuple");
      expect(stray.complete).to.equal(false);
    });
  });

  describe("serializeTypeNode", () => {
    it("should print a normalized signature", () => {
      const { tree } = parsed(
        "const ck_tile::tuple<ck_tile::constant<8192l>, int>&"
      );
      expect(serializeTypeNode(tree)).to.equal(
        "const ck_tile::tuple<ck_tile::constant<8192>, int>&"
      );
    });

    it("should be idempotent through a second parse", () => {
      const inputs = [
        "ck_tile::tensor_descriptor<ck_tile::tuple<ck_tile::embed<ck_tile::tuple<ck_tile::constant<4>, int>, ck_tile::tuple<int, ck_tile::constant<1> > > >, ck_tile::tuple<ck_tile::sequence<0> >, ck_tile::tuple<ck_tile::sequence<1, 2> >, ck_tile::sequence<1, 2>, long>",
        "ck_tile::buffer_view<(ck_tile::address_space_enum)1, _Float16, int, true>",
        "const volatile ck_tile::array<unsigned long long, 3ul>* const&",
        "ck_tile::tensor_view<float, 0>::TensorDesc",
        "(anonymous namespace)::helper<int>",
        "ck_tile::tuple<>",
        "ck_tile::sequence<-1, 0x20>",
        "void (*)(int, float)",
      ];

      for (const input of inputs) {
        const first = parsed(input).tree;
        const second = parsed(serializeTypeNode(first)).tree;
        expect(second, input).to.deep.equal(first);
      }
    });
  });
});

describe("type tree helpers", () => {
  it("should read compile-time constants", () => {
    expect(constantValue(parsed("ck_tile::constant<8192l>").tree)).to.equal(
      8192
    );
    expect(
      constantValue(parsed("std::integral_constant<int, 4>").tree)
    ).to.equal(4);
    expect(constantValue(parsed("int").tree)).to.be.undefined;
  });

  it("should read sequence values", () => {
    expect(sequenceValues(parsed("ck_tile::sequence<1, -2, 3>").tree)).to.deep.equal(
      [1, -2, 3]
    );
    expect(sequenceValues(parsed("ck_tile::sequence<1, int>").tree)).to.be
      .undefined;
  });

  it("should find a nested node depth first", () => {
    const { tree } = parsed(
      "ck_tile::tile_window<ck_tile::tensor_view<float>, ck_tile::tuple<ck_tile::tensor_view<int> > >"
    );
    expect(findNode(tree, "tensor_view")?.args[0]?.name).to.equal("float");
    expect(findNode(tree, "missing")).to.be.undefined;
  });

  it("should dump a tree with indentation", () => {
    const { tree } = parsed("const ck_tile::tuple<int, ck_tile::sequence<1> >&");
    expect(formatTypeTree(tree)).to.equal(
      [
        "ck_tile::tuple [const &]",
        "  int",
        "  ck_tile::sequence",
        "    1",
      ].join("\n")
    );
  });
});
