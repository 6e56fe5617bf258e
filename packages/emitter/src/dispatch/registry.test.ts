import { describe, it } from "mocha";
import { expect } from "chai";
import type { Renderer } from "../types.js";
import {
  buildDispatchTable,
  createRegistry,
  formatDispatchTable,
  matchEntry,
  register,
  resolveRenderer,
} from "./registry.js";
import { getDefaultDispatchTable } from "./default-table.js";

const stub = (name: string): Renderer => ({
  name,
  render: (_value, _type, context) => [name, context],
});

const fallback = stub("fallback");

describe("Dispatch table", () => {
  describe("buildDispatchTable", () => {
    it("should reject a general pattern registered before a specific one", () => {
      const registry = register(
        register(createRegistry(), "tile_window", stub("generic")),
        "tile_window_with_static_distribution",
        stub("specific")
      );

      const result = buildDispatchTable(registry, fallback);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal(["TP4001"]);
        expect(result.error.diagnostics[0]?.message).to.equal(
          "pattern 'tile_window_with_static_distribution' at [1] is unreachable behind 'tile_window' at [0]"
        );
      }
    });

    it("should reject duplicate patterns", () => {
      const registry = register(
        register(createRegistry(), "tuple", stub("a")),
        "tuple",
        stub("b")
      );

      const result = buildDispatchTable(registry, fallback);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.diagnostics[0]?.code).to.equal("TP4002");
        expect(result.error.diagnostics[0]?.message).to.equal(
          "pattern 'tuple' at [1] duplicates the entry at [0]"
        );
      }
    });

    it("should route overlapping names to the most specific entry", () => {
      const registry = register(
        register(
          createRegistry(),
          "tile_window_with_static_distribution",
          stub("specific")
        ),
        "tile_window",
        stub("generic")
      );
      const result = buildDispatchTable(registry, fallback);

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const table = result.value;
        expect(resolveRenderer(table, "tile_window_with_static_distribution").name).to.equal(
          "specific"
        );
        expect(resolveRenderer(table, "tile_window").name).to.equal("generic");
        expect(resolveRenderer(table, "tile_window_with_static_lengths").name).to.equal(
          "generic"
        );
        expect(resolveRenderer(table, "sequence").name).to.equal("fallback");
        expect(matchEntry(table, "sequence")).to.be.undefined;
      }
    });

    it("should freeze the table it builds", () => {
      const result = buildDispatchTable(
        register(createRegistry(), "tuple", stub("tuple")),
        fallback
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(Object.isFrozen(result.value)).to.equal(true);
        expect(Object.isFrozen(result.value.entries)).to.equal(true);
      }
    });
  });

  describe("default table", () => {
    it("should keep extended names ahead of their prefixes", () => {
      const table = getDefaultDispatchTable();

      expect(resolveRenderer(table, "tensor_adaptor_coordinate").name).to.equal("coordinate");
      expect(resolveRenderer(table, "tensor_adaptor").name).to.equal("descriptor");
      expect(resolveRenderer(table, "tile_distribution_encoding").name).to.equal(
        "tile_distribution_encoding"
      );
      expect(resolveRenderer(table, "tile_distribution").name).to.equal("tile_distribution");
      expect(resolveRenderer(table, "tile_window_with_static_lengths").name).to.equal(
        "tile_window"
      );
      expect(resolveRenderer(table, "embed").name).to.equal("fallback");
    });

    it("should build the table once", () => {
      expect(getDefaultDispatchTable()).to.equal(getDefaultDispatchTable());
    });
  });

  describe("formatDispatchTable", () => {
    it("should list entries in dispatch order with the fallback last", () => {
      const result = buildDispatchTable(
        register(register(createRegistry(), "ab", stub("r1")), "c", stub("r2")),
        fallback
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(formatDispatchTable(result.value)).to.equal(
          [
            "  1. ab  -> r1",
            "  2. c   -> r2",
            "   *  (anything else)  -> fallback",
          ].join("\n")
        );
      }
    });
  });
});
