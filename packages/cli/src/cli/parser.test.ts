/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse print command with snapshot and value name", () => {
        const result = parseArgs(["print", "values.json", "desc"]);
        expect(result.command).to.equal("print");
        expect(result.input).to.equal("values.json");
        expect(result.name).to.equal("desc");
        expect(result.error).to.be.undefined;
      });

      it("should keep a type signature as a single positional", () => {
        const result = parseArgs(["type-print", "ck_tile::tuple<int, float>"]);
        expect(result.command).to.equal("type-print");
        expect(result.input).to.equal("ck_tile::tuple<int, float>");
      });

      it("should take '-' as a snapshot read from stdin", () => {
        const result = parseArgs(["print", "-"]);
        expect(result.input).to.equal("-");
      });

      it("should parse help command from --help and -h", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["print", "-h"]).command).to.equal("help");
      });

      it("should parse version command from --version and -v", () => {
        expect(parseArgs(["--version"]).command).to.equal("version");
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should leave the command empty when none is given", () => {
        expect(parseArgs([]).command).to.equal("");
      });

      it("should reject a third positional", () => {
        const result = parseArgs(["print", "a.json", "x", "y"]);
        expect(result.error?.code).to.equal("TP5001");
        expect(result.error?.message).to.equal("Unexpected argument 'y'");
      });
    });

    describe("Global options", () => {
      it("should parse verbose, quiet and config", () => {
        const result = parseArgs(["printers", "-V", "-q", "-c", "custom.json"]);
        expect(result.options.verbose).to.equal(true);
        expect(result.options.quiet).to.equal(true);
        expect(result.options.config).to.equal("custom.json");
      });

      it("should accept options before the command", () => {
        const result = parseArgs(["--config", "cfg.json", "print", "values.json"]);
        expect(result.command).to.equal("print");
        expect(result.input).to.equal("values.json");
        expect(result.options.config).to.equal("cfg.json");
      });

      it("should report an unknown option", () => {
        const result = parseArgs(["print", "values.json", "--colour"]);
        expect(result.error?.code).to.equal("TP5001");
        expect(result.error?.message).to.equal("Unknown option '--colour'");
      });

      it("should report an option missing its value", () => {
        const result = parseArgs(["print", "values.json", "--config"]);
        expect(result.error?.code).to.equal("TP5002");
        expect(result.options.config).to.be.undefined;
      });
    });

    describe("Render options", () => {
      it("should parse indent, max elements and max depth", () => {
        const result = parseArgs([
          "print",
          "values.json",
          "--indent",
          "4",
          "--max-elements",
          "10",
          "--max-depth",
          "3",
        ]);
        expect(result.options.indent).to.equal(4);
        expect(result.options.maxElements).to.equal(10);
        expect(result.options.maxDepth).to.equal(3);
        expect(result.error).to.be.undefined;
      });

      it("should accept an indent of zero", () => {
        expect(parseArgs(["print", "v.json", "--indent", "0"]).options.indent).to.equal(0);
      });

      it("should reject a count that is not a whole number", () => {
        const result = parseArgs(["print", "values.json", "--max-elements", "2.5"]);
        expect(result.error?.code).to.equal("TP5003");
        expect(result.error?.message).to.equal(
          "Invalid value '2.5' for '--max-elements': expected an integer >= 1"
        );
      });

      it("should reject a max depth of zero", () => {
        const result = parseArgs(["print", "values.json", "--max-depth", "0"]);
        expect(result.error?.code).to.equal("TP5003");
        expect(result.options.maxDepth).to.be.undefined;
      });
    });

    describe("Mermaid options", () => {
      it("should parse direction case-insensitively", () => {
        const result = parseArgs(["mermaid", "values.json", "-d", "lr"]);
        expect(result.options.direction).to.equal("LR");
      });

      it("should reject an unknown direction", () => {
        const result = parseArgs(["mermaid", "values.json", "--direction", "up"]);
        expect(result.error?.code).to.equal("TP5003");
        expect(result.error?.message).to.equal(
          "Invalid value 'up' for '--direction': expected one of BT, TD, TB, LR, RL"
        );
      });

      it("should parse title, no-styles and type", () => {
        const result = parseArgs([
          "mermaid",
          "--type",
          "ck_tile::tensor_adaptor<int>",
          "--title",
          "flow",
          "--no-styles",
        ]);
        expect(result.input).to.be.undefined;
        expect(result.options.type).to.equal("ck_tile::tensor_adaptor<int>");
        expect(result.options.title).to.equal("flow");
        expect(result.options.noStyles).to.equal(true);
      });
    });
  });
});
