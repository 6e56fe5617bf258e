/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";
import type { TileprobeConfig, CliOptions } from "./types.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should fall back to the built-in defaults", () => {
      const result = resolveConfig({}, {});
      expect(result.render).to.deep.equal({ indent: 2, maxElements: 20, maxDepth: 8 });
      expect(result.diagram).to.deep.equal({
        direction: "BT",
        styles: true,
        title: "Tensor Transform Flow",
      });
      expect(result.verbose).to.equal(false);
      expect(result.quiet).to.equal(false);
    });

    it("should use config values as defaults", () => {
      const config: TileprobeConfig = {
        indent: 4,
        maxElements: 5,
        diagram: { direction: "LR", styles: false },
      };

      const result = resolveConfig(config, {});
      expect(result.render.indent).to.equal(4);
      expect(result.render.maxElements).to.equal(5);
      expect(result.render.maxDepth).to.equal(8);
      expect(result.diagram.direction).to.equal("LR");
      expect(result.diagram.styles).to.equal(false);
    });

    it("should override config with CLI options", () => {
      const config: TileprobeConfig = {
        indent: 4,
        diagram: { direction: "LR", title: "from file" },
      };
      const cliOptions: CliOptions = {
        indent: 3,
        direction: "TD",
        title: "from flag",
        noStyles: true,
        verbose: true,
      };

      const result = resolveConfig(config, cliOptions);
      expect(result.render.indent).to.equal(3);
      expect(result.diagram).to.deep.equal({
        direction: "TD",
        styles: false,
        title: "from flag",
      });
      expect(result.verbose).to.equal(true);
    });
  });

  describe("validateConfig", () => {
    it("should accept a complete configuration", () => {
      const result = validateConfig({
        indent: 0,
        maxElements: 3,
        maxDepth: 2,
        diagram: { direction: "RL", styles: true, title: "t" },
      });
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value).to.deep.equal({
        indent: 0,
        maxElements: 3,
        maxDepth: 2,
        diagram: { direction: "RL", styles: true, title: "t" },
      });
    });

    it("should reject a negative indent", () => {
      const result = validateConfig({ indent: -1 });
      expect(result).to.deep.equal({
        ok: false,
        error: "'indent' must be an integer >= 0",
      });
    });

    it("should reject an unknown direction", () => {
      const result = validateConfig({ diagram: { direction: "up" } });
      expect(result).to.deep.equal({
        ok: false,
        error: "'diagram.direction' must be one of BT, TD, TB, LR, RL",
      });
    });

    it("should reject a document that is not an object", () => {
      expect(validateConfig([1, 2]).ok).to.equal(false);
    });
  });

  describe("loadConfig and findConfig", () => {
    it("should find tileprobe.json in a parent directory", () => {
      const root = mkdtempSync(join(tmpdir(), "tileprobe-config-find-"));

      try {
        const nested = join(root, "a", "b");
        mkdirSync(nested, { recursive: true });
        const configPath = join(root, "tileprobe.json");
        writeFileSync(configPath, JSON.stringify({ maxDepth: 4 }), "utf-8");

        expect(findConfig(nested)).to.equal(configPath);

        const loaded = loadConfig(configPath);
        expect(loaded.ok).to.equal(true);
        if (!loaded.ok) return;
        expect(loaded.value).to.deep.equal({ maxDepth: 4 });
      } finally {
        rmSync(root, { recursive: true, force: true });
      }
    });

    it("should report a missing file as not found", () => {
      const root = mkdtempSync(join(tmpdir(), "tileprobe-config-missing-"));

      try {
        const result = loadConfig(join(root, "tileprobe.json"));
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error.code).to.equal("TP5004");
      } finally {
        rmSync(root, { recursive: true, force: true });
      }
    });

    it("should report malformed JSON and invalid fields", () => {
      const root = mkdtempSync(join(tmpdir(), "tileprobe-config-invalid-"));

      try {
        const broken = join(root, "broken.json");
        writeFileSync(broken, "{ indent: ", "utf-8");
        const brokenResult = loadConfig(broken);
        expect(brokenResult.ok).to.equal(false);
        if (brokenResult.ok) return;
        expect(brokenResult.error.code).to.equal("TP5007");
        expect(brokenResult.error.path).to.equal(broken);

        const wrong = join(root, "wrong.json");
        writeFileSync(wrong, JSON.stringify({ maxElements: "many" }), "utf-8");
        const wrongResult = loadConfig(wrong);
        expect(wrongResult.ok).to.equal(false);
        if (wrongResult.ok) return;
        expect(wrongResult.error.message).to.equal("'maxElements' must be an integer >= 1");
      } finally {
        rmSync(root, { recursive: true, force: true });
      }
    });
  });
});
