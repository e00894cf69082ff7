import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { config, defineConfig } from "../src/index.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("starts with debug off, escaping on and round matrix brackets", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("escape")).toBe(true);
      expect(config.get("matrix.type")).toBe("p");
    });

    it("exposes typed helpers", () => {
      expect(config.isDebugEnabled()).toBe(false);
      expect(config.escapeByDefault()).toBe(true);
      expect(config.defaultMatrixType()).toBe("p");
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("nope.deeper")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });
  });

  describe("programmatic overrides", () => {
    it("deep-merges set() values", () => {
      config.set({ matrix: { type: "b" } });
      expect(config.get("matrix.type")).toBe("b");
      expect(config.get("escape")).toBe(true);
    });

    it("reset() restores defaults", () => {
      config.set({ escape: false });
      expect(config.escapeByDefault()).toBe(false);
      config.reset();
      expect(config.escapeByDefault()).toBe(true);
    });

    it("falls back to round brackets when matrix.type is not a string", () => {
      config.set({ matrix: { type: undefined } });
      expect(config.defaultMatrixType()).toBe("p");
    });
  });

  describe("environment variables", () => {
    it("parses TEXFORGE_DEBUG=1 as true", () => {
      vi.stubEnv("TEXFORGE_DEBUG", "1");
      config.reset();
      expect(config.get("debug")).toBe(true);
      expect(config.isDebugEnabled()).toBe(true);
    });

    it("maps underscores to nested paths", () => {
      vi.stubEnv("TEXFORGE_MATRIX_TYPE", "V");
      config.reset();
      expect(config.get("matrix.type")).toBe("V");
      expect(config.getAll()).toMatchObject({ matrix: { type: "V" } });
    });

    it("parses false-ish and numeric values", () => {
      vi.stubEnv("TEXFORGE_ESCAPE", "false");
      vi.stubEnv("TEXFORGE_LEVEL", "42");
      config.reset();
      expect(config.get("escape")).toBe(false);
      expect(config.get("level")).toBe(42);
    });

    it("takes precedence over defaults but not over later set() calls", () => {
      vi.stubEnv("TEXFORGE_MATRIX_TYPE", "B");
      config.reset();
      expect(config.defaultMatrixType()).toBe("B");
      config.set({ matrix: { type: "v" } });
      expect(config.defaultMatrixType()).toBe("v");
    });
  });

  describe("config files", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "texforge-config-"));
      vi.spyOn(process, "cwd").mockReturnValue(dir);
      config.reset();
    });

    afterEach(() => {
      vi.restoreAllMocks();
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("reports no file when none is found", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(config.get("matrix.type")).toBe("p");
    });

    it("loads an rc file over the defaults", () => {
      const file = path.join(dir, ".texforgerc.json");
      fs.writeFileSync(file, JSON.stringify({ escape: false, matrix: { type: "b" } }));
      config.reset();

      expect(config.getConfigFilePath()).toBe(file);
      expect(config.escapeByDefault()).toBe(false);
      expect(config.defaultMatrixType()).toBe("b");
      expect(config.isDebugEnabled()).toBe(false);
    });

    it("reads the texforge key of package.json", () => {
      const file = path.join(dir, "package.json");
      fs.writeFileSync(file, JSON.stringify({ name: "fixture", texforge: { debug: true } }));
      config.reset();

      expect(config.getConfigFilePath()).toBe(file);
      expect(config.isDebugEnabled()).toBe(true);
    });

    it("ranks below environment variables", () => {
      fs.writeFileSync(
        path.join(dir, ".texforgerc.json"),
        JSON.stringify({ escape: false, matrix: { type: "b" } })
      );
      vi.stubEnv("TEXFORGE_MATRIX_TYPE", "V");
      config.reset();

      expect(config.defaultMatrixType()).toBe("V");
      expect(config.escapeByDefault()).toBe(false);
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = { debug: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
