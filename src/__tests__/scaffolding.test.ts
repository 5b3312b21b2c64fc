import { describe, it, expect } from "vitest";
import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import { fileURLToPath } from "node:url";

const PROJECT_ROOT = resolve(fileURLToPath(import.meta.url), "..", "..", "..");

function readJson(relativePath: string): Record<string, unknown> {
  const fullPath = join(PROJECT_ROOT, relativePath);
  return JSON.parse(readFileSync(fullPath, "utf-8")) as Record<string, unknown>;
}

describe("package.json", () => {
  const pkg = readJson("package.json");

  it("should use ESM modules (type: module)", () => {
    expect(pkg.type).toBe("module");
  });

  it("should point the bin entry at the compiled CLI", () => {
    expect(pkg.bin).toEqual({ "recursive-crawler": "./dist/bin/recursive-crawler.js" });
  });

  it("should have a source file behind every export", () => {
    const exports = pkg.exports as Record<string, string>;
    for (const target of Object.values(exports)) {
      const source = target.replace(/^\.\/dist\//, "src/").replace(/\.js$/, ".ts");
      expect(existsSync(join(PROJECT_ROOT, source)), `${source} should exist`).toBe(true);
    }
  });

  it("should start the CLI entry point with a shebang", () => {
    const content = readFileSync(join(PROJECT_ROOT, "src/bin/recursive-crawler.ts"), "utf-8");
    expect(content.startsWith("#!/usr/bin/env node")).toBe(true);
  });
});

describe("tsconfig.json", () => {
  const compilerOptions = readJson("tsconfig.json").compilerOptions as Record<string, unknown>;

  it("should have strict mode enabled", () => {
    expect(compilerOptions.strict).toBe(true);
  });

  it("should output to the dist directory", () => {
    expect(compilerOptions.outDir).toBe("./dist");
  });
});
