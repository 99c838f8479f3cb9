import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..");

describe("reconcile executable", () => {
  it("runs the compiled entry point under node", () => {
    const source = readFileSync(path.join(ROOT, "src", "cli", "reconcile.ts"), "utf-8");
    expect(source.split("\n")[0]).toBe("#!/usr/bin/env node");

    const pkg = JSON.parse(readFileSync(path.join(ROOT, "package.json"), "utf-8"));
    expect(pkg.bin.reconcile).toBe("dist/src/cli/reconcile.js");
  });
});
