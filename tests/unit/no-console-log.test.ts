/**
 * Regression test: no console.log in src/ files
 *
 * The MCP server uses stdio transport: console.log writes to stdout,
 * which is the JSON-RPC channel. Logs go to stderr via the logger.
 */

import { describe, it, expect } from "vitest";
import { readFileSync, readdirSync, statSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";

function collectTsFiles(dir: string): string[] {
  const results: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    const stat = statSync(fullPath);
    if (stat.isDirectory()) {
      results.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith(".ts") && !entry.endsWith(".test.ts")) {
      results.push(fullPath);
    }
  }
  return results;
}

describe("no console.log in src/", () => {
  const srcDir = fileURLToPath(new URL("../../src", import.meta.url));
  const files = collectTsFiles(srcDir);

  it("should have found source files to check", () => {
    expect(files.length).toBeGreaterThan(0);
  });

  it("should not contain console.log in any src/ file", () => {
    const violations: string[] = [];

    for (const file of files) {
      const relative = file.replace(srcDir, "src");
      const lines = readFileSync(file, "utf-8").split("\n");
      for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (line.trimStart().startsWith("//") || line.trimStart().startsWith("*")) continue;
        if (line.includes("console.log")) {
          violations.push(`${relative}:${i + 1}: ${line.trim()}`);
        }
      }
    }

    expect(violations).toEqual([]);
  });
});
