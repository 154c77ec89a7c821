import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

function listTypeScriptFiles(root: string): string[] {
  const out: string[] = [];
  const stack = [root];

  while (stack.length) {
    const current = stack.pop();
    if (!current) continue;
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
        continue;
      }
      if (entry.isFile() && fullPath.endsWith(".ts")) {
        out.push(fullPath);
      }
    }
  }

  return out;
}

function readText(filePath: string): string {
  return readFileSync(filePath, "utf8");
}

describe("layering conventions", () => {
  const srcRoot = fileURLToPath(new URL("../../src", import.meta.url));

  it("keeps core services free of HTTP concerns", () => {
    const offenders = listTypeScriptFiles(path.resolve(srcRoot, "services"))
      .filter((filePath) => /from "fastify"|httpError\.js/.test(readText(filePath)));

    expect(offenders).toEqual([]);
  });

  it("routes reach vehicle state and zones only through the geofence service", () => {
    const offenders = listTypeScriptFiles(path.resolve(srcRoot, "routes"))
      .filter((filePath) => /services\/(transitionEngine|vehicleStateStore|zoneRegistry|zoneLoader)\.js/.test(readText(filePath)));

    expect(offenders).toEqual([]);
  });
});
