import { readFile } from "node:fs/promises";
import path from "node:path";
import { ZoneFile } from "../lib/validation.js";
import type { Zone } from "../types.js";
import { ZoneConfigError, ZoneRegistry } from "./zoneRegistry.js";

export function parseZoneFile(raw: string, source = "zones file"): Zone[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  }
  catch {
    throw new ZoneConfigError("INVALID_ZONE_FILE", `${source} is not valid JSON`);
  }

  const parsed = ZoneFile.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new ZoneConfigError(
      "INVALID_ZONE_FILE",
      `${source} failed validation${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown error"}`
    );
  }
  return parsed.data.zones;
}

export async function loadZoneRegistry(filePath: string): Promise<ZoneRegistry> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = await readFile(resolved, "utf8");
  }
  catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ZoneConfigError("INVALID_ZONE_FILE", `zones file not found: ${resolved}`);
    }
    throw err;
  }
  return new ZoneRegistry(parseZoneFile(raw, resolved));
}
