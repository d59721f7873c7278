import { promises as fs } from "node:fs";

import { toZoneSet, zoneSetSchema, type FrameSize, type ZoneSet } from "@lanewatch/types";
import { validateZoneSet } from "@lanewatch/vision";

export function formatIssues(issues: Array<{ path: PropertyKey[]; message: string }>) {
  return issues
    .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseZoneSet(payload: unknown, frameSize: FrameSize | null, source = "zone configuration"): ZoneSet {
  const parsed = zoneSetSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Invalid ${source}: ${formatIssues(parsed.error.issues)}`);
  }

  const zones = toZoneSet(parsed.data);
  validateZoneSet(zones, frameSize);
  return zones;
}

export async function loadZoneSet(filePath: string, frameSize: FrameSize | null): Promise<ZoneSet> {
  const raw = await fs.readFile(filePath, "utf8");

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown error";
    throw new Error(`Unable to parse ${filePath} (${reason})`);
  }

  return parseZoneSet(payload, frameSize, filePath);
}
