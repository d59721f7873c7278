import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { ZoneConfigurationError } from "@lanewatch/vision";

import { loadZoneSet, parseZoneSet } from "./zone-config.ts";

const frameSize = { width: 1280, height: 720 };

const geometry = {
  leftEntry: { start: { x: 0, y: 650 }, end: { x: 1130, y: 650 } },
  leftExit: { start: { x: 0, y: 170 }, end: { x: 630, y: 170 } },
  rightEntry: { start: { x: 800, y: 260 }, end: { x: 1260, y: 260 } },
  rightExit: { start: { x: 1000, y: 500 }, end: { x: 1280, y: 500 }, bandHalfWidth: 2 },
};

test("parseZoneSet labels zones and keeps configured bands", () => {
  const zones = parseZoneSet(geometry, frameSize);

  assert.equal(zones.leftExit.id, "leftExit");
  assert.equal(zones.leftExit.direction, "exit");
  assert.equal(zones.leftExit.bandHalfWidth, 1);
  assert.equal(zones.rightExit.bandHalfWidth, 2);
});

test("parseZoneSet reports schema issues with their paths", () => {
  const broken = { ...geometry, rightEntry: { start: { x: "800", y: 260 }, end: { x: 1260, y: 260 } } };

  assert.throws(() => parseZoneSet(broken, frameSize), /^Error: Invalid zone configuration: rightEntry\.start\.x: /);
});

test("parseZoneSet rejects geometry outside the frame", () => {
  const wide = { ...geometry, rightExit: { start: { x: 1000, y: 500 }, end: { x: 19000, y: 500 } } };

  assert.throws(() => parseZoneSet(wide, frameSize), ZoneConfigurationError);
});

test("loadZoneSet reads the bundled zone file", async () => {
  const zonesPath = path.resolve(__dirname, "../../../../config/zones.json");
  const zones = await loadZoneSet(zonesPath, frameSize);

  assert.deepEqual(zones.leftEntry.start, { x: 0, y: 650 });
  assert.deepEqual(zones.rightExit.end, { x: 1280, y: 500 });
});

test("loadZoneSet names the file when JSON is malformed", async () => {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "lanewatch-zones-"));
  const filePath = path.join(tempDir, "zones.json");

  try {
    await fs.writeFile(filePath, "{ not json", "utf8");
    await assert.rejects(loadZoneSet(filePath, frameSize), (error: unknown) => {
      return error instanceof Error && error.message.startsWith(`Unable to parse ${filePath} (`);
    });
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});
