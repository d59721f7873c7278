import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { toZoneSet, zoneSetSchema } from "@lanewatch/types";

import { parseCountingSessionConfig, runCountingSession } from "../jobs/counting-session.ts";
import { readTrackReplay, type SessionFrame } from "./track-replay.ts";

const frameSize = { width: 320, height: 240 };

async function withReplay(contents: string, run: (filePath: string) => Promise<void>) {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "lanewatch-replay-"));
  const filePath = path.join(tempDir, "tracks.jsonl");

  try {
    await fs.writeFile(filePath, contents, "utf8");
    await run(filePath);
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
}

async function collect(source: AsyncIterable<SessionFrame>) {
  const frames: SessionFrame[] = [];
  for await (const frame of source) {
    frames.push(frame);
  }
  return frames;
}

test("readTrackReplay yields blank frames with their tracked objects", async () => {
  const contents = [
    JSON.stringify({ frame: 0, objects: [{ id: "car-1", points: [[70, 145], [80, 155]] }] }),
    "",
    JSON.stringify({ frame: 2, objects: [] }),
  ].join("\n");

  await withReplay(contents, async (filePath) => {
    const frames = await collect(readTrackReplay(filePath, frameSize));

    assert.deepEqual(
      frames.map((frame) => frame.index),
      [0, 2],
    );
    assert.deepEqual(frames[0].objects, [
      {
        id: "car-1",
        points: [
          { x: 70, y: 145 },
          { x: 80, y: 155 },
        ],
      },
    ]);
    assert.equal(frames[1].image.width, 320);
    assert.equal(frames[1].image.height, 240);
    assert.equal(frames[1].image.channels, 3);
  });
});

test("readTrackReplay reports the failing line", async () => {
  const contents = [JSON.stringify({ frame: 0, objects: [] }), "{ broken"].join("\n");

  await withReplay(contents, async (filePath) => {
    await assert.rejects(collect(readTrackReplay(filePath, frameSize)), (error: unknown) => {
      return error instanceof Error && error.message.startsWith(`${filePath}:2: invalid JSON (`);
    });
  });
});

test("readTrackReplay validates records and frame order", async () => {
  await withReplay(JSON.stringify({ frame: 0, objects: [{ id: "", points: [] }] }), async (filePath) => {
    await assert.rejects(
      collect(readTrackReplay(filePath, frameSize)),
      (error: unknown) =>
        error instanceof Error && error.message.startsWith(`${filePath}:1: invalid track record (objects.0.id: `),
    );
  });

  const outOfOrder = [JSON.stringify({ frame: 4, objects: [] }), JSON.stringify({ frame: 4, objects: [] })].join("\n");
  await withReplay(outOfOrder, async (filePath) => {
    await assert.rejects(
      collect(readTrackReplay(filePath, frameSize)),
      new RegExp(`:2: frame 4 does not follow frame 4$`),
    );
  });
});

test("a replayed session counts each vehicle once", async () => {
  const zones = toZoneSet(
    zoneSetSchema.parse({
      leftEntry: { start: { x: 0, y: 150 }, end: { x: 150, y: 150 } },
      leftExit: { start: { x: 0, y: 60 }, end: { x: 150, y: 60 } },
      rightEntry: { start: { x: 170, y: 60 }, end: { x: 320, y: 60 } },
      rightExit: { start: { x: 170, y: 150 }, end: { x: 320, y: 150 } },
    }),
  );
  const contents = [0, 1, 2]
    .map((index) => JSON.stringify({ frame: index, objects: [{ id: 11, points: [[200, 145 + index], [210, 153 + index]] }] }))
    .join("\n");

  await withReplay(contents, async (filePath) => {
    const result = await runCountingSession({
      config: parseCountingSessionConfig({ LANEWATCH_FRAME_WIDTH: "320", LANEWATCH_FRAME_HEIGHT: "240" }),
      zones,
      source: readTrackReplay(filePath, frameSize),
      logger: { info: () => undefined, warn: () => undefined, error: () => undefined },
    });

    assert.equal(result.frame_count, 3);
    assert.deepEqual(result.counts, { leftEntry: 0, leftExit: 0, rightEntry: 0, rightExit: 1 });
  });
});
