import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";

import { trackReplayRecordSchema, type FrameSize } from "@lanewatch/types";
import { createFrame, fromTrackedObjectRecord, type ImageFrame, type TrackedObject } from "@lanewatch/vision";

import { formatIssues } from "../jobs/zone-config.ts";

export type SessionFrame = {
  index: number;
  image: ImageFrame;
  objects: TrackedObject[];
};

/**
 * Replays recorded tracker output, one JSON record per line, as blank frames of the configured size.
 * Blank lines are ignored; frame numbers must increase.
 */
export async function* readTrackReplay(filePath: string, frameSize: FrameSize): AsyncGenerator<SessionFrame> {
  const input = createReadStream(filePath, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;
  let previousFrame = -1;

  try {
    for await (const line of lines) {
      lineNumber += 1;
      if (!line.trim()) {
        continue;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(line);
      } catch (error) {
        const reason = error instanceof Error ? error.message : "unknown error";
        throw new Error(`${filePath}:${lineNumber}: invalid JSON (${reason})`);
      }

      const parsed = trackReplayRecordSchema.safeParse(payload);
      if (!parsed.success) {
        throw new Error(`${filePath}:${lineNumber}: invalid track record (${formatIssues(parsed.error.issues)})`);
      }

      if (parsed.data.frame <= previousFrame) {
        throw new Error(`${filePath}:${lineNumber}: frame ${parsed.data.frame} does not follow frame ${previousFrame}`);
      }
      previousFrame = parsed.data.frame;

      yield {
        index: parsed.data.frame,
        image: createFrame(frameSize.width, frameSize.height),
        objects: parsed.data.objects.map(fromTrackedObjectRecord),
      };
    }
  } finally {
    lines.close();
    input.destroy();
  }
}
