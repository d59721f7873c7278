import pino from "pino";

import { frameSizeOf, parseCountingSessionConfig, runCountingSession } from "./jobs/counting-session.ts";
import { loadZoneSet } from "./jobs/zone-config.ts";
import { readTrackReplay } from "./sources/track-replay.ts";

const logger = pino({ name: "lanewatch-worker" });

const jobLogger = {
  info: (message: string) => logger.info(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
};

async function bootstrap() {
  const config = parseCountingSessionConfig(process.env);
  const frameSize = frameSizeOf(config);
  const zones = await loadZoneSet(config.zonesPath, frameSize);

  logger.info(
    {
      zonesPath: config.zonesPath,
      frameSize,
      maxPoints: config.maxPoints,
      proportionThreshold: config.proportionThreshold,
      maskObjects: config.maskObjects,
    },
    "Worker booted.",
  );

  if (!config.replayPath) {
    logger.info("No frame source configured. Set LANEWATCH_REPLAY_PATH to replay recorded tracks.");
    return;
  }

  const result = await runCountingSession({
    config,
    zones,
    source: readTrackReplay(config.replayPath, frameSize),
    logger: jobLogger,
  });

  logger.info({ result }, "Counting session finished.");
}

void bootstrap().catch((error) => {
  const message = error instanceof Error ? error.message : "unknown startup error";
  logger.fatal(`[worker] fatal startup error: ${message}`);
  process.exitCode = 1;
});
