#!/usr/bin/env -S node --import tsx
import { config } from "./config";
import { BoardConfigError, loadBoardConfig } from "./boardConfig";
import { createMbtaClient } from "./mbta/client";
import { createMbtaDepartureSource } from "./mbta/departureSource";
import { isRateLimited } from "./mbta/errors";
import { runBoard } from "./services/board";
import { logger, safeErrorMessage } from "./utils/logger";

const main = async () => {
  const configPath = process.argv[2] ?? config.boardConfigPath;
  const board = loadBoardConfig(configPath);
  const source = createMbtaDepartureSource(createMbtaClient());
  const output = await runBoard(source, board, new Date());
  process.stdout.write(`${output}\n`);
};

main().catch((error: unknown) => {
  if (isRateLimited(error)) {
    console.error("⚠️  MBTA API rate limit exceeded. Please wait a moment and try again.");
  } else if (error instanceof BoardConfigError) {
    logger.error(error.message);
  } else {
    logger.error("Departure board failed", { message: safeErrorMessage(error) });
  }
  process.exit(1);
});
