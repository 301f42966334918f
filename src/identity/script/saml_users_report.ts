#!/usr/bin/env node
// Load envs from .env
// npm run report -- [path/to/config.ini]
import "dotenv/config";
import { flushThenExit, getLogger } from "../../util/logger";
import { EXIT_FAILURE, EXIT_OK, runCli } from "../application/cli";

const logger = getLogger("identity/script");

process.once("SIGINT", () => {
  logger.warn("Operation cancelled by user");
  // pino-pretty runs in a worker thread; exit only once it has the line
  flushThenExit(logger, EXIT_OK);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error({ err }, "Unhandled error");
    flushThenExit(logger, EXIT_FAILURE);
  });
