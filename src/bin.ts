#!/usr/bin/env node
import { main } from "./cli.js";
import { logger } from "./logger.js";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, "media-transcribe crashed");
    process.exitCode = 1;
  });
