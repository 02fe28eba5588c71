import "dotenv/config";
import pino from "pino";

// stdout belongs to the progress bar, logs go to stderr
export const logger = pino(
  {
    name: "media-transcriber",
    level: process.env.LOG_LEVEL ?? "warn",
  },
  pino.destination(2)
);
