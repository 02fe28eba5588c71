import type { AppConfig } from "../../config.js";
import type { CommandRunner } from "../../utils/process.js";
import { LocalAsrEngine } from "./local.js";
import type { SpeechEngine } from "./types.js";
import { WhisperCppEngine } from "./whisperCpp.js";

export function createEngine(cfg: AppConfig, run: CommandRunner): SpeechEngine {
  switch (cfg.engine) {
    case "local":
      return new LocalAsrEngine({ baseUrl: cfg.localAsrBaseUrl, timeoutMs: cfg.localTimeoutMs });
    case "whisper-cpp":
      return new WhisperCppEngine({
        run,
        whisperCmd: cfg.whisperCmd,
        modelsDir: cfg.modelsDir,
        modelBaseUrl: cfg.modelBaseUrl,
        timeoutMs: cfg.inferenceTimeoutMs,
      });
  }
}

export type { AudioChunk, ChunkRequest, EngineSegment, SpeechEngine } from "./types.js";
