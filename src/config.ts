import "dotenv/config";
import path from "node:path";
import os from "node:os";
import { z } from "zod";
import { DOCUMENT_FORMATS, type DocumentFormat } from "./constants.js";

export type EngineKind = "whisper-cpp" | "local";

export interface AppConfig {
  ffmpegCmd: string;
  ffprobeCmd: string;
  engine: EngineKind;
  // whisper.cpp engine
  whisperCmd: string;
  modelsDir: string; // cache of downloaded ggml weights, keyed by model
  modelBaseUrl: string;
  inferenceTimeoutMs: number;
  // Local ASR service configuration
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localTimeoutMs: number; // timeout for local transcription requests
  // Pipeline tuning
  extractionTimeoutMs: number;
  chunkSeconds: number;
  chunkOverlapSeconds: number;
  compressAboveMb: number; // 0 disables re-encoding of large audio
  tmpDir: string;
  // Output
  outputDir: string;
  documentFormat: DocumentFormat;
  includeTimestamps: boolean;
}

const EngineSchema = z.enum(["whisper-cpp", "local"]);
const FormatSchema = z.enum(DOCUMENT_FORMATS);

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function intFromEnv(raw: string | undefined, fallback: number, min = 0): number {
  const parsed = parseInt(raw || "", 10);
  return Number.isFinite(parsed) ? Math.max(min, parsed) : fallback;
}

function boolFromEnv(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  return !["0", "false", "no", "off"].includes(raw.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const engine = EngineSchema.parse(env.ASR_ENGINE || "whisper-cpp");
  const documentFormat = FormatSchema.parse(env.DOCUMENT_FORMAT || "docx");

  const chunkSeconds = intFromEnv(env.CHUNK_SECONDS, 300);
  // Overlap must leave the window room to advance
  const chunkOverlapSeconds = Math.min(
    intFromEnv(env.CHUNK_OVERLAP_SECONDS, 0),
    Math.max(0, chunkSeconds - 1)
  );

  return {
    ffmpegCmd: env.FFMPEG_CMD || "ffmpeg",
    ffprobeCmd: env.FFPROBE_CMD || "ffprobe",
    engine,
    whisperCmd: env.WHISPER_CMD || "whisper-cli",
    modelsDir: expandHome(
      env.MODELS_DIR || path.join(os.homedir(), ".cache", "media-transcriber", "models")
    ),
    modelBaseUrl: (
      env.MODEL_BASE_URL || "https://huggingface.co/ggerganov/whisper.cpp/resolve/main"
    ).replace(/\/+$/, ""),
    inferenceTimeoutMs: intFromEnv(env.INFERENCE_TIMEOUT_MS, 7200000, 60000),
    localAsrBaseUrl: (env.LOCAL_ASR_BASE_URL || "http://localhost:5689").replace(/\/+$/, ""),
    localTimeoutMs: intFromEnv(env.LOCAL_TIMEOUT_MS, 7200000, 60000), // Default 2 hours for full file processing
    extractionTimeoutMs: intFromEnv(env.EXTRACTION_TIMEOUT_MS, 1800000, 1000),
    chunkSeconds,
    chunkOverlapSeconds,
    compressAboveMb: intFromEnv(env.COMPRESS_ABOVE_MB, 500),
    tmpDir: expandHome(env.TMP_DIR || os.tmpdir()),
    outputDir: expandHome(env.OUTPUT_DIR || path.join(os.homedir(), "Downloads")),
    documentFormat,
    includeTimestamps: boolFromEnv(env.INCLUDE_TIMESTAMPS, true),
  };
}
