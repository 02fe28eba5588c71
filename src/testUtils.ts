import os from "node:os";
import path from "node:path";
import { mkdtemp, writeFile } from "node:fs/promises";
import type { CommandRunner, RunOptions, RunResult } from "./utils/process.js";
import type { AudioChunk, ChunkRequest, EngineSegment, SpeechEngine } from "./pipeline/engines/types.js";
import type { WhisperModel } from "./constants.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

export type CallHandler = (call: RecordedCall) => Promise<Partial<RunResult>> | Partial<RunResult>;

export function fakeRunner(handler: CallHandler = () => ({})) {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args, options) => {
    const call = { command, args, options };
    calls.push(call);
    const result = await handler(call);
    return { stdout: result.stdout ?? "", stderr: result.stderr ?? "", exitCode: 0 };
  };
  return { run, calls };
}

export function probeJson(durationSeconds: number, sampleRate = 16000, codecType = "audio"): string {
  return JSON.stringify({
    streams: [{ codec_type: codecType, sample_rate: String(sampleRate) }],
    format: { duration: durationSeconds.toFixed(6) },
  });
}

/** Runner that behaves like ffmpeg (writes its output file) and ffprobe. */
export function mediaToolsRunner(durationSeconds: number, extra?: CallHandler) {
  return fakeRunner(async (call) => {
    if (call.command === "ffprobe") {
      return { stdout: probeJson(durationSeconds) };
    }
    if (call.command === "ffmpeg") {
      await writeFile(call.args[call.args.length - 1], "RIFF");
      return {};
    }
    return extra ? extra(call) : {};
  });
}

export function makeTempDir(prefix = "mt-test-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface ScriptedEngineCall {
  chunk: AudioChunk;
  request: ChunkRequest;
}

/** In-memory engine returning canned segments per chunk index. */
export class ScriptedEngine implements SpeechEngine {
  readonly name = "scripted";
  readonly loaded: WhisperModel[] = [];
  readonly calls: ScriptedEngineCall[] = [];

  constructor(
    private readonly script: (chunk: AudioChunk) => EngineSegment[] | Promise<EngineSegment[]>,
    private readonly loadError?: Error
  ) {}

  async loadModel(model: WhisperModel): Promise<void> {
    if (this.loadError) throw this.loadError;
    this.loaded.push(model);
  }

  async transcribeChunk(chunk: AudioChunk, request: ChunkRequest): Promise<EngineSegment[]> {
    this.calls.push({ chunk, request });
    return this.script(chunk);
  }
}
