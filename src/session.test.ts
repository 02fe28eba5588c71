import path from "node:path";
import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, type AppConfig } from "./config.js";
import type { NormalizedAudio, SessionState } from "./types.js";
import { createTranscriptionRequest } from "./types.js";
import { RunWorkspace } from "./utils/workspace.js";
import { ScriptedEngine, fakeRunner, makeTempDir, mediaToolsRunner, type CallHandler } from "./testUtils.js";
import { MediaNormalizer } from "./pipeline/normalize.js";
import { TranscriptionEngineAdapter } from "./pipeline/transcribe.js";
import { DocumentAssembler } from "./pipeline/document.js";
import { TranscriptionSession, createSession } from "./session.js";

let root: string;
let mediaDir: string;
let tmpDir: string;
let outputDir: string;
let modelsDir: string;
let cfg: AppConfig;

beforeEach(async () => {
  root = await makeTempDir("mt-session-");
  mediaDir = path.join(root, "media");
  tmpDir = path.join(root, "tmp");
  outputDir = path.join(root, "Downloads");
  modelsDir = path.join(root, "models");
  await Promise.all([mediaDir, tmpDir, outputDir, modelsDir].map((d) => mkdir(d, { recursive: true })));
  await writeFile(path.join(modelsDir, "ggml-tiny.bin"), "weights");
  cfg = loadConfig({ MODELS_DIR: modelsDir, TMP_DIR: tmpDir, OUTPUT_DIR: outputDir, DOCUMENT_FORMAT: "docx" });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

async function media(name: string): Promise<string> {
  const p = path.join(mediaDir, name);
  await writeFile(p, "media");
  return p;
}

// whisper.cpp stand-in writing one segment per second of audio it is given
const whisperCli: CallHandler = async (call) => {
  if (call.command !== "whisper-cli") return {};
  const prefix = call.args[call.args.indexOf("-of") + 1];
  await writeFile(
    `${prefix}.json`,
    JSON.stringify({
      transcription: [
        { offsets: { from: 0, to: 4000 }, text: " Welkom bij het college." },
        { offsets: { from: 4000, to: 9000 }, text: " Vandaag bespreken we de delta." },
      ],
    })
  );
  return {};
};

describe("TranscriptionSession", () => {
  it("turns lecture.mp4 into lecture.docx", async () => {
    const input = await media("lecture.mp4");
    const { run, calls } = mediaToolsRunner(61.5, whisperCli);
    const states: SessionState[] = [];
    const fractions: number[] = [];
    let normalized: NormalizedAudio | undefined;

    const session = createSession(createTranscriptionRequest({ inputPath: input, languageCode: "nl", modelName: "tiny" }), cfg, {
      run,
      hooks: {
        onStateChange: (s) => states.push(s),
        onNormalized: (a) => {
          normalized = a;
        },
        onProgress: (p) => fractions.push(p.fractionComplete),
      },
    });

    const doc = await session.run();

    expect(doc.path).toBe(path.join(outputDir, "lecture.docx"));
    expect(doc.segmentsRendered.map((s) => s.text)).toEqual([
      "Welkom bij het college.",
      "Vandaag bespreken we de delta.",
    ]);
    expect(normalized?.durationSeconds).toBe(61.5);
    expect(fractions[fractions.length - 1]).toBe(1);
    expect(fractions.filter((f) => f === 1)).toHaveLength(1);
    expect(states).toEqual(["normalizing", "transcribing", "assembling", "done"]);
    expect(session.state).toBe("done");
    expect(calls.map((c) => c.command)).toEqual(["ffmpeg", "ffprobe", "whisper-cli"]);
    expect(await readdir(outputDir)).toEqual(["lecture.docx"]);
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("fails on notes.txt without touching the disk", async () => {
    const input = await media("notes.txt");
    const { run, calls } = fakeRunner();
    const session = createSession(
      createTranscriptionRequest({ inputPath: input, languageCode: "nl", modelName: "tiny" }),
      cfg,
      { run }
    );

    await expect(session.run()).rejects.toMatchObject({ kind: "UnsupportedFormat", stage: "normalizing" });
    expect(session.state).toBe("failed");
    expect(calls).toHaveLength(0);
    expect(await readdir(tmpDir)).toEqual([]);
    expect(await readdir(outputDir)).toEqual([]);
  });

  it("cleans up extracted audio when the model is unknown", async () => {
    const input = await media("lecture.mp4");
    const { run, calls } = mediaToolsRunner(61.5, whisperCli);
    const session = createSession(
      createTranscriptionRequest({ inputPath: input, languageCode: "nl", modelName: "giant-v9" }),
      cfg,
      { run }
    );

    await expect(session.run()).rejects.toMatchObject({ kind: "ModelLoadFailed", stage: "transcribing" });
    expect(session.state).toBe("failed");
    expect(calls.map((c) => c.command)).toEqual(["ffmpeg", "ffprobe"]);
    expect(await readdir(tmpDir)).toEqual([]);
    expect(await readdir(outputDir)).toEqual([]);
  });

  it("cancels mid-transcription and leaves nothing behind", async () => {
    const input = await media("lecture.mp4");
    const controller = new AbortController();
    const { run } = mediaToolsRunner(61.5, async (call) => {
      controller.abort();
      return whisperCli(call);
    });
    const session = createSession(
      createTranscriptionRequest({ inputPath: input, languageCode: "nl", modelName: "tiny" }),
      cfg,
      { run }
    );

    await expect(session.run(controller.signal)).rejects.toMatchObject({ kind: "Cancelled", stage: "transcribing" });
    expect(session.state).toBe("cancelled");
    expect(await readdir(tmpDir)).toEqual([]);
    expect(await readdir(outputDir)).toEqual([]);
  });

  it("cancels before normalizing when already aborted", async () => {
    const input = await media("memo.mp3");
    const { run, calls } = fakeRunner();
    const controller = new AbortController();
    controller.abort();
    const session = createSession(
      createTranscriptionRequest({ inputPath: input, languageCode: "en", modelName: "tiny" }),
      cfg,
      { run }
    );

    await expect(session.run(controller.signal)).rejects.toMatchObject({ kind: "Cancelled", stage: "normalizing" });
    expect(session.state).toBe("cancelled");
    expect(calls).toHaveLength(0);
  });

  it("attributes unexpected errors to the stage they came from", async () => {
    class BrokenNormalizer extends MediaNormalizer {
      override async normalize(): Promise<NormalizedAudio> {
        throw new Error("disk unplugged");
      }
    }
    const { run } = fakeRunner();
    const session = new TranscriptionSession(
      createTranscriptionRequest({ inputPath: "/media/a.mp3", languageCode: "nl", modelName: "tiny" }),
      {
        normalizer: new BrokenNormalizer({
          run,
          ffmpegCmd: "ffmpeg",
          ffprobeCmd: "ffprobe",
          extractionTimeoutMs: 1000,
          compressAboveBytes: 0,
        }),
        adapter: new TranscriptionEngineAdapter({
          engine: new ScriptedEngine(() => []),
          run,
          ffmpegCmd: "ffmpeg",
          chunkSeconds: 300,
          overlapSeconds: 0,
        }),
        assembler: new DocumentAssembler({ format: "txt", includeTimestamps: true }),
        workspace: new RunWorkspace(tmpDir),
        outputDir,
      }
    );

    await expect(session.run()).rejects.toMatchObject({
      kind: "ExtractionFailed",
      message: "disk unplugged",
      stage: "normalizing",
    });
    await expect(session.run()).rejects.toThrow("Session already ran (state: failed)");
  });
});
