import path from "node:path";
import { logger } from "./logger.js";
import type { AppConfig } from "./config.js";
import { LANGUAGES } from "./constants.js";
import { PipelineError, isPipelineError, type PipelineErrorKind } from "./errors.js";
import type {
  NormalizedAudio,
  OutputDocument,
  PipelineStage,
  ProgressListener,
  SessionState,
  TranscriptionRequest,
} from "./types.js";
import { runCommand, type CommandRunner } from "./utils/process.js";
import { RunWorkspace } from "./utils/workspace.js";
import { formatTimestamp } from "./utils/time.js";
import { MediaNormalizer } from "./pipeline/normalize.js";
import { TranscriptionEngineAdapter } from "./pipeline/transcribe.js";
import { DocumentAssembler } from "./pipeline/document.js";
import { createEngine } from "./pipeline/engines/index.js";

const log = logger.child({ module: "session" });

// Unknown errors are attributed to the stage they escaped from
const FALLBACK_KIND: Record<PipelineStage, PipelineErrorKind> = {
  normalizing: "ExtractionFailed",
  transcribing: "InferenceFailed",
  assembling: "WriteFailed",
};

export interface SessionHooks {
  onStateChange?: (state: SessionState) => void;
  onNormalized?: (audio: NormalizedAudio) => void;
  onProgress?: ProgressListener;
}

export interface SessionDeps {
  normalizer: MediaNormalizer;
  adapter: TranscriptionEngineAdapter;
  assembler: DocumentAssembler;
  workspace: RunWorkspace;
  outputDir: string;
  hooks?: SessionHooks;
}

/**
 * One transcription run: idle → normalizing → transcribing → assembling → done.
 * Any stage may end in `failed`; normalizing and transcribing may end in
 * `cancelled`. The run workspace is disposed on every terminal path.
 */
export class TranscriptionSession {
  private current: SessionState = "idle";

  constructor(
    readonly request: TranscriptionRequest,
    private readonly deps: SessionDeps
  ) {}

  get state(): SessionState {
    return this.current;
  }

  async run(signal?: AbortSignal): Promise<OutputDocument> {
    if (this.current !== "idle") {
      throw new Error(`Session already ran (state: ${this.current})`);
    }
    const { normalizer, adapter, assembler, workspace, hooks } = this.deps;
    const { inputPath, languageCode, modelName } = this.request;
    let stage: PipelineStage = "normalizing";

    try {
      this.transition("normalizing");
      const audio = await normalizer.normalize(inputPath, { workspace, signal });
      hooks?.onNormalized?.(audio);

      stage = "transcribing";
      this.transition("transcribing");
      const segments = await adapter.transcribe(
        audio,
        languageCode,
        modelName,
        (progress) => hooks?.onProgress?.(progress),
        { workspace, signal }
      );

      // Past this point the run is committed; interrupts no longer cancel it
      stage = "assembling";
      this.transition("assembling");
      const document = await assembler.assemble(segments, this.deps.outputDir, path.basename(inputPath), {
        fileName: path.basename(inputPath),
        duration: formatTimestamp(audio.durationSeconds),
        model: modelName,
        language: LANGUAGES[languageCode],
      });

      await this.cleanup();
      this.transition("done");
      return document;
    } catch (error) {
      const failure = toPipelineError(error, stage);
      await this.cleanup();
      this.transition(failure.kind === "Cancelled" ? "cancelled" : "failed");
      log.debug({ err: failure, stage }, "Session ended early");
      throw failure;
    }
  }

  private transition(next: SessionState) {
    log.debug({ from: this.current, to: next }, "Session state");
    this.current = next;
    this.deps.hooks?.onStateChange?.(next);
  }

  private async cleanup() {
    try {
      await this.deps.workspace.dispose();
    } catch (error) {
      log.error({ err: error, dir: this.deps.workspace.directory }, "Failed to remove temporary files");
    }
  }
}

function toPipelineError(error: unknown, stage: PipelineStage): PipelineError {
  if (isPipelineError(error)) {
    error.stage ??= stage;
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(FALLBACK_KIND[stage], message, { cause: error, stage });
}

export interface CreateSessionOptions {
  run?: CommandRunner;
  hooks?: SessionHooks;
  outputDir?: string;
}

/** Wires the default collaborators from configuration. */
export function createSession(
  request: TranscriptionRequest,
  cfg: AppConfig,
  options: CreateSessionOptions = {}
): TranscriptionSession {
  const run = options.run ?? runCommand;
  return new TranscriptionSession(request, {
    normalizer: new MediaNormalizer({
      run,
      ffmpegCmd: cfg.ffmpegCmd,
      ffprobeCmd: cfg.ffprobeCmd,
      extractionTimeoutMs: cfg.extractionTimeoutMs,
      compressAboveBytes: cfg.compressAboveMb * 1024 * 1024,
    }),
    adapter: new TranscriptionEngineAdapter({
      engine: createEngine(cfg, run),
      run,
      ffmpegCmd: cfg.ffmpegCmd,
      chunkSeconds: cfg.chunkSeconds,
      overlapSeconds: cfg.chunkOverlapSeconds,
    }),
    assembler: new DocumentAssembler({
      format: cfg.documentFormat,
      includeTimestamps: cfg.includeTimestamps,
    }),
    workspace: new RunWorkspace(cfg.tmpDir),
    outputDir: options.outputDir ?? cfg.outputDir,
    hooks: options.hooks,
  });
}
