import path from "node:path";
import { existsSync, statSync } from "node:fs";
import { parseArgs } from "node:util";
import { z } from "zod";
import { logger } from "./logger.js";
import { loadConfig, type AppConfig } from "./config.js";
import {
  DEFAULT_LANGUAGE,
  DEFAULT_WHISPER_MODEL,
  DOCUMENT_FORMATS,
  LANGUAGES,
  LANGUAGE_CODES,
  MODEL_DESCRIPTIONS,
  SUPPORTED_FORMATS,
  VALID_WHISPER_MODELS,
} from "./constants.js";
import { EXIT_CODES, PipelineError, describeFailure, exitCodeFor } from "./errors.js";
import { createTranscriptionRequest } from "./types.js";
import { runCommand, type CommandRunner } from "./utils/process.js";
import { estimateProcessingTime, formatTimestamp } from "./utils/time.js";
import { ProgressReporter } from "./pipeline/progress.js";
import { createSession } from "./session.js";

const log = logger.child({ module: "cli" });

const CliArgsSchema = z.object({
  input: z.string().min(1).optional(),
  language: z.enum(LANGUAGE_CODES).default(DEFAULT_LANGUAGE),
  model: z.string().min(1).default(DEFAULT_WHISPER_MODEL),
  format: z.enum(DOCUMENT_FORMATS).optional(),
  outputDir: z.string().min(1).optional(),
  timestamps: z.boolean().default(true),
  reveal: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

function readArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      language: { type: "string", short: "l" },
      model: { type: "string", short: "m" },
      format: { type: "string", short: "f" },
      "output-dir": { type: "string", short: "o" },
      "no-timestamps": { type: "boolean" },
      reveal: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export function parseCliArgs(argv: string[]): ParseResult {
  let parsed: ReturnType<typeof readArgv>;
  try {
    parsed = readArgv(argv);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    return { ok: false, error: `Expected one input file, got ${positionals.length}` };
  }

  const result = CliArgsSchema.safeParse({
    input: positionals[0],
    language: values.language?.toLowerCase(),
    model: values.model?.toLowerCase(),
    format: values.format?.toLowerCase(),
    outputDir: values["output-dir"],
    timestamps: values["no-timestamps"] ? false : undefined,
    reveal: values.reveal,
    help: values.help,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, error: `${issue.path.join(".") || "arguments"}: ${issue.message}` };
  }
  return { ok: true, args: result.data };
}

export function usage(): string {
  const languages = LANGUAGE_CODES.map((code) => `${code} (${LANGUAGES[code]})`).join(", ");
  const models = VALID_WHISPER_MODELS.map((m) => `    ${m.padEnd(10)} ${MODEL_DESCRIPTIONS[m]}`).join("\n");
  return [
    "Usage: media-transcribe [options] <audio-or-video-file>",
    "",
    "Options:",
    `  -l, --language <code>    ${languages}. Default: ${DEFAULT_LANGUAGE}`,
    `  -m, --model <name>       Whisper model. Default: ${DEFAULT_WHISPER_MODEL}`,
    `  -f, --format <ext>       ${DOCUMENT_FORMATS.join(", ")}. Default: DOCUMENT_FORMAT or docx`,
    "  -o, --output-dir <dir>   Where the document is written. Default: OUTPUT_DIR or ~/Downloads",
    "      --no-timestamps      Leave [MM:SS] markers out of the document",
    "      --reveal             Show the result in the file browser when done",
    "  -h, --help               Show this help",
    "",
    "Models:",
    models,
    "",
    `Supported files: ${SUPPORTED_FORMATS.join(" ")}`,
  ].join("\n");
}

/** Native macOS file picker; resolves null when the user cancels or it is unavailable. */
export async function selectFileDialog(run: CommandRunner = runCommand): Promise<string | null> {
  if (process.platform !== "darwin") return null;
  const typeList = SUPPORTED_FORMATS.map((ext) => `"${ext.slice(1)}"`).join(", ");
  const script =
    `POSIX path of (choose file with prompt "Select an audio or video file" ` +
    `of type {${typeList}})`;
  try {
    const { stdout } = await run("osascript", ["-e", script], { timeoutMs: 300000 });
    const picked = stdout.trim();
    return picked && existsSync(picked) && statSync(picked).isFile() ? picked : null;
  } catch (error) {
    log.info({ err: error }, "No file selected in picker");
    return null;
  }
}

/** Opens the platform file browser at the produced document. */
export async function revealInFileBrowser(filePath: string, run: CommandRunner = runCommand): Promise<void> {
  const [command, args]: [string, string[]] =
    process.platform === "darwin"
      ? ["open", ["-R", filePath]]
      : process.platform === "win32"
        ? ["explorer", [`/select,${filePath}`]]
        : ["xdg-open", [path.dirname(filePath)]];
  try {
    await run(command, args);
  } catch (error) {
    log.warn({ err: error, filePath }, "Could not open file browser");
  }
}

export interface CliIo {
  out: NodeJS.WritableStream;
  err: NodeJS.WritableStream;
  run: CommandRunner;
  config?: AppConfig;
  signal?: AbortSignal;
}

export async function main(argv: string[], io: Partial<CliIo> = {}): Promise<number> {
  const out = io.out ?? process.stdout;
  const err = io.err ?? process.stderr;
  const run = io.run ?? runCommand;
  const print = (line = "") => out.write(`${line}\n`);

  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    err.write(`${parsed.error}\n\n${usage()}\n`);
    return EXIT_CODES.usage;
  }
  const { args } = parsed;
  if (args.help) {
    print(usage());
    return EXIT_CODES.ok;
  }

  let cfg: AppConfig;
  try {
    cfg = io.config ?? loadConfig();
  } catch (error) {
    err.write(`Invalid configuration: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_CODES.usage;
  }
  cfg = {
    ...cfg,
    documentFormat: args.format ?? cfg.documentFormat,
    includeTimestamps: args.timestamps && cfg.includeTimestamps,
    outputDir: args.outputDir ? path.resolve(args.outputDir) : cfg.outputDir,
  };

  const inputPath = args.input ?? (await selectFileDialog(run));
  if (!inputPath) {
    err.write(`No input file given.\n\n${usage()}\n`);
    return EXIT_CODES.usage;
  }

  const request = createTranscriptionRequest({
    inputPath: path.resolve(inputPath),
    languageCode: args.language,
    modelName: args.model,
  });

  print(`  File:     ${path.basename(request.inputPath)}`);
  print(`  Language: ${LANGUAGES[request.languageCode]} (${request.languageCode})`);
  print(`  Model:    ${request.modelName}`);

  const reporter = new ProgressReporter(out);
  const session = createSession(request, cfg, {
    run,
    hooks: {
      onNormalized: (audio) => {
        print(`  Duration: ${formatTimestamp(audio.durationSeconds)}`);
        print(`  Estimated processing time: ${estimateProcessingTime(audio.durationSeconds, request.modelName)}`);
        print();
      },
      onProgress: (progress) => reporter.report(progress),
      onStateChange: (state) => {
        if (state === "assembling") reporter.finish();
      },
    },
  });

  // Ctrl-C cancels the run; the session cleans up before we exit
  const controller = new AbortController();
  const abort = () => controller.abort();
  if (io.signal?.aborted) abort();
  io.signal?.addEventListener("abort", abort, { once: true });
  process.once("SIGINT", abort);

  const started = Date.now();
  try {
    const document = await session.run(controller.signal);
    print();
    print(`  Done in ${formatTimestamp((Date.now() - started) / 1000)}`);
    print(`  Output: ${document.path}`);
    if (args.reveal) {
      await revealInFileBrowser(document.path, run);
    }
    return EXIT_CODES.ok;
  } catch (error) {
    reporter.finish();
    if (error instanceof PipelineError) {
      err.write(`${describeFailure(error)}\n`);
      return exitCodeFor(error);
    }
    log.error({ err: error }, "Unexpected failure");
    err.write(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_CODES.failed;
  } finally {
    process.removeListener("SIGINT", abort);
    io.signal?.removeEventListener("abort", abort);
  }
}
