import { logger } from "../logger.js";
import type { TranscriptionProgress } from "../types.js";

const log = logger.child({ module: "progress" });

const BAR_WIDTH = 40;

export interface ProgressSink {
  write(chunk: string): unknown;
  // Streams report failed writes (EPIPE on a closed terminal) asynchronously
  on?(event: "error", listener: (error: Error) => void): unknown;
}

export function renderProgressBar(label: string, fraction: number): string {
  const pct = Math.min(100, Math.max(0, fraction * 100));
  const filled = Math.floor((BAR_WIDTH * pct) / 100);
  const bar =
    filled < BAR_WIDTH
      ? "=".repeat(filled) + ">" + " ".repeat(BAR_WIDTH - filled - 1)
      : "=".repeat(BAR_WIDTH);
  return `\r  ${label}: [${bar}] ${pct.toFixed(2).padStart(6)}%`;
}

/**
 * Renders transcription progress as a single line that is redrawn in place.
 * Rendering never fails the pipeline: sink errors are logged and dropped.
 */
export class ProgressReporter {
  private active = false;
  private broken = false;

  constructor(
    private readonly sink: ProgressSink = process.stdout,
    private readonly label = "Transcribing"
  ) {
    sink.on?.("error", (error) => this.disable(error));
  }

  report(progress: TranscriptionProgress): void {
    this.safeWrite(renderProgressBar(this.label, progress.fractionComplete));
    this.active = true;
  }

  /** Moves to the next line after the bar, if one was drawn. */
  finish(): void {
    if (!this.active) return;
    this.active = false;
    this.safeWrite("\n");
  }

  private safeWrite(text: string) {
    if (this.broken) return;
    try {
      this.sink.write(text);
    } catch (error) {
      this.disable(error);
    }
  }

  private disable(error: unknown) {
    if (!this.broken) {
      log.warn({ err: error }, "Progress rendering failed, hiding the progress bar");
    }
    this.broken = true;
  }
}
