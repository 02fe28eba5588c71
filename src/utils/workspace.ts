import path from "node:path";
import os from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { logger } from "../logger.js";

const log = logger.child({ module: "workspace" });

/**
 * Temporary directory owned by exactly one pipeline run.
 *
 * Nothing touches the disk until the first `file()` call, so a run that fails
 * validation leaves no trace. `dispose()` removes everything the run created.
 */
export class RunWorkspace {
  private dir: string | null = null;
  private creating: Promise<string> | null = null;

  constructor(
    private readonly parentDir: string = os.tmpdir(),
    private readonly prefix = "media-transcriber-"
  ) {}

  get created(): boolean {
    return this.dir !== null;
  }

  get directory(): string | null {
    return this.dir;
  }

  async file(name: string): Promise<string> {
    const dir = await this.ensure();
    return path.join(dir, path.basename(name));
  }

  async remove(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      log.warn({ err: error, filePath }, "Failed to remove temporary file");
    }
  }

  async dispose(): Promise<void> {
    if (this.creating) {
      try {
        await this.creating;
      } catch (error) {
        log.debug({ err: error }, "Run workspace was never created");
      }
    }
    const dir = this.dir;
    if (!dir) return;
    this.dir = null;
    this.creating = null;
    await rm(dir, { recursive: true, force: true });
    log.debug({ dir }, "Removed run workspace");
  }

  private ensure(): Promise<string> {
    if (!this.creating) {
      this.creating = mkdtemp(path.join(this.parentDir, this.prefix)).then((dir) => {
        this.dir = dir;
        log.debug({ dir }, "Created run workspace");
        return dir;
      });
    }
    return this.creating;
  }
}
