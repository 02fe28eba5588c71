import { z } from "zod";
import type { CommandRunner } from "../utils/process.js";

// ffprobe -print_format json; numbers arrive as strings
const ProbeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        sample_rate: z.string().optional(),
      })
    )
    .default([]),
  format: z
    .object({
      duration: z.string().optional(),
    })
    .default({}),
});

export interface MediaProbe {
  durationSeconds: number;
  sampleRate: number | null;
  hasAudio: boolean;
}

export async function probeMedia(
  run: CommandRunner,
  ffprobeCmd: string,
  filePath: string,
  signal?: AbortSignal
): Promise<MediaProbe> {
  const { stdout } = await run(
    ffprobeCmd,
    [
      "-v",
      "quiet",
      "-print_format",
      "json",
      "-show_entries",
      "format=duration:stream=codec_type,sample_rate",
      filePath,
    ],
    { signal }
  );

  const parsed = ProbeOutputSchema.parse(JSON.parse(stdout));
  const audio = parsed.streams.find((s) => s.codec_type === "audio");
  const duration = parseFloat(parsed.format.duration ?? "");
  const sampleRate = audio?.sample_rate ? parseInt(audio.sample_rate, 10) : NaN;

  return {
    durationSeconds: Number.isFinite(duration) ? duration : 0,
    sampleRate: Number.isFinite(sampleRate) ? sampleRate : null,
    hasAudio: audio !== undefined,
  };
}
