import path from "node:path";
import { readFile, readdir, rm, writeFile } from "node:fs/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import JSZip from "jszip";
import type { TranscriptSegment } from "../types.js";
import { makeTempDir } from "../testUtils.js";
import { DocumentAssembler, outputFileName, toPlainText, toSrt, toVtt } from "./document.js";

const segments: TranscriptSegment[] = [
  { startSeconds: 0, endSeconds: 2.5, text: "Hallo allemaal." },
  { startSeconds: 65, endSeconds: 70, text: "Dit is de tweede alinea." },
];

let outDir: string;

// Text of every body paragraph that carries transcript text, in document order
async function transcriptParagraphs(docxPath: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(await readFile(docxPath));
  const entry = zip.file("word/document.xml");
  if (!entry) throw new Error("word/document.xml missing");
  const xml = await entry.async("string");
  return xml
    .split("</w:p>")
    .map((p) => [...p.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g)].map((m) => m[1]).join(""))
    .filter((text) => segments.some((s) => text.includes(s.text)));
}

beforeEach(async () => {
  outDir = await makeTempDir("mt-docs-");
});

afterEach(async () => {
  await rm(outDir, { recursive: true, force: true });
});

describe("renderers", () => {
  it("writes one paragraph per segment as plain text", () => {
    expect(toPlainText(segments, true)).toBe("[00:00] Hallo allemaal.\n\n[01:05] Dit is de tweede alinea.\n");
    expect(toPlainText(segments, false)).toBe("Hallo allemaal.\n\nDit is de tweede alinea.\n");
    expect(toPlainText([], true)).toBe("");
  });

  it("writes SubRip cues", () => {
    expect(toSrt(segments)).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nHallo allemaal.\n\n" +
        "2\n00:01:05,000 --> 00:01:10,000\nDit is de tweede alinea.\n"
    );
  });

  it("writes WebVTT cues", () => {
    expect(toVtt(segments)).toBe(
      "WEBVTT\n\n00:00:00.000 --> 00:00:02.500\nHallo allemaal.\n\n" +
        "00:01:05.000 --> 00:01:10.000\nDit is de tweede alinea.\n"
    );
  });

  it("names the output after the input stem", () => {
    expect(outputFileName("lecture.mp4", "docx")).toBe("lecture.docx");
    expect(outputFileName("talk.final.m4a", "srt")).toBe("talk.final.srt");
  });
});

describe("DocumentAssembler", () => {
  it("writes a text document into the output directory", async () => {
    const assembler = new DocumentAssembler({ format: "txt", includeTimestamps: false });

    const doc = await assembler.assemble(segments, outDir, "interview.mp3");

    expect(doc).toEqual({ path: path.join(outDir, "interview.txt"), format: "txt", segmentsRendered: segments });
    expect(await readFile(doc.path, "utf-8")).toBe("Hallo allemaal.\n\nDit is de tweede alinea.\n");
    expect(await readdir(outDir)).toEqual(["interview.txt"]);
  });

  it("replaces an existing document", async () => {
    await writeFile(path.join(outDir, "interview.txt"), "old run");
    const assembler = new DocumentAssembler({ format: "txt", includeTimestamps: true });

    await assembler.assemble(segments.slice(0, 1), outDir, "interview.mp3");

    expect(await readFile(path.join(outDir, "interview.txt"), "utf-8")).toBe("[00:00] Hallo allemaal.\n");
    expect(await readdir(outDir)).toEqual(["interview.txt"]);
  });

  it("creates a missing output directory", async () => {
    const nested = path.join(outDir, "a", "b");
    const doc = await new DocumentAssembler({ format: "vtt", includeTimestamps: true }).assemble([], nested, "x.wav");
    expect(await readFile(doc.path, "utf-8")).toBe("WEBVTT\n\n");
  });

  it("produces a Word document", async () => {
    const assembler = new DocumentAssembler({
      format: "docx",
      includeTimestamps: true,
      now: () => new Date(2024, 4, 17, 9, 30),
    });

    const doc = await assembler.assemble(segments, outDir, "lecture.mp4", {
      fileName: "lecture.mp4",
      duration: "01:10",
      model: "tiny",
      language: "Nederlands",
    });

    expect(doc.path).toBe(path.join(outDir, "lecture.docx"));
    const bytes = await readFile(doc.path);
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(await transcriptParagraphs(doc.path)).toEqual([
      "[00:00] Hallo allemaal.",
      "[01:05] Dit is de tweede alinea.",
    ]);
  });

  it("leaves timestamps out of the Word document when disabled", async () => {
    const assembler = new DocumentAssembler({ format: "docx", includeTimestamps: false });

    const doc = await assembler.assemble(segments, outDir, "lecture.mp4");

    expect(await transcriptParagraphs(doc.path)).toEqual(["Hallo allemaal.", "Dit is de tweede alinea."]);
  });

  it("fails with WriteFailed when the directory cannot be created", async () => {
    const blocker = path.join(outDir, "not-a-dir");
    await writeFile(blocker, "");
    const assembler = new DocumentAssembler({ format: "srt", includeTimestamps: true });

    await expect(assembler.assemble(segments, blocker, "clip.mp3")).rejects.toMatchObject({
      kind: "WriteFailed",
    });
    expect(await readdir(outDir)).toEqual(["not-a-dir"]);
  });
});
