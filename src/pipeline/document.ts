import path from "node:path";
import crypto from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import {
  AlignmentType,
  Document,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import { logger } from "../logger.js";
import { PipelineError, errorMessage } from "../errors.js";
import type { DocumentFormat } from "../constants.js";
import type { OutputDocument, TranscriptSegment } from "../types.js";
import { fmtSrtTime, fmtVttTime, formatTimestamp } from "../utils/time.js";

const log = logger.child({ module: "document" });

const FONT = "Calibri";
const GREY = "808080";

export interface DocumentMetadata {
  title?: string;
  fileName?: string;
  duration?: string;
  model?: string;
  language?: string;
}

export interface AssemblerOptions {
  format: DocumentFormat;
  includeTimestamps: boolean;
  now?: () => Date;
}

export function outputFileName(baseName: string, format: DocumentFormat): string {
  return `${path.parse(baseName).name}.${format}`;
}

function formatDate(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ${pad(
    date.getHours()
  )}:${pad(date.getMinutes())}`;
}

export function toPlainText(segments: readonly TranscriptSegment[], includeTimestamps: boolean): string {
  const paragraphs = segments.map((s) =>
    includeTimestamps ? `[${formatTimestamp(s.startSeconds)}] ${s.text}` : s.text
  );
  return paragraphs.length ? `${paragraphs.join("\n\n")}\n` : "";
}

export function toSrt(segments: readonly TranscriptSegment[]): string {
  return segments
    .map(
      (s, i) =>
        `${i + 1}\n${fmtSrtTime(s.startSeconds)} --> ${fmtSrtTime(s.endSeconds)}\n${s.text}\n`
    )
    .join("\n");
}

export function toVtt(segments: readonly TranscriptSegment[]): string {
  return `WEBVTT\n\n${segments
    .map((s) => `${fmtVttTime(s.startSeconds)} --> ${fmtVttTime(s.endSeconds)}\n${s.text}\n`)
    .join("\n")}`;
}

function heading(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text, bold: true, size: 28, font: FONT })],
  });
}

function metadataRow(key: string, value: string): TableRow {
  const cell = (text: string) =>
    new TableCell({
      children: [new Paragraph({ children: [new TextRun({ text, size: 22, font: FONT })] })],
    });
  return new TableRow({ children: [cell(key), cell(value)] });
}

export function buildWordDocument(
  segments: readonly TranscriptSegment[],
  meta: DocumentMetadata,
  includeTimestamps: boolean,
  now: Date
): Document {
  const title = meta.title || "Transcript";

  const body = segments.map((s) => {
    const runs: TextRun[] = [];
    if (includeTimestamps) {
      runs.push(
        new TextRun({ text: `[${formatTimestamp(s.startSeconds)}] `, size: 18, color: GREY, font: FONT })
      );
    }
    runs.push(new TextRun({ text: s.text, size: 22, font: FONT }));
    return new Paragraph({ children: runs });
  });

  return new Document({
    title,
    creator: "media-transcriber",
    sections: [
      {
        children: [
          new Paragraph({
            alignment: AlignmentType.CENTER,
            children: [new TextRun({ text: title, bold: true, size: 48, font: FONT })],
          }),
          new Paragraph({}),
          heading("Information"),
          new Table({
            width: { size: 100, type: WidthType.PERCENTAGE },
            rows: [
              metadataRow("File", meta.fileName ?? ""),
              metadataRow("Duration", meta.duration ?? ""),
              metadataRow("Model", meta.model ?? ""),
              metadataRow("Language", meta.language ?? ""),
              metadataRow("Date", formatDate(now)),
            ],
          }),
          new Paragraph({}),
          heading("Transcript"),
          new Paragraph({}),
          ...body,
          new Paragraph({}),
          new Paragraph({
            alignment: AlignmentType.CENTER,
            children: [
              new TextRun({
                text: `Generated on ${formatDate(now)} with media-transcriber`,
                size: 16,
                color: GREY,
                font: FONT,
              }),
            ],
          }),
        ],
      },
    ],
  });
}

/**
 * Turns ordered segments into the output document. The file is written under a
 * temporary name in the destination directory and renamed into place, so a
 * partial document never shows up under the final name.
 */
export class DocumentAssembler {
  constructor(private readonly opts: AssemblerOptions) {}

  get format(): DocumentFormat {
    return this.opts.format;
  }

  async render(segments: readonly TranscriptSegment[], meta: DocumentMetadata): Promise<Buffer | string> {
    const { format, includeTimestamps } = this.opts;
    switch (format) {
      case "docx": {
        const now = this.opts.now ? this.opts.now() : new Date();
        return Packer.toBuffer(buildWordDocument(segments, meta, includeTimestamps, now));
      }
      case "txt":
        return toPlainText(segments, includeTimestamps);
      case "srt":
        return toSrt(segments);
      case "vtt":
        return toVtt(segments);
    }
  }

  async assemble(
    segments: readonly TranscriptSegment[],
    outputDirectory: string,
    baseName: string,
    meta: DocumentMetadata = {}
  ): Promise<OutputDocument> {
    const fileName = outputFileName(baseName, this.opts.format);
    const finalPath = path.join(outputDirectory, fileName);
    const tempPath = path.join(
      outputDirectory,
      `.${fileName}.${crypto.randomBytes(6).toString("hex")}.tmp`
    );

    const content = await this.render(segments, { title: path.parse(baseName).name, ...meta });

    try {
      await mkdir(outputDirectory, { recursive: true });
      await writeFile(tempPath, content);
      // Last run wins: rename replaces an existing document
      await rename(tempPath, finalPath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn({ err: cleanupError, tempPath }, "Failed to remove partial document");
      });
      throw new PipelineError("WriteFailed", `Could not write ${finalPath}: ${errorMessage(error)}`, {
        cause: error,
        hint: "check that the output directory is writable and the disk is not full",
      });
    }

    log.info({ path: finalPath, segments: segments.length }, "Document written");
    return { path: finalPath, format: this.opts.format, segmentsRendered: segments };
  }
}
