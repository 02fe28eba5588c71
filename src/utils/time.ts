import { REAL_TIME_FACTORS, isValidModel } from "../constants.js";

/** HH:MM:SS when the value reaches an hour, MM:SS otherwise. */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) {
    return `${pad2(h)}:${pad2(m)}:${pad2(s)}`;
  }
  return `${pad2(m)}:${pad2(s)}`;
}

export function fmtSrtTime(seconds: number): string {
  return fmtCueTime(seconds, ",");
}

export function fmtVttTime(seconds: number): string {
  return fmtCueTime(seconds, ".");
}

function fmtCueTime(seconds: number, separator: string): string {
  const ms = Math.max(0, Math.round(seconds * 1000));
  const h = Math.floor(ms / 3600000);
  const m = Math.floor((ms % 3600000) / 60000);
  const s = Math.floor((ms % 60000) / 1000);
  const msPart = ms % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}${separator}${pad3(msPart)}`;
}

/**
 * Rough wall-clock estimate from the model's real-time factor.
 * Unknown models are treated like `medium`.
 */
export function estimateProcessingTime(durationSeconds: number, model: string): string {
  const rtf = isValidModel(model) ? REAL_TIME_FACTORS[model] : REAL_TIME_FACTORS.medium;
  const estimated = durationSeconds * rtf;
  if (estimated < 60) {
    return `~${Math.floor(estimated)} s`;
  }
  if (estimated < 3600) {
    return `~${Math.floor(estimated / 60)} min`;
  }
  return `~${(estimated / 3600).toFixed(1)} h`;
}

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}
function pad3(n: number) {
  return n.toString().padStart(3, "0");
}
