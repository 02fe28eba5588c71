import { describe, it, expect } from "vitest";
import { estimateProcessingTime, fmtSrtTime, fmtVttTime, formatTimestamp } from "./time.js";

describe("formatTimestamp", () => {
  it("uses MM:SS below an hour", () => {
    expect(formatTimestamp(0)).toBe("00:00");
    expect(formatTimestamp(65.9)).toBe("01:05");
  });

  it("adds hours once they are needed", () => {
    expect(formatTimestamp(3725)).toBe("01:02:05");
  });

  it("clamps negative values to zero", () => {
    expect(formatTimestamp(-3)).toBe("00:00");
  });
});

describe("cue times", () => {
  it("formats SRT with a comma and VTT with a dot", () => {
    expect(fmtSrtTime(2.5)).toBe("00:00:02,500");
    expect(fmtVttTime(3661.042)).toBe("01:01:01.042");
  });
});

describe("estimateProcessingTime", () => {
  it("scales by the model's real-time factor", () => {
    expect(estimateProcessingTime(30, "base")).toBe("~30 s");
    expect(estimateProcessingTime(120, "tiny")).toBe("~1 min");
    expect(estimateProcessingTime(3600, "large")).toBe("~5.0 h");
  });

  it("treats unknown models like medium", () => {
    expect(estimateProcessingTime(100, "giant-v9")).toBe("~5 min");
  });
});
