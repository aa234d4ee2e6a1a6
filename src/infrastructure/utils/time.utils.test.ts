import { describe, it, expect } from "vitest";
import { archiveTimestamp, seconds } from "./time.utils.js";

describe("archiveTimestamp", () => {
  it("formats local time to the second with zero padding", () => {
    expect(archiveTimestamp(new Date(2026, 0, 5, 7, 8, 9))).toBe("20260105_070809");
  });

  it("handles end-of-year values", () => {
    expect(archiveTimestamp(new Date(2025, 11, 31, 23, 59, 58))).toBe("20251231_235958");
  });
});

describe("seconds", () => {
  it("prints whole seconds without decimals", () => {
    expect(seconds(20000)).toBe("20");
  });

  it("keeps one decimal for fractional seconds", () => {
    expect(seconds(1500)).toBe("1.5");
  });
});
