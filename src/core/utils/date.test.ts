import { describe, expect, it } from "vitest";
import { fileStamp, formatDuration, parseSaleTimestamp } from "./date";

describe("parseSaleTimestamp", () => {
  it("converts a 12-hour listing timestamp to ISO", () => {
    expect(parseSaleTimestamp("3/5/2024 2:07:09 PM")).toBe("2024-03-05T14:07:09");
    expect(parseSaleTimestamp("12/31/2023 11:59:59 pm")).toBe("2023-12-31T23:59:59");
  });

  it("maps 12 AM to midnight and 12 PM to noon", () => {
    expect(parseSaleTimestamp("01/02/2024 12:00:00 AM")).toBe("2024-01-02T00:00:00");
    expect(parseSaleTimestamp("01/02/2024 12:30:00 PM")).toBe("2024-01-02T12:30:00");
  });

  it("rejects other formats and impossible dates", () => {
    expect(parseSaleTimestamp("3/5/2024")).toBeNull();
    expect(parseSaleTimestamp("2024-03-05 14:07:09")).toBeNull();
    expect(parseSaleTimestamp("2/30/2024 1:00:00 PM")).toBeNull();
    expect(parseSaleTimestamp("2/10/2024 13:00:00 PM")).toBeNull();
  });
});

describe("fileStamp", () => {
  it("formats local date and time", () => {
    expect(fileStamp(new Date(2024, 2, 5, 14, 7, 9))).toBe("20240305_140709");
  });
});

describe("formatDuration", () => {
  it("formats hours, minutes and seconds", () => {
    expect(formatDuration(5445)).toBe("1h30m45s");
    expect(formatDuration(59)).toBe("59s");
    expect(formatDuration(60)).toBe("1m0s");
  });
});
