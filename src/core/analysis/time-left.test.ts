import { describe, expect, it } from "vitest";
import { parseTimeLeft } from "./time-left";

describe("parseTimeLeft", () => {
  it.each([
    ["1h30m", 90],
    ["45m", 45],
    ["2h", 120],
    ["-", 0],
    ["Very Short", 0],
    [" 1h 5m ", 65],
    ["15", 15],
    ["soon", 0],
    ["", 0],
  ])("parses %j as %i minutes", (text, minutes) => {
    expect(parseTimeLeft(text)).toBe(minutes);
  });
});
