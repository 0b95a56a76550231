import { describe, expect, it } from "vitest";
import type { ItemDatabase } from "../types";
import { getItemStats, median } from "./price-stats";

describe("median", () => {
  it("takes the middle value of an odd count", () => {
    expect(median([5, 1, 3])).toBe(3);
  });

  it("averages the two middle values of an even count", () => {
    expect(median([4, 1, 3, 10])).toBe(3.5);
  });

  it("rejects an empty list", () => {
    expect(() => median([])).toThrow(RangeError);
  });
});

describe("getItemStats", () => {
  const db: ItemDatabase = {
    Wool: [
      { price: 30, timestamp: "2024-01-01T10:00:00", type: "sale" },
      { price: 10, timestamp: "2024-01-02T10:00:00", type: "sale" },
      { price: 20, timestamp: "2024-01-03T10:00:00", type: "sale", quantity: 2 },
    ],
    Linen: [],
  };

  it("summarises an item's sales", () => {
    expect(getItemStats(db, "Wool")).toEqual({
      count: 3,
      min: 10,
      max: 30,
      average: 20,
      median: 20,
      lastSold: { price: 20, timestamp: "2024-01-03T10:00:00", type: "sale", quantity: 2 },
    });
  });

  it("returns null for unknown or empty items", () => {
    expect(getItemStats(db, "Silk")).toBeNull();
    expect(getItemStats(db, "Linen")).toBeNull();
  });

  it("ignores names inherited from Object.prototype", () => {
    expect(getItemStats(db, "constructor")).toBeNull();
    expect(getItemStats(db, "toString")).toBeNull();
  });
});
