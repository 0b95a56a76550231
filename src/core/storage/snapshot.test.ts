import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { SaleRecord } from "../types";
import { pricePerUnit, renderSnapshot, snapshotFileName, writeSnapshot } from "./snapshot";

const records: SaleRecord[] = [
  { itemName: "Iron Ore", price: 1250, timestamp: "2024-03-05T14:07:09", quantity: 5 },
  { itemName: "Ring, Silver", price: 10, timestamp: "2024-03-05T15:00:00", quantity: 3, status: "Sold" },
];

describe("renderSnapshot", () => {
  it("renders the basic columns", () => {
    expect(renderSnapshot(records, "basic")).toBe(
      "name,price,datetime\r\n" +
        "Iron Ore,1250,2024-03-05T14:07:09\r\n" +
        '"Ring, Silver",10,2024-03-05T15:00:00\r\n',
    );
  });

  it("renders quantity, unit price and status in the detailed format", () => {
    expect(renderSnapshot(records, "detailed")).toBe(
      "name,quantity,price,price_per_unit,status,datetime\r\n" +
        "Iron Ore,5,1250,250,,2024-03-05T14:07:09\r\n" +
        '"Ring, Silver",3,10,3.33,Sold,2024-03-05T15:00:00\r\n',
    );
  });
});

describe("pricePerUnit", () => {
  it("rounds to two decimals", () => {
    expect(pricePerUnit({ price: 100, quantity: 3 })).toBe(33.33);
    expect(pricePerUnit({ price: 7, quantity: 1 })).toBe(7);
  });
});

describe("snapshotFileName", () => {
  it("includes the batch number and a local timestamp", () => {
    const now = new Date(2024, 2, 5, 14, 7, 9);
    expect(snapshotFileName(2, now)).toBe("history_snapshot_batch2_20240305_140709.csv");
    expect(snapshotFileName(null, now)).toBe("history_snapshot_20240305_140709.csv");
  });
});

describe("writeSnapshot", () => {
  it("writes the file into the data directory", async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "snapshot-test-"));
    try {
      const file = await writeSnapshot(dir, records.slice(0, 1), "basic", 1, new Date(2024, 0, 2, 3, 4, 5));
      expect(file).toBe(path.join(dir, "history_snapshot_batch1_20240102_030405.csv"));
      expect(await fs.promises.readFile(path.join(dir, "history_snapshot_batch1_20240102_030405.csv"), "utf8")).toBe(
        "name,price,datetime\r\nIron Ore,1250,2024-03-05T14:07:09\r\n",
      );
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  it("does nothing when snapshots are disabled", async () => {
    expect(await writeSnapshot("/nonexistent", records, "none", 1)).toBeNull();
  });
});
