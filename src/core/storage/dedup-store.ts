/**
 * In-memory item history with sale identity (item name, timestamp, price)
 */

import type { ItemDatabase, SaleRecord, StoredSale } from "../types";

/** Persisted form of a sale record; quantity is kept only when it is not 1 */
export function toStoredSale(record: SaleRecord): StoredSale {
  const sale: StoredSale = { price: record.price, timestamp: record.timestamp, type: "sale" };
  if (record.quantity !== 1) sale.quantity = record.quantity;
  return sale;
}

function saleKey(sale: Pick<StoredSale, "price" | "timestamp">): string {
  return JSON.stringify([sale.timestamp, sale.price]);
}

export class DedupStore {
  private readonly histories = new Map<string, StoredSale[]>();
  private readonly keys = new Map<string, Set<string>>();
  private records = 0;

  static fromDatabase(db: ItemDatabase): DedupStore {
    const store = new DedupStore();
    for (const [itemName, sales] of Object.entries(db)) {
      for (const sale of sales) store.addStored(itemName, sale);
    }
    return store;
  }

  get itemCount(): number {
    return this.histories.size;
  }

  get recordCount(): number {
    return this.records;
  }

  /**
   * Appends `record` to its item's history
   * @returns false when a sale with the same identity is already stored
   */
  add(record: SaleRecord): boolean {
    return this.addStored(record.itemName, toStoredSale(record));
  }

  has(record: Pick<SaleRecord, "itemName" | "price" | "timestamp">): boolean {
    return this.keys.get(record.itemName)?.has(saleKey(record)) ?? false;
  }

  /** Sales of one item in arrival order */
  history(itemName: string): readonly StoredSale[] {
    return this.histories.get(itemName) ?? [];
  }

  addStored(itemName: string, sale: StoredSale): boolean {
    let keys = this.keys.get(itemName);
    let history = this.histories.get(itemName);
    if (!keys || !history) {
      keys = new Set();
      history = [];
      this.keys.set(itemName, keys);
      this.histories.set(itemName, history);
    }

    const key = saleKey(sale);
    if (keys.has(key)) return false;
    keys.add(key);
    history.push({ ...sale });
    this.records++;
    return true;
  }

  toDatabase(): ItemDatabase {
    return Object.fromEntries(
      Array.from(this.histories, ([itemName, sales]): [string, StoredSale[]] => [
        itemName,
        sales.map((sale) => ({ ...sale })),
      ]),
    );
  }
}

/**
 * Merges `extra` into `base`: every entry of `base` is kept in order and
 * sales from `extra` not already present are appended
 */
export function mergeDatabases(base: ItemDatabase, extra: ItemDatabase): ItemDatabase {
  const store = DedupStore.fromDatabase(base);
  for (const [itemName, sales] of Object.entries(extra)) {
    for (const sale of sales) store.addStored(itemName, sale);
  }
  return store.toDatabase();
}
