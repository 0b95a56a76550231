/**
 * Durable item database file: validated load and atomic replace
 */

import fs from "node:fs";
import path from "node:path";
import { ConfigError, PersistError, errorMessage } from "../errors";
import type { ItemDatabase } from "../types";
import { Logger } from "../utils/logger";
import { PERSIST_RETRY_OPTIONS, withRetry } from "../utils/retry";
import { validateItemDatabase } from "../validation/database-validator";
import { type DedupStore, mergeDatabases } from "./dedup-store";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads and validates the database file. A missing file is an empty database.
 * @throws ConfigError when the file is not valid JSON or has the wrong shape
 */
export async function loadDatabase(file: string): Promise<ItemDatabase> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Item database ${file} is not valid JSON`, "dbFile", { cause: error });
  }
  try {
    return validateItemDatabase(parsed);
  } catch (error) {
    throw new ConfigError(
      `Item database ${file} is invalid: ${errorMessage(error)}`,
      "dbFile",
      { cause: error },
    );
  }
}

async function replaceFile(file: string, contents: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  const temp = path.join(
    path.dirname(file),
    `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    const handle = await fs.promises.open(temp, "w");
    try {
      await handle.writeFile(contents, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.promises.rename(temp, file);
  } catch (error) {
    await fs.promises.rm(temp, { force: true }).catch((cleanupError: unknown) => {
      Logger.warn(`Could not remove temporary file ${temp}`, {
        error: errorMessage(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Writes `contents` to `file` through a temporary sibling, fsync and rename,
 * so readers only ever see the previous or the new file.
 * @throws PersistError when the write fails; the previous file is left as it was
 */
export async function writeFileAtomic(file: string, contents: string): Promise<void> {
  try {
    await withRetry(() => replaceFile(file, contents), PERSIST_RETRY_OPTIONS);
  } catch (error) {
    throw new PersistError(`Failed to write ${file}: ${errorMessage(error)}`, file, {
      cause: error,
    });
  }
}

export async function writeDatabaseAtomic(file: string, db: ItemDatabase): Promise<void> {
  await writeFileAtomic(file, JSON.stringify(db, null, 2));
}

export interface CheckpointResult {
  items: number;
  records: number;
}

/**
 * Load-merge-save: merges the store on top of the database currently on disk
 * and atomically replaces the file. Entries the store never saw are kept.
 * @throws PersistError when the current file cannot be read or the write fails
 */
export async function checkpointDatabase(
  file: string,
  store: DedupStore,
): Promise<CheckpointResult> {
  let current: ItemDatabase;
  try {
    current = await loadDatabase(file);
  } catch (error) {
    throw new PersistError(
      `Cannot merge into ${file}: ${errorMessage(error)}`,
      file,
      { cause: error },
    );
  }

  const merged = mergeDatabases(current, store.toDatabase());
  await writeDatabaseAtomic(file, merged);

  const sales = Object.values(merged);
  const result = {
    items: sales.length,
    records: sales.reduce((sum, list) => sum + list.length, 0),
  };
  Logger.checkpointWritten(file, result.items, result.records);
  return result;
}
