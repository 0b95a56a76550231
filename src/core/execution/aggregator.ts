/**
 * Single consumer of worker output: merges batches into the dedup store and
 * writes checkpoints on a fixed page cadence.
 */

import { PersistError } from "../errors";
import type { ResultChannel } from "../crawl/channel";
import { checkpointDatabase } from "../storage/checkpoint";
import { DedupStore } from "../storage/dedup-store";
import { writeSnapshot } from "../storage/snapshot";
import type { PageBatch, SaleRecord, SnapshotFormat } from "../types";
import { Logger } from "../utils/logger";

/** Checkpoint after every `every` ingested pages */
export class CheckpointPolicy {
  private pages = 0;

  constructor(readonly every: number) {
    if (!Number.isInteger(every) || every < 1) {
      throw new RangeError(`checkpoint interval must be an integer >= 1 (got ${every})`);
    }
  }

  /** Counts one ingested page; true when a checkpoint is due */
  recordPage(): boolean {
    this.pages++;
    return this.pages % this.every === 0;
  }

  /** Sequence number of the checkpoint that is due, starting at 1 */
  get batchNumber(): number {
    return Math.floor(this.pages / this.every);
  }
}

export interface AggregatorOptions {
  dbPath: string;
  dataDir: string;
  checkpointEvery: number;
  snapshotFormat: SnapshotFormat;
  /** Starting store; defaults to an empty one */
  store?: DedupStore;
  now?: () => Date;
}

export interface AggregatorStats {
  pagesIngested: number;
  recordsReceived: number;
  recordsAdded: number;
  duplicates: number;
  checkpointsWritten: number;
  checkpointsFailed: number;
}

export class Aggregator {
  readonly store: DedupStore;
  private readonly policy: CheckpointPolicy;
  private readonly now: () => Date;
  private unsnapshotted: SaleRecord[] = [];
  private readonly _stats: AggregatorStats = {
    pagesIngested: 0,
    recordsReceived: 0,
    recordsAdded: 0,
    duplicates: 0,
    checkpointsWritten: 0,
    checkpointsFailed: 0,
  };

  constructor(private readonly options: AggregatorOptions) {
    this.store = options.store ?? new DedupStore();
    this.policy = new CheckpointPolicy(options.checkpointEvery);
    this.now = options.now ?? (() => new Date());
  }

  get stats(): Readonly<AggregatorStats> {
    return { ...this._stats };
  }

  /**
   * Adds every record of the batch not already stored
   * @returns Number of records that were new
   */
  ingest(batch: PageBatch): number {
    let added = 0;
    for (const record of batch.records) {
      if (this.store.add(record)) added++;
    }
    this._stats.pagesIngested++;
    this._stats.recordsReceived += batch.records.length;
    this._stats.recordsAdded += added;
    this._stats.duplicates += batch.records.length - added;
    this.unsnapshotted.push(...batch.records);
    Logger.debug(`Received data for page ${batch.pageNumber}`, {
      workerId: batch.workerId,
      page: batch.pageNumber,
      count: batch.records.length,
      added,
    });
    return added;
  }

  /**
   * Persists the store and the snapshot of records received since the last
   * successful snapshot. Persist failures are logged and reported as false;
   * the previous file stays in place and the next checkpoint retries.
   */
  async checkpoint(batchNumber: number | null): Promise<boolean> {
    try {
      await checkpointDatabase(this.options.dbPath, this.store);
      this._stats.checkpointsWritten++;
    } catch (error) {
      if (!(error instanceof PersistError)) throw error;
      this._stats.checkpointsFailed++;
      Logger.error("Checkpoint failed; keeping previous database", error, { path: error.path });
      return false;
    }

    try {
      await writeSnapshot(
        this.options.dataDir,
        this.unsnapshotted,
        this.options.snapshotFormat,
        batchNumber,
        this.now(),
      );
      this.unsnapshotted = [];
    } catch (error) {
      if (!(error instanceof PersistError)) throw error;
      Logger.error("Error saving snapshot", error, { path: error.path });
    }
    return true;
  }

  /**
   * Consumes the channel until it is closed and drained, checkpointing on the
   * policy's cadence
   */
  async drain(
    channel: ResultChannel<PageBatch>,
    onIngest?: (stats: Readonly<AggregatorStats>) => void,
  ): Promise<void> {
    for await (const batch of channel) {
      this.ingest(batch);
      onIngest?.(this.stats);
      if (this.policy.recordPage()) {
        await this.checkpoint(this.policy.batchNumber);
        Logger.info(`Completed batch of ${this.policy.every} pages`, {
          count: this.store.recordCount,
          pages: this._stats.pagesIngested,
        });
      }
    }
  }

  /** Final checkpoint after every worker has ended */
  async finalFlush(): Promise<boolean> {
    return this.checkpoint(null);
  }
}
