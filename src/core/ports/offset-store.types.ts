import type { Duration } from "date-fns";
import type { CursorState, LedgerEntryInput } from "../domain/update.types";

export type OffsetStoreStats = CursorState & {
  ledgerSize: number;
};

/**
 * Durable cursor plus dedup ledger. Every mutating call runs in its own short
 * transaction and fails with `StorageError` on I/O failure.
 */
export interface OffsetStore {
  getLastOffset(): Promise<number>;
  /** No-op when `newId` is not greater than the stored cursor. */
  updateOffset(newId: number): Promise<void>;
  isProcessed(updateId: number): Promise<boolean>;
  /** No-op when the update is already in the ledger. */
  markProcessed(entry: LedgerEntryInput): Promise<void>;
  /** Ledger insert and cursor advance for the same update, as one transaction. */
  commitProcessed(entry: LedgerEntryInput): Promise<void>;
  prune(olderThan: Duration): Promise<number>;
  stats(): Promise<OffsetStoreStats>;
}
