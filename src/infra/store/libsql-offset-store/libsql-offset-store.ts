import { count, eq, lt } from "drizzle-orm";
import { sub } from "date-fns";
import { StorageError, errorMessage } from "@core/errors";
import type { Clock } from "@core/ports/clock.types";
import type { LedgerEntryInput } from "@core/domain/update.types";
import type { OffsetStore } from "@core/ports/offset-store.types";
import { CURSOR_ROW_ID } from "@infra/db/db.consts";
import { cursorTable, ledgerTable } from "@infra/db/db";
import type { RelayDB } from "@infra/db/db";
import { createSystemClock } from "@infra/time/system-clock/system-clock";

const STORE_NAME = "offset";

async function withStorageErrors<T>(operation: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    throw new StorageError(STORE_NAME, `${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

function ledgerInsert(db: RelayDB["db"], entry: LedgerEntryInput, processedTime: Date) {
  return db
    .insert(ledgerTable)
    .values({
      updateId: entry.updateId,
      messageId: entry.messageId ?? null,
      chatId: entry.chatId ?? null,
      processedTime,
      messageType: entry.messageType,
    })
    .onConflictDoNothing({ target: ledgerTable.updateId });
}

function cursorUpsert(db: RelayDB["db"], newId: number, processedTime: Date) {
  return db
    .insert(cursorTable)
    .values({
      id: CURSOR_ROW_ID,
      lastUpdateId: newId,
      lastProcessedTime: processedTime,
      createdAt: processedTime,
    })
    .onConflictDoUpdate({
      target: cursorTable.id,
      set: {
        lastUpdateId: newId,
        lastProcessedTime: processedTime,
      },
      setWhere: lt(cursorTable.lastUpdateId, newId),
    });
}

export function createLibsqlOffsetStore(database: RelayDB, clock: Clock = createSystemClock()): OffsetStore {
  const readCursor = async () => {
    const rows = await database.db.select().from(cursorTable).where(eq(cursorTable.id, CURSOR_ROW_ID)).limit(1);
    return rows[0];
  };

  return {
    async getLastOffset() {
      return await withStorageErrors("getLastOffset", async () => {
        const cursor = await readCursor();
        return cursor?.lastUpdateId ?? 0;
      });
    },

    async updateOffset(newId) {
      // The cursor starts at 0, so nothing at or below it is ever written.
      if (newId <= 0) {
        return;
      }
      await withStorageErrors("updateOffset", async () => {
        await cursorUpsert(database.db, newId, clock.now());
      });
    },

    async isProcessed(updateId) {
      return await withStorageErrors("isProcessed", async () => {
        const rows = await database.db
          .select({ updateId: ledgerTable.updateId })
          .from(ledgerTable)
          .where(eq(ledgerTable.updateId, updateId))
          .limit(1);
        return rows.length > 0;
      });
    },

    async markProcessed(entry) {
      await withStorageErrors("markProcessed", async () => {
        await ledgerInsert(database.db, entry, clock.now());
      });
    },

    async commitProcessed(entry) {
      await withStorageErrors("commitProcessed", async () => {
        const processedTime = clock.now();
        const insert = ledgerInsert(database.db, entry, processedTime);
        if (entry.updateId <= 0) {
          await insert;
          return;
        }
        // A batch commits atomically on the client's own connection, so its pragmas stay in effect.
        await database.db.batch([insert, cursorUpsert(database.db, entry.updateId, processedTime)]);
      });
    },

    async prune(olderThan) {
      return await withStorageErrors("prune", async () => {
        const cutoff = sub(clock.now(), olderThan);
        const result = await database.db.delete(ledgerTable).where(lt(ledgerTable.processedTime, cutoff));
        return result.rowsAffected;
      });
    },

    async stats() {
      return await withStorageErrors("stats", async () => {
        const cursor = await readCursor();
        const totals = await database.db.select({ total: count() }).from(ledgerTable);
        return {
          lastUpdateId: cursor?.lastUpdateId ?? 0,
          ...(cursor?.lastProcessedTime ? { lastProcessedTime: cursor.lastProcessedTime } : {}),
          ledgerSize: totals[0]?.total ?? 0,
        };
      });
    },
  };
}
