import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const cursorTable = sqliteTable("cursor", {
  id: integer("id").primaryKey(),
  lastUpdateId: integer("last_update_id").notNull(),
  lastProcessedTime: integer("last_processed_time", { mode: "timestamp_ms" }),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const ledgerTable = sqliteTable("ledger", {
  updateId: integer("update_id").primaryKey(),
  messageId: integer("message_id"),
  chatId: integer("chat_id"),
  processedTime: integer("processed_time", { mode: "timestamp_ms" }).notNull(),
  messageType: text("message_type").notNull(),
});
