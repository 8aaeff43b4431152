import type { HandlerOutcome, LedgerEntryInput, SourceUpdate } from "./update.types";

export const handlerSuccess = (): HandlerOutcome => ({ status: "success" });

export const permanentFailure = (reason: string): HandlerOutcome => ({ status: "permanent", reason });

export const transientFailure = (reason: string): HandlerOutcome => ({ status: "transient", reason });

export function toLedgerEntry(update: SourceUpdate): LedgerEntryInput {
  return {
    updateId: update.id,
    messageType: update.kind,
    ...(update.messageId !== undefined ? { messageId: update.messageId } : {}),
    ...(update.chatId !== undefined ? { chatId: update.chatId } : {}),
  };
}
