import { logger } from "@infra/logger/logger";
import { handlerSuccess } from "@core/domain/update.utils";
import type { HandlerRegistry, UpdateHandler, UpdateKind } from "@core/domain/update.types";

const REPLAYED_KINDS: ReadonlyArray<Exclude<UpdateKind, "unknown">> = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
  "callback_query",
  "inline_query",
  "chat_member",
  "my_chat_member",
];

export const logUpdate: UpdateHandler = async (update) => {
  logger.info(
    { updateId: update.id, kind: update.kind, chatId: update.chatId, messageId: update.messageId },
    "[relay] Replayed queued update.",
  );
  return handlerSuccess();
};

/** Registry used by the CLI: every known kind is logged and acknowledged. */
export function createLoggingHandlers(): HandlerRegistry {
  const handlers: HandlerRegistry = {};
  for (const kind of REPLAYED_KINDS) {
    handlers[kind] = logUpdate;
  }
  return handlers;
}
