import type { MessageSource } from "@core/ports/message-source.types";
import type { TelegramSourceDeps, TelegramUpdate } from "./telegram.types";
import { toSourceUpdate } from "./telegram.utils";

/**
 * Reads queued updates with `getUpdates` and no long-poll wait. Passing
 * `offset` confirms every earlier update to Telegram, which is only safe
 * because `fromId` is always one past the durable cursor.
 */
export function createTelegramMessageSource(deps: TelegramSourceDeps): MessageSource {
  return {
    async fetch(fromId, limit, signal): Promise<TelegramUpdate[]> {
      const updates = await deps.api.getUpdates(
        {
          offset: fromId,
          limit,
          timeout: 0,
          ...(deps.allowedUpdates ? { allowed_updates: deps.allowedUpdates } : {}),
        },
        signal,
      );
      return updates.map(toSourceUpdate);
    },
  };
}
