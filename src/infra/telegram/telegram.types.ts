import type { Api } from "grammy";
import type { Update } from "grammy/types";
import type { SourceUpdate } from "@core/domain/update.types";

export type TelegramUpdate = SourceUpdate<Update>;

export type TelegramSourceDeps = {
  api: Pick<Api, "getUpdates">;
  /** Update kinds requested from Telegram; omitted means Telegram's default set. */
  allowedUpdates?: ReadonlyArray<Exclude<keyof Update, "update_id">>;
};

export type TelegramProbeDeps = {
  api: Pick<Api, "getMe">;
  timeoutMs: number;
};
