export const CONFIG_NAME = "backlog-relay";

export const DEFAULT_DB_FILE_NAME = "backlog-relay.db";

export const TELEGRAM_UPDATE_KINDS = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
  "callback_query",
  "inline_query",
  "chat_member",
  "my_chat_member",
] as const;

// Largest values whose millisecond conversion still fits a Node timer.
export const MAX_TIMER_SECONDS = 2_147_483;
export const MAX_TIMER_MINUTES = 35_791;
export const MAX_TIMER_HOURS = 596;
