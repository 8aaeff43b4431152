import type { Update } from "grammy/types";
import type { UpdateKind } from "@core/domain/update.types";
import type { TelegramUpdate } from "./telegram.types";

export function telegramUpdateKind(update: Update): UpdateKind {
  if (update.message) {
    return "message";
  }
  if (update.edited_message) {
    return "edited_message";
  }
  if (update.channel_post) {
    return "channel_post";
  }
  if (update.edited_channel_post) {
    return "edited_channel_post";
  }
  if (update.callback_query) {
    return "callback_query";
  }
  if (update.inline_query) {
    return "inline_query";
  }
  if (update.chat_member) {
    return "chat_member";
  }
  if (update.my_chat_member) {
    return "my_chat_member";
  }
  return "unknown";
}

function locate(update: Update): { chatId?: number; messageId?: number } {
  const message = update.message ?? update.edited_message ?? update.channel_post ?? update.edited_channel_post;
  if (message) {
    return { chatId: message.chat.id, messageId: message.message_id };
  }
  const callbackMessage = update.callback_query?.message;
  if (callbackMessage) {
    return { chatId: callbackMessage.chat.id, messageId: callbackMessage.message_id };
  }
  const membership = update.chat_member ?? update.my_chat_member;
  if (membership) {
    return { chatId: membership.chat.id };
  }
  return {};
}

export function toSourceUpdate(update: Update): TelegramUpdate {
  return {
    id: update.update_id,
    kind: telegramUpdateKind(update),
    ...locate(update),
    payload: update,
  };
}
