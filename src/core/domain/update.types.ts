export type UpdateKind =
  | "message"
  | "edited_message"
  | "channel_post"
  | "edited_channel_post"
  | "callback_query"
  | "inline_query"
  | "chat_member"
  | "my_chat_member"
  | "unknown";

export type SourceUpdate<TPayload = unknown> = {
  id: number;
  kind: UpdateKind;
  chatId?: number;
  messageId?: number;
  payload: TPayload;
};

export type HandlerOutcome =
  | { status: "success" }
  | { status: "permanent"; reason: string }
  | { status: "transient"; reason: string };

export type HandlerContext = {
  /** Fires when the handler times out or the drain is aborted. */
  signal: AbortSignal;
};

export type UpdateHandler = (update: SourceUpdate, context: HandlerContext) => Promise<HandlerOutcome>;

export type HandlerRegistry = Partial<Record<UpdateKind, UpdateHandler>>;

export type LedgerEntryInput = {
  updateId: number;
  messageId?: number;
  chatId?: number;
  messageType: string;
};

export type LedgerEntry = LedgerEntryInput & {
  processedTime: Date;
};

export type CursorState = {
  lastUpdateId: number;
  lastProcessedTime?: Date;
};
