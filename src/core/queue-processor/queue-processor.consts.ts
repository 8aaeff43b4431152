export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_INTER_MESSAGE_DELAY_MS = 100;
export const DEFAULT_HANDLER_TIMEOUT_MS = 60_000;

// Node timers overflow above this and fire after 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
