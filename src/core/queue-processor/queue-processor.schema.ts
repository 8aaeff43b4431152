import { z } from "zod";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_HANDLER_TIMEOUT_MS,
  DEFAULT_INTER_MESSAGE_DELAY_MS,
  MAX_TIMER_DELAY_MS,
} from "./queue-processor.consts";

export const queueProcessorOptionsSchema = z.object({
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  interMessageDelayMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(DEFAULT_INTER_MESSAGE_DELAY_MS),
  handlerTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_HANDLER_TIMEOUT_MS),
});

export type QueueProcessorOptions = z.infer<typeof queueProcessorOptionsSchema>;
