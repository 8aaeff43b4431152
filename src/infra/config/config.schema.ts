import { z } from "zod";
import { MAX_TIMER_HOURS, MAX_TIMER_MINUTES, MAX_TIMER_SECONDS, TELEGRAM_UPDATE_KINDS } from "./config.consts";

export const telegramUpdateKindSchema = z.enum(TELEGRAM_UPDATE_KINDS);

export const userConfigSchema = z
  .object({
    runtimeDir: z.string().optional(),
    dbPath: z.string().optional(),
    drainOnStartup: z.boolean().optional(),
    telegram: z
      .object({
        token: z.string().optional(),
        allowedUpdates: z.union([z.array(telegramUpdateKindSchema), z.string()]).optional(),
        probeTimeoutSeconds: z.number().int().optional(),
      })
      .optional(),
    queue: z
      .object({
        batchSize: z.number().int().optional(),
        interMessageDelayMs: z.number().int().optional(),
        handlerTimeoutSeconds: z.number().int().optional(),
      })
      .optional(),
    connectivity: z.object({ checkIntervalMinutes: z.number().optional() }).optional(),
    retention: z
      .object({
        windowDays: z.number().int().optional(),
        sweepIntervalHours: z.number().optional(),
      })
      .optional(),
  })
  .passthrough();

export const mergedConfigSchema = z.object({
  runtimeDir: z.string().min(1),
  dbPath: z.string().min(1),
  drainOnStartup: z.boolean(),
  telegram: z.object({
    token: z.string(),
    // Unset means Telegram's own default set of update kinds.
    allowedUpdates: z.array(telegramUpdateKindSchema).optional(),
    probeTimeoutSeconds: z.number().int().positive().max(MAX_TIMER_SECONDS),
  }),
  queue: z.object({
    // getUpdates returns at most 100 updates per call.
    batchSize: z.number().int().positive().max(100),
    interMessageDelayMs: z.number().int().nonnegative().max(MAX_TIMER_SECONDS * 1000),
    handlerTimeoutSeconds: z.number().int().positive().max(MAX_TIMER_SECONDS),
  }),
  connectivity: z.object({
    checkIntervalMinutes: z.number().positive().max(MAX_TIMER_MINUTES),
  }),
  retention: z.object({
    windowDays: z.number().int().positive(),
    sweepIntervalHours: z.number().positive().max(MAX_TIMER_HOURS),
  }),
});

export type UserConfigInput = z.infer<typeof userConfigSchema>;
export type MergedConfigInput = z.infer<typeof mergedConfigSchema>;
