import type { z } from "zod";
import type { telegramUpdateKindSchema } from "./config.schema";

export type TelegramUpdateKind = z.infer<typeof telegramUpdateKindSchema>;

export type RuntimePaths = {
  runtimeDir: string;
  dbPath: string;
};

export type RuntimeConfig = {
  paths: RuntimePaths;
  drainOnStartup: boolean;
  telegram: {
    token: string;
    allowedUpdates?: TelegramUpdateKind[];
    probeTimeoutMs: number;
  };
  queue: {
    batchSize: number;
    interMessageDelayMs: number;
    handlerTimeoutMs: number;
  };
  connectivity: {
    checkIntervalMs: number;
  };
  retention: {
    windowDays: number;
    sweepIntervalMs: number;
  };
};

export type ReadConfigOptions = {
  fresh?: boolean;
  loadEnvFiles?: boolean;
  cwd?: string;
};
