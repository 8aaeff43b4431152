import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { CONFIG_NAME } from "./config.consts";
import { homeDir } from "./paths";
import { parseAllowedUpdates, parseBoolean, parseNumber } from "./validation";

type LooseInput = Record<string, unknown>;

export function loadEnvFiles(options?: { override?: boolean; cwd?: string }): void {
  const override = options?.override ?? true;
  const cwd = options?.cwd ?? process.cwd();

  const candidates = [
    process.env.RELAY_ENV_PATH,
    resolve(homeDir(), ".config", CONFIG_NAME, ".env"),
    resolve(cwd, ".env"),
  ].filter((value): value is string => Boolean(value));

  for (const path of candidates) {
    loadDotenv({ path, override });
  }
}

export function fromEnv(env: NodeJS.ProcessEnv = process.env): LooseInput {
  return {
    runtimeDir: env.RELAY_RUNTIME_DIR?.trim() || undefined,
    dbPath: env.RELAY_DB_PATH?.trim() || undefined,
    drainOnStartup: parseBoolean(env.RELAY_DRAIN_ON_STARTUP),
    telegram: {
      token: env.TELEGRAM_BOT_TOKEN?.trim() || undefined,
      allowedUpdates: parseAllowedUpdates(env.RELAY_ALLOWED_UPDATES),
      probeTimeoutSeconds: parseNumber(env.RELAY_PROBE_TIMEOUT_SECONDS),
    },
    queue: {
      batchSize: parseNumber(env.RELAY_BATCH_SIZE),
      interMessageDelayMs: parseNumber(env.RELAY_INTER_MESSAGE_DELAY_MS),
      handlerTimeoutSeconds: parseNumber(env.RELAY_HANDLER_TIMEOUT_SECONDS),
    },
    connectivity: {
      checkIntervalMinutes: parseNumber(env.RELAY_CONNECTIVITY_CHECK_INTERVAL_MINUTES),
    },
    retention: {
      windowDays: parseNumber(env.RELAY_RETENTION_WINDOW_DAYS),
      sweepIntervalHours: parseNumber(env.RELAY_SWEEP_INTERVAL_HOURS),
    },
  };
}
