import { resolve } from "node:path";
import { createDefu } from "defu";
import { loadConfig } from "c12";
import { ConfigurationError, errorMessage } from "@core/errors";
import { parseTunables } from "@core/validation";
import { CONFIG_NAME, DEFAULT_DB_FILE_NAME } from "./config.consts";
import { mergedConfigSchema, type MergedConfigInput, userConfigSchema } from "./config.schema";
import type { ReadConfigOptions, RuntimeConfig } from "./config.types";
import { fromEnv, loadEnvFiles } from "./env";
import { defaultRuntimeDir } from "./paths";
import { parseAllowedUpdates } from "./validation";

type LooseInput = Record<string, unknown>;

let cachedConfig: RuntimeConfig | undefined;

// A list from a higher layer replaces the lower one instead of being concatenated.
const mergeLayers = createDefu((target, key, value) => {
  if (Array.isArray(value)) {
    target[key] = value;
    return true;
  }
  return false;
});

function defaultsInput(runtimeDir: string): MergedConfigInput {
  return {
    runtimeDir,
    dbPath: resolve(runtimeDir, DEFAULT_DB_FILE_NAME),
    drainOnStartup: true,
    telegram: {
      token: "",
      probeTimeoutSeconds: 10,
    },
    queue: {
      batchSize: 100,
      interMessageDelayMs: 100,
      handlerTimeoutSeconds: 60,
    },
    connectivity: {
      checkIntervalMinutes: 5,
    },
    retention: {
      windowDays: 7,
      sweepIntervalHours: 24,
    },
  };
}

function fromUserConfig(raw: unknown): LooseInput {
  const parsed = parseTunables(userConfigSchema, raw ?? {}, "config file");
  return {
    runtimeDir: parsed.runtimeDir?.trim() || undefined,
    dbPath: parsed.dbPath?.trim() || undefined,
    drainOnStartup: parsed.drainOnStartup,
    telegram: {
      token: parsed.telegram?.token?.trim() || undefined,
      allowedUpdates: parseAllowedUpdates(parsed.telegram?.allowedUpdates),
      probeTimeoutSeconds: parsed.telegram?.probeTimeoutSeconds,
    },
    queue: parsed.queue,
    connectivity: parsed.connectivity,
    retention: parsed.retention,
  };
}

export function buildRuntimeConfig(input: LooseInput): RuntimeConfig {
  const runtimeDir = typeof input.runtimeDir === "string" && input.runtimeDir ? input.runtimeDir : defaultRuntimeDir();
  const merged = parseTunables(mergedConfigSchema, mergeLayers(input, defaultsInput(runtimeDir)), `${CONFIG_NAME} config`);

  return {
    paths: {
      runtimeDir: merged.runtimeDir,
      dbPath: merged.dbPath,
    },
    drainOnStartup: merged.drainOnStartup,
    telegram: {
      token: merged.telegram.token,
      ...(merged.telegram.allowedUpdates ? { allowedUpdates: [...new Set(merged.telegram.allowedUpdates)] } : {}),
      probeTimeoutMs: merged.telegram.probeTimeoutSeconds * 1000,
    },
    queue: {
      batchSize: merged.queue.batchSize,
      interMessageDelayMs: merged.queue.interMessageDelayMs,
      handlerTimeoutMs: merged.queue.handlerTimeoutSeconds * 1000,
    },
    connectivity: {
      checkIntervalMs: merged.connectivity.checkIntervalMinutes * 60_000,
    },
    retention: {
      windowDays: merged.retention.windowDays,
      sweepIntervalMs: merged.retention.sweepIntervalHours * 3_600_000,
    },
  };
}

export function assertTelegramConfigured(config: RuntimeConfig): void {
  if (!config.telegram.token) {
    throw new ConfigurationError("Telegram token is missing. Set telegram.token or TELEGRAM_BOT_TOKEN.", "telegram.token");
  }
}

export function resetRuntimeConfigCache(): void {
  cachedConfig = undefined;
}

export async function readRuntimeConfig(options?: ReadConfigOptions): Promise<RuntimeConfig> {
  if (!options?.fresh && cachedConfig) {
    return cachedConfig;
  }

  const cwd = options?.cwd ?? process.cwd();
  if (options?.loadEnvFiles !== false) {
    loadEnvFiles({ override: true, cwd });
  }

  try {
    const envConfig = fromEnv();
    const loadMain = await loadConfig({ name: CONFIG_NAME, dotenv: false, defaults: {}, cwd });
    const mainConfig = fromUserConfig(loadMain.config);

    const runtimeDir = [envConfig.runtimeDir, mainConfig.runtimeDir].find(
      (value): value is string => typeof value === "string" && value.length > 0,
    ) ?? defaultRuntimeDir();
    const loadRuntimeDir = runtimeDir === resolve(cwd)
      ? { config: {} }
      : await loadConfig({ name: CONFIG_NAME, dotenv: false, defaults: {}, cwd: runtimeDir });
    const runtimeDirConfig = fromUserConfig(loadRuntimeDir.config);

    const runtime = buildRuntimeConfig(mergeLayers(envConfig, mainConfig, runtimeDirConfig, { runtimeDir }));
    cachedConfig = runtime;
    return runtime;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Failed to load ${CONFIG_NAME} config: ${errorMessage(error)}`);
  }
}
