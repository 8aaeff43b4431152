export { mergedConfigSchema, telegramUpdateKindSchema, userConfigSchema } from "./config.schema";
export type { MergedConfigInput, UserConfigInput } from "./config.schema";
export type { ReadConfigOptions, RuntimeConfig, RuntimePaths, TelegramUpdateKind } from "./config.types";
export { fromEnv, loadEnvFiles } from "./env";
export { assertTelegramConfigured, buildRuntimeConfig, readRuntimeConfig, resetRuntimeConfigCache } from "./merge";
export { defaultRuntimeDir, homeDir } from "./paths";
