import { telegramUpdateKindSchema } from "./config.schema";
import type { TelegramUpdateKind } from "./config.types";

export function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseBoolean(value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return undefined;
}

/** Accepts a list or a comma separated string; unknown kinds are dropped and an empty result means unset. */
export function parseAllowedUpdates(value: string | TelegramUpdateKind[] | undefined): TelegramUpdateKind[] | undefined {
  if (!value) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value;
  }
  const kinds = value
    .split(",")
    .map((entry) => telegramUpdateKindSchema.safeParse(entry.trim()))
    .flatMap((result) => (result.success ? [result.data] : []));
  return kinds.length > 0 ? kinds : undefined;
}
