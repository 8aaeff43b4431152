import { logger } from "@infra/logger/logger";
import { ConfigurationError, errorMessage } from "@core/errors";
import type { RetentionSweeper, RetentionSweeperDeps } from "./retention-sweeper.types";

export function createRetentionSweeper(deps: RetentionSweeperDeps): RetentionSweeper {
  const { retentionWindowDays, store } = deps;
  if (!Number.isInteger(retentionWindowDays) || retentionWindowDays <= 0) {
    throw new ConfigurationError(`must be a positive whole number of days, got ${retentionWindowDays}`, "retentionWindowDays");
  }

  return {
    retentionWindowDays,
    async sweep() {
      try {
        const deleted = await store.prune({ days: retentionWindowDays });
        logger.info({ deleted, retentionWindowDays }, "[relay] Pruned processed-update ledger.");
        return { ok: true, deleted };
      } catch (error) {
        const message = errorMessage(error);
        logger.error({ error: message }, "[relay] Ledger prune failed; will retry on the next sweep.");
        return { ok: false, error: message };
      }
    },
  };
}

export type { RetentionSweeper, RetentionSweeperDeps, SweepResult } from "./retention-sweeper.types";
