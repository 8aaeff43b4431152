#!/usr/bin/env tsx

import { cac } from "cac";
import { z } from "zod";
import { readRuntimeConfig } from "@infra/config/config";
import { logger } from "@infra/logger/logger";
import { errorMessage } from "@core/errors";
import { createRetentionSweeper } from "@core/retention-sweeper/retention-sweeper";
import { createLoggingHandlers } from "@runtime/handlers/logging.handler";
import { createRelayComponents, openRelayStore, startRuntime } from "@runtime/runtime";

const cli = cac("backlog-relay");

async function withCliErrors(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

cli.command("start", "Drain the backlog, then keep checking connectivity and pruning the ledger").action(async () => {
  await withCliErrors(async () => {
    const cfg = await readRuntimeConfig({ fresh: true });
    logger.info("[relay] Loaded runtime config for start command.");
    await startRuntime({ config: cfg, handlers: createLoggingHandlers() });
  });
});

cli.command("drain", "Process every queued update once and exit").action(async () => {
  await withCliErrors(async () => {
    const cfg = await readRuntimeConfig({ fresh: true });
    const components = await createRelayComponents(cfg);
    try {
      const result = await components.processor.processBacklog(createLoggingHandlers());
      const lines = [
        "Backlog drain finished:",
        `- Processed: ${result.processedCount}`,
        `- Failed: ${result.failedCount}`,
        `- Skipped: ${result.skippedCount}`,
        `- Stop reason: ${result.stopReason}${result.stalledAt !== undefined ? ` (stalled at ${result.stalledAt})` : ""}`,
      ];
      logger.info(lines.join("\n"));
    } finally {
      components.database.client.close();
    }
  });
});

cli
  .command("prune", "Delete ledger entries older than the retention window")
  .option("--days <n>", "Retention window in days (defaults to the configured value)")
  .action(async (options) => {
    await withCliErrors(async () => {
      const parsed = z
        .object({
          days: z.coerce.number().int().positive().optional(),
        })
        .parse(options);

      const cfg = await readRuntimeConfig({ fresh: true });
      const { database, store } = await openRelayStore(cfg);
      try {
        const sweeper = createRetentionSweeper({ store, retentionWindowDays: parsed.days ?? cfg.retention.windowDays });
        const result = await sweeper.sweep();
        if (!result.ok) {
          throw new Error(`Prune failed: ${result.error}`);
        }
        logger.info(`Pruned ${result.deleted} ledger entr${result.deleted === 1 ? "y" : "ies"} older than ${sweeper.retentionWindowDays} day(s).`);
      } finally {
        database.client.close();
      }
    });
  });

cli.command("status", "Show the stored cursor and ledger size").action(async () => {
  await withCliErrors(async () => {
    const cfg = await readRuntimeConfig({ fresh: true });
    const { database, store } = await openRelayStore(cfg);
    try {
      const stats = await store.stats();
      const lines = [
        "Backlog relay status",
        `- Database path: ${cfg.paths.dbPath}`,
        `- Last update id: ${stats.lastUpdateId}`,
        `- Last processed: ${stats.lastProcessedTime?.toISOString() ?? "never"}`,
        `- Ledger entries: ${stats.ledgerSize}`,
        `- Retention window: ${cfg.retention.windowDays} day(s)`,
        `- Telegram token configured: ${cfg.telegram.token ? "yes" : "no"}`,
      ];
      logger.info(lines.join("\n"));
    } finally {
      database.client.close();
    }
  });
});

cli.help();
cli.parse();
