import { Api } from "grammy";
import { logger } from "@infra/logger/logger";
import { assertTelegramConfigured, type RuntimeConfig } from "@infra/config/config";
import { createRelayDB } from "@infra/db/db";
import { createLibsqlOffsetStore } from "@infra/store/libsql-offset-store/libsql-offset-store";
import { createTelegramConnectivityProbe } from "@infra/telegram/telegram-probe";
import { createTelegramMessageSource } from "@infra/telegram/telegram-source";
import type { ConnectivityProbe } from "@core/ports/connectivity-probe.types";
import type { Clock } from "@core/ports/clock.types";
import type { MessageSource } from "@core/ports/message-source.types";
import type { BacklogResult } from "@core/queue-processor/queue-processor.types";
import { createQueueProcessor } from "@core/queue-processor/queue-processor";
import { createReconnectionManager } from "@core/reconnection-manager/reconnection-manager";
import { createRetentionSweeper } from "@core/retention-sweeper/retention-sweeper";
import { CONNECTIVITY_TASK, RETENTION_TASK } from "./runtime.consts";
import type { RelayComponents, RelayOverrides, RelayRuntime, RelayStore, RuntimeDependencies } from "./runtime.types";
import { createScheduler } from "./scheduler/scheduler";
import { waitForShutdownSignal } from "./shutdown/shutdown";

function resolveTelegramCollaborators(
  config: RuntimeConfig,
  overrides: RelayOverrides,
): { source: MessageSource; probe: ConnectivityProbe } {
  if (overrides.source && overrides.probe) {
    return { source: overrides.source, probe: overrides.probe };
  }

  assertTelegramConfigured(config);
  const api = new Api(config.telegram.token);
  return {
    source:
      overrides.source ??
      createTelegramMessageSource({
        api,
        ...(config.telegram.allowedUpdates ? { allowedUpdates: config.telegram.allowedUpdates } : {}),
      }),
    probe: overrides.probe ?? createTelegramConnectivityProbe({ api, timeoutMs: config.telegram.probeTimeoutMs }),
  };
}

export async function openRelayStore(config: RuntimeConfig, clock?: Clock): Promise<RelayStore> {
  const database = await createRelayDB(config.paths.dbPath);
  return { database, store: createLibsqlOffsetStore(database, clock) };
}

export async function createRelayComponents(config: RuntimeConfig, overrides: RelayOverrides = {}): Promise<RelayComponents> {
  const { source, probe } = resolveTelegramCollaborators(config, overrides);
  const { database, store } = await openRelayStore(config, overrides.clock);

  try {
    const processor = createQueueProcessor({
      store,
      source,
      options: config.queue,
      ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
    });
    const manager = createReconnectionManager({ probe, processor });
    const sweeper = createRetentionSweeper({ store, retentionWindowDays: config.retention.windowDays });
    return { database, store, processor, manager, sweeper };
  } catch (error) {
    database.client.close();
    throw error;
  }
}

export async function startRuntime(input: RuntimeDependencies): Promise<RelayRuntime> {
  const { config, handlers } = input;
  logger.info({ dbPath: config.paths.dbPath }, "[relay] Starting backlog relay runtime.");
  const components = await createRelayComponents(config, input.overrides);
  const controller = new AbortController();

  const shutdown = input.waitForShutdown === false
    ? undefined
    : waitForShutdownSignal().then((signal) => {
        logger.info({ signal }, "[relay] Shutdown signal received. Stopping runtime.");
        controller.abort();
      });

  let startupDrain: BacklogResult | undefined;
  try {
    if (config.drainOnStartup) {
      startupDrain = await components.processor.processBacklog(handlers, { signal: controller.signal });
    } else {
      logger.info("[relay] Startup drain disabled.");
    }
    if (!controller.signal.aborted) {
      await components.sweeper.sweep();
    }
  } catch (error) {
    components.database.client.close();
    throw error;
  }

  const scheduler = createScheduler([
    {
      name: CONNECTIVITY_TASK,
      intervalMs: config.connectivity.checkIntervalMs,
      run: (signal) => components.manager.checkConnectionAndRecover(handlers, { signal }),
    },
    {
      name: RETENTION_TASK,
      intervalMs: config.retention.sweepIntervalMs,
      run: () => components.sweeper.sweep(),
    },
  ]);
  if (!controller.signal.aborted) {
    scheduler.start();
  }

  let stopped = false;
  const runtime: RelayRuntime = {
    components,
    scheduler,
    ...(startupDrain ? { startupDrain } : {}),
    async stop() {
      if (stopped) {
        return;
      }
      stopped = true;
      controller.abort();
      await scheduler.stop();
      components.database.client.close();
      logger.info("[relay] Runtime stopped.");
    },
  };

  if (!shutdown) {
    return runtime;
  }

  try {
    await shutdown;
  } finally {
    await runtime.stop();
  }
  return runtime;
}

export type { RelayComponents, RelayOverrides, RelayRuntime, RelayStore, RuntimeDependencies } from "./runtime.types";
