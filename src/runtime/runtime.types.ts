import type { HandlerRegistry } from "@core/domain/update.types";
import type { Clock } from "@core/ports/clock.types";
import type { ConnectivityProbe } from "@core/ports/connectivity-probe.types";
import type { MessageSource } from "@core/ports/message-source.types";
import type { OffsetStore } from "@core/ports/offset-store.types";
import type { BacklogResult, QueueProcessor, Sleep } from "@core/queue-processor/queue-processor.types";
import type { ReconnectionManager } from "@core/reconnection-manager/reconnection-manager.types";
import type { RetentionSweeper } from "@core/retention-sweeper/retention-sweeper.types";
import type { RuntimeConfig } from "@infra/config/config";
import type { RelayDB } from "@infra/db/db";
import type { Scheduler } from "./scheduler/scheduler.types";

/** Replacements for the Telegram-backed collaborators and timing primitives. */
export type RelayOverrides = {
  source?: MessageSource;
  probe?: ConnectivityProbe;
  clock?: Clock;
  sleep?: Sleep;
};

export type RelayStore = {
  database: RelayDB;
  store: OffsetStore;
};

export type RelayComponents = RelayStore & {
  processor: QueueProcessor;
  manager: ReconnectionManager;
  sweeper: RetentionSweeper;
};

export type RuntimeDependencies = {
  config: RuntimeConfig;
  handlers: HandlerRegistry;
  overrides?: RelayOverrides;
  waitForShutdown?: boolean;
};

export interface RelayRuntime {
  readonly components: RelayComponents;
  readonly scheduler: Scheduler;
  readonly startupDrain?: BacklogResult;
  stop(): Promise<void>;
}
