import type { HandlerRegistry } from "@core/domain/update.types";
import type { MessageSource } from "@core/ports/message-source.types";
import type { OffsetStore } from "@core/ports/offset-store.types";
import type { DrainGuard } from "@core/drain-guard/drain-guard.types";
import type { QueueProcessorOptions } from "./queue-processor.schema";

export type BacklogStopReason = "drained" | "transient" | "aborted" | "source-error";

export type BacklogResult = {
  processedCount: number;
  failedCount: number;
  /** Updates already settled by an earlier drain. */
  skippedCount: number;
  /** Id of the update that stalled the drain, when it stopped on a transient failure. */
  stalledAt?: number;
  stopReason: BacklogStopReason;
};

export type ProcessBacklogOptions = {
  signal?: AbortSignal;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type QueueProcessorDeps = {
  store: OffsetStore;
  source: MessageSource;
  options?: Partial<QueueProcessorOptions>;
  guard?: DrainGuard;
  sleep?: Sleep;
};

export interface QueueProcessor {
  readonly options: QueueProcessorOptions;
  processBacklog(handlers: HandlerRegistry, options?: ProcessBacklogOptions): Promise<BacklogResult>;
}
