import { setTimeout as delay } from "node:timers/promises";
import { logger } from "@infra/logger/logger";
import { errorMessage } from "@core/errors";
import { toLedgerEntry } from "@core/domain/update.utils";
import type { HandlerRegistry, SourceUpdate } from "@core/domain/update.types";
import { createDrainGuard } from "@core/drain-guard/drain-guard";
import { dispatchUpdate } from "@core/handler-dispatch/handler-dispatch";
import { parseTunables } from "@core/validation";
import { queueProcessorOptionsSchema } from "./queue-processor.schema";
import type {
  BacklogResult,
  BacklogStopReason,
  ProcessBacklogOptions,
  QueueProcessor,
  QueueProcessorDeps,
  Sleep,
} from "./queue-processor.types";

const defaultSleep: Sleep = async (ms, signal) => {
  if (ms <= 0) {
    return;
  }
  await delay(ms, undefined, signal ? { signal } : undefined);
};

type DrainCounters = Omit<BacklogResult, "stopReason" | "stalledAt">;

export function createQueueProcessor(deps: QueueProcessorDeps): QueueProcessor {
  const options = parseTunables(queueProcessorOptionsSchema, deps.options ?? {}, "queue processor options");
  const guard = deps.guard ?? createDrainGuard();
  const sleep = deps.sleep ?? defaultSleep;
  const { store, source } = deps;

  async function drain(handlers: HandlerRegistry, signal: AbortSignal | undefined): Promise<BacklogResult> {
    const counters: DrainCounters = { processedCount: 0, failedCount: 0, skippedCount: 0 };
    const finish = (stopReason: BacklogStopReason, stalledAt?: number): BacklogResult => {
      const result: BacklogResult = { ...counters, stopReason, ...(stalledAt !== undefined ? { stalledAt } : {}) };
      logger.info(result, "[relay] Backlog drain finished.");
      return result;
    };

    let cursor = await store.getLastOffset();
    logger.info({ fromId: cursor + 1, batchSize: options.batchSize }, "[relay] Starting backlog drain.");

    for (;;) {
      if (signal?.aborted) {
        return finish("aborted");
      }

      let page: SourceUpdate[];
      try {
        page = await source.fetch(cursor + 1, options.batchSize, signal);
      } catch (error) {
        if (signal?.aborted) {
          return finish("aborted");
        }
        logger.warn({ fromId: cursor + 1, error: errorMessage(error) }, "[relay] Fetching backlog page failed.");
        return finish("source-error");
      }

      const first = page[0];
      const last = page[page.length - 1];
      if (!first || !last) {
        return finish("drained");
      }
      logger.debug({ fromId: first.id, toId: last.id, size: page.length }, "[relay] Processing backlog page.");

      for (const update of page) {
        if (signal?.aborted) {
          return finish("aborted");
        }

        // Everything at or below the cursor was settled by an earlier drain.
        if (update.id <= cursor || (await store.isProcessed(update.id))) {
          logger.debug({ updateId: update.id }, "[relay] Skipping already processed update.");
          counters.skippedCount += 1;
          continue;
        }

        const handler = handlers[update.kind];
        if (!handler) {
          logger.warn({ updateId: update.id, kind: update.kind }, "[relay] No handler for update kind; marking processed.");
          await store.commitProcessed(toLedgerEntry(update));
          counters.processedCount += 1;
        } else {
          const outcome = await dispatchUpdate(handler, update, {
            timeoutMs: options.handlerTimeoutMs,
            ...(signal ? { signal } : {}),
          });

          if (outcome.status === "transient") {
            if (signal?.aborted) {
              return finish("aborted");
            }
            logger.warn(
              { updateId: update.id, kind: update.kind, reason: outcome.reason },
              "[relay] Transient handler failure; stopping drain before this update.",
            );
            return finish("transient", update.id);
          }

          await store.commitProcessed(toLedgerEntry(update));
          if (outcome.status === "permanent") {
            logger.error(
              { updateId: update.id, kind: update.kind, reason: outcome.reason },
              "[relay] Permanent handler failure; update will not be retried.",
            );
            counters.failedCount += 1;
          } else {
            counters.processedCount += 1;
          }
        }
        cursor = Math.max(cursor, update.id);

        try {
          await sleep(options.interMessageDelayMs, signal);
        } catch (error) {
          if (signal?.aborted) {
            return finish("aborted");
          }
          throw error;
        }
      }

      // A short page means the source has nothing more queued right now.
      if (page.length < options.batchSize) {
        return finish("drained");
      }
      cursor = Math.max(cursor, last.id);
    }
  }

  return {
    options,
    async processBacklog(handlers, processOptions?: ProcessBacklogOptions) {
      return await guard.run(() => drain(handlers, processOptions?.signal));
    },
  };
}

export type { BacklogResult, ProcessBacklogOptions, QueueProcessor, QueueProcessorDeps } from "./queue-processor.types";
export type { QueueProcessorOptions } from "./queue-processor.schema";
