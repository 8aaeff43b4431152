import { logger } from "@infra/logger/logger";
import { ConnectivityError, errorMessage } from "@core/errors";
import type { BacklogResult } from "@core/queue-processor/queue-processor.types";
import type { ConnectionState, ReconnectionManager, ReconnectionManagerDeps } from "./reconnection-manager.types";

async function runProbe(deps: ReconnectionManagerDeps): Promise<ConnectivityError | undefined> {
  try {
    const reachable = await deps.probe.probe();
    return reachable ? undefined : new ConnectivityError("probe reported the source unreachable");
  } catch (error) {
    return new ConnectivityError(`probe failed: ${errorMessage(error)}`, { cause: error });
  }
}

export function createReconnectionManager(deps: ReconnectionManagerDeps): ReconnectionManager {
  let state: ConnectionState = deps.initialState ?? "connected";
  let lastRecovery: BacklogResult | undefined;

  const transition = (next: ConnectionState) => {
    if (next === state) {
      return;
    }
    const previous = state;
    state = next;
    logger.info({ from: previous, to: next }, "[relay] Connection state changed.");
    deps.onStateChange?.(next, previous);
  };

  return {
    getState() {
      return state;
    },

    getLastRecovery() {
      return lastRecovery;
    },

    async checkConnectionAndRecover(handlers, options) {
      if (state === "recovering") {
        logger.debug("[relay] Recovery already in progress; skipping connectivity check.");
        return true;
      }

      const failure = await runProbe(deps);
      if (failure) {
        logger.warn({ error: failure.message }, "[relay] Connectivity check failed.");
        transition("disconnected");
        return false;
      }

      if (state === "connected") {
        return true;
      }

      transition("recovering");
      try {
        lastRecovery = await deps.processor.processBacklog(handlers, options);
        logger.info(lastRecovery, "[relay] Backlog recovered after reconnect.");
        transition("connected");
      } catch (error) {
        // The next successful probe retries the drain.
        logger.error({ error: errorMessage(error) }, "[relay] Backlog recovery failed.");
        transition("disconnected");
      }
      return true;
    },
  };
}

export type { ConnectionState, ReconnectionManager, ReconnectionManagerDeps } from "./reconnection-manager.types";
