import type { HandlerRegistry } from "@core/domain/update.types";
import type { ConnectivityProbe } from "@core/ports/connectivity-probe.types";
import type { BacklogResult, ProcessBacklogOptions, QueueProcessor } from "@core/queue-processor/queue-processor.types";

export type ConnectionState = "connected" | "disconnected" | "recovering";

export type ReconnectionManagerDeps = {
  probe: ConnectivityProbe;
  processor: Pick<QueueProcessor, "processBacklog">;
  initialState?: Exclude<ConnectionState, "recovering">;
  /** Called after every state change, including the return to `connected`. */
  onStateChange?: (next: ConnectionState, previous: ConnectionState) => void;
};

export interface ReconnectionManager {
  getState(): ConnectionState;
  /** Result of the most recent recovery drain, if one has run. */
  getLastRecovery(): BacklogResult | undefined;
  checkConnectionAndRecover(handlers: HandlerRegistry, options?: ProcessBacklogOptions): Promise<boolean>;
}
