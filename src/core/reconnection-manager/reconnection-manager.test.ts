import { describe, expect, it, vi } from "vitest";
import { StorageError } from "@core/errors";
import type { HandlerRegistry } from "@core/domain/update.types";
import type { BacklogResult, QueueProcessor } from "@core/queue-processor/queue-processor.types";
import { createReconnectionManager } from "./reconnection-manager";

const drained: BacklogResult = { processedCount: 3, failedCount: 1, skippedCount: 0, stopReason: "drained" };

function createProcessor(result: BacklogResult = drained) {
  const processBacklog = vi.fn<QueueProcessor["processBacklog"]>().mockResolvedValue(result);
  return { processBacklog };
}

function scriptedProbe(...answers: Array<boolean | Error>) {
  const queue = [...answers];
  return {
    probe: vi.fn(async () => {
      const next = queue.shift() ?? true;
      if (next instanceof Error) {
        throw next;
      }
      return next;
    }),
  };
}

describe("reconnection manager", () => {
  const handlers: HandlerRegistry = {};

  it("starts connected and does not drain on repeated successful probes", async () => {
    const processor = createProcessor();
    const manager = createReconnectionManager({ probe: scriptedProbe(true, true), processor });

    expect(manager.getState()).toBe("connected");
    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(true);
    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(true);

    expect(processor.processBacklog).not.toHaveBeenCalled();
    expect(manager.getState()).toBe("connected");
  });

  it("moves to disconnected when the probe fails or throws", async () => {
    const processor = createProcessor();
    const manager = createReconnectionManager({ probe: scriptedProbe(false, new Error("ECONNRESET")), processor });

    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(false);
    expect(manager.getState()).toBe("disconnected");
    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(false);
    expect(manager.getState()).toBe("disconnected");
    expect(processor.processBacklog).not.toHaveBeenCalled();
  });

  it("drains the backlog exactly once when connectivity returns", async () => {
    const processor = createProcessor();
    const states: string[] = [];
    const manager = createReconnectionManager({
      probe: scriptedProbe(false, true, true),
      processor,
      onStateChange: (next) => states.push(next),
    });

    await manager.checkConnectionAndRecover(handlers);
    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(true);
    await manager.checkConnectionAndRecover(handlers);

    expect(processor.processBacklog).toHaveBeenCalledTimes(1);
    expect(processor.processBacklog).toHaveBeenCalledWith(handlers, undefined);
    expect(states).toEqual(["disconnected", "recovering", "connected"]);
    expect(manager.getLastRecovery()).toEqual(drained);
  });

  it("returns to connected even when the drain reports failures", async () => {
    const processor = createProcessor({ processedCount: 0, failedCount: 5, skippedCount: 0, stopReason: "transient", stalledAt: 9 });
    const manager = createReconnectionManager({ probe: scriptedProbe(true), processor, initialState: "disconnected" });

    await manager.checkConnectionAndRecover(handlers);

    expect(manager.getState()).toBe("connected");
    expect(manager.getLastRecovery()?.stalledAt).toBe(9);
  });

  it("stays disconnected after a drain that throws so the next probe retries", async () => {
    const processor = createProcessor();
    processor.processBacklog.mockRejectedValueOnce(new StorageError("offset", "database is locked"));
    const manager = createReconnectionManager({ probe: scriptedProbe(true, true), processor, initialState: "disconnected" });

    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(true);
    expect(manager.getState()).toBe("disconnected");

    await manager.checkConnectionAndRecover(handlers);
    expect(processor.processBacklog).toHaveBeenCalledTimes(2);
    expect(manager.getState()).toBe("connected");
  });

  it("skips the probe while a recovery is in flight", async () => {
    let release: (result: BacklogResult) => void = () => undefined;
    const processor = {
      processBacklog: vi.fn<QueueProcessor["processBacklog"]>(
        () =>
          new Promise<BacklogResult>((resolve) => {
            release = resolve;
          }),
      ),
    };
    const probe = scriptedProbe(true, true);
    const manager = createReconnectionManager({ probe, processor, initialState: "disconnected" });

    const recovering = manager.checkConnectionAndRecover(handlers);
    await vi.waitFor(() => expect(manager.getState()).toBe("recovering"));

    await expect(manager.checkConnectionAndRecover(handlers)).resolves.toBe(true);
    expect(probe.probe).toHaveBeenCalledTimes(1);

    release(drained);
    await recovering;
    expect(manager.getState()).toBe("connected");
  });

  it("passes the abort signal through to the drain", async () => {
    const processor = createProcessor();
    const controller = new AbortController();
    const manager = createReconnectionManager({ probe: scriptedProbe(true), processor, initialState: "disconnected" });

    await manager.checkConnectionAndRecover(handlers, { signal: controller.signal });

    expect(processor.processBacklog).toHaveBeenCalledWith(handlers, { signal: controller.signal });
  });
});
