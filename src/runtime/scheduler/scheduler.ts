import { logger } from "@infra/logger/logger";
import { errorMessage } from "@core/errors";
import type { ScheduledTask, Scheduler } from "./scheduler.types";

export function createScheduler(tasks: ScheduledTask[]): Scheduler {
  const controller = new AbortController();
  const timers = new Map<string, ReturnType<typeof setInterval>>();
  const inFlight = new Map<string, Promise<void>>();
  const byName = new Map(tasks.map((task) => [task.name, task]));

  const runTask = (task: ScheduledTask): Promise<void> => {
    const current = inFlight.get(task.name);
    if (current) {
      logger.debug({ task: task.name }, "[relay] Previous run still in progress; skipping tick.");
      return current;
    }
    if (controller.signal.aborted) {
      return Promise.resolve();
    }

    const run = (async () => {
      try {
        await Promise.resolve().then(() => task.run(controller.signal));
      } catch (error) {
        logger.error({ task: task.name, error: errorMessage(error) }, "[relay] Scheduled task failed.");
      } finally {
        inFlight.delete(task.name);
      }
    })();
    inFlight.set(task.name, run);
    return run;
  };

  return {
    start() {
      for (const task of tasks) {
        if (timers.has(task.name)) {
          continue;
        }
        const timer = setInterval(() => {
          void runTask(task);
        }, task.intervalMs);
        timers.set(task.name, timer);
        logger.info({ task: task.name, intervalMs: task.intervalMs }, "[relay] Scheduled periodic task.");
      }
    },

    async trigger(name) {
      const task = byName.get(name);
      if (!task) {
        throw new Error(`Unknown scheduled task: ${name}`);
      }
      await runTask(task);
    },

    async stop() {
      for (const timer of timers.values()) {
        clearInterval(timer);
      }
      timers.clear();
      controller.abort();
      await Promise.all(inFlight.values());
    },

    isRunning(name) {
      return inFlight.has(name);
    },
  };
}

export type { ScheduledTask, Scheduler } from "./scheduler.types";
