import type { DrainGuard } from "./drain-guard.types";

export function createDrainGuard(): DrainGuard {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    async run(task) {
      pending += 1;
      const result = tail.then(task);
      tail = result.then(
        () => undefined,
        () => undefined,
      );
      try {
        return await result;
      } finally {
        pending -= 1;
      }
    },
    isBusy() {
      return pending > 0;
    },
  };
}

export type { DrainGuard } from "./drain-guard.types";
