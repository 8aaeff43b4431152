export type ScheduledTask = {
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<unknown>;
};

export interface Scheduler {
  start(): void;
  /** Runs a task now unless it is already running; resolves when that run settles. */
  trigger(name: string): Promise<void>;
  /** Clears timers, aborts in-flight runs and waits for them to settle. */
  stop(): Promise<void>;
  isRunning(name: string): boolean;
}
