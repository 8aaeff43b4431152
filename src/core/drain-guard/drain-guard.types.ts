export interface DrainGuard {
  /** Runs `task` once every earlier task has settled. */
  run<T>(task: () => Promise<T>): Promise<T>;
  isBusy(): boolean;
}
