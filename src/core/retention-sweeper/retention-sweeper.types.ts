import type { OffsetStore } from "@core/ports/offset-store.types";

export type RetentionSweeperDeps = {
  store: Pick<OffsetStore, "prune">;
  retentionWindowDays: number;
};

export type SweepResult = { ok: true; deleted: number } | { ok: false; error: string };

export interface RetentionSweeper {
  readonly retentionWindowDays: number;
  /** One prune pass. Never rejects; failures are logged and reported in the result. */
  sweep(): Promise<SweepResult>;
}
