import type { SourceUpdate } from "../domain/update.types";

export interface MessageSource {
  /** Updates with `id >= fromId`, ascending, at most `limit` of them. */
  fetch(fromId: number, limit: number, signal?: AbortSignal): Promise<SourceUpdate[]>;
}
