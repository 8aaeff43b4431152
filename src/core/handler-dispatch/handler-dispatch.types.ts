export type DispatchOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};
