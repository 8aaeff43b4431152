import { PermanentDeliveryError, errorMessage } from "@core/errors";
import { permanentFailure, transientFailure } from "@core/domain/update.utils";
import type { HandlerOutcome, SourceUpdate, UpdateHandler } from "@core/domain/update.types";
import type { DispatchOptions } from "./handler-dispatch.types";

async function invokeHandler(handler: UpdateHandler, update: SourceUpdate, signal: AbortSignal): Promise<HandlerOutcome> {
  try {
    return await handler(update, { signal });
  } catch (error) {
    if (error instanceof PermanentDeliveryError) {
      return permanentFailure(error.message);
    }
    // TransientDeliveryError and anything unclassified are retried on the next drain.
    return transientFailure(errorMessage(error));
  }
}

/**
 * Runs one handler under a hard timeout. A timeout or an abort of the drain
 * resolves as a transient failure; the handler's own promise is left to settle
 * in the background with its signal aborted.
 */
export async function dispatchUpdate(
  handler: UpdateHandler,
  update: SourceUpdate,
  options: DispatchOptions,
): Promise<HandlerOutcome> {
  const { signal, timeoutMs } = options;
  const controller = new AbortController();
  let settle: (outcome: HandlerOutcome) => void = () => undefined;
  const interrupted = new Promise<HandlerOutcome>((resolve) => {
    settle = resolve;
  });

  const timer = setTimeout(() => {
    const reason = `handler timed out after ${timeoutMs} ms`;
    controller.abort(new Error(reason));
    settle(transientFailure(reason));
  }, timeoutMs);
  const onAbort = () => {
    controller.abort(signal?.reason);
    settle(transientFailure("drain aborted"));
  };
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    return await Promise.race([invokeHandler(handler, update, controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
