import type { ConnectivityProbe } from "@core/ports/connectivity-probe.types";
import type { TelegramProbeDeps } from "./telegram.types";

export function createTelegramConnectivityProbe(deps: TelegramProbeDeps): ConnectivityProbe {
  return {
    async probe() {
      await deps.api.getMe(AbortSignal.timeout(deps.timeoutMs));
      return true;
    },
  };
}
