export type ShutdownSignal = "SIGINT" | "SIGTERM";

export async function waitForShutdownSignal(): Promise<ShutdownSignal> {
  return await new Promise((resolveSignal) => {
    const onSigInt = () => {
      cleanup();
      resolveSignal("SIGINT");
    };
    const onSigTerm = () => {
      cleanup();
      resolveSignal("SIGTERM");
    };

    const cleanup = () => {
      process.off("SIGINT", onSigInt);
      process.off("SIGTERM", onSigTerm);
    };

    process.once("SIGINT", onSigInt);
    process.once("SIGTERM", onSigTerm);
  });
}
