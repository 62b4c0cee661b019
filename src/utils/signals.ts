/**
 * Signal Handling Utilities
 *
 * Graceful shutdown for long-running commands.
 */

export type CleanupFunction = () => void | Promise<void>;

interface SignalHandlers {
  onSigInt?: CleanupFunction;
  onSigTerm?: CleanupFunction;
}

function exitAfter(cleanup: CleanupFunction, code: number): () => void {
  return () => {
    void Promise.resolve()
      .then(cleanup)
      .finally(() => process.exit(code));
  };
}

/**
 * Register signal handlers
 *
 * @returns a function that removes them again
 */
export function setupSignalHandlers(handlers: SignalHandlers): () => void {
  const registered: Array<[NodeJS.Signals, () => void]> = [];

  // Standard exit codes: 128 + signal number
  if (handlers.onSigInt) {
    registered.push(["SIGINT", exitAfter(handlers.onSigInt, 130)]);
  }
  if (handlers.onSigTerm) {
    registered.push(["SIGTERM", exitAfter(handlers.onSigTerm, 143)]);
  }

  for (const [signal, listener] of registered) {
    process.once(signal, listener);
  }

  return () => {
    for (const [signal, listener] of registered) {
      process.removeListener(signal, listener);
    }
  };
}
