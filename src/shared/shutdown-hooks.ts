/**
 * Process-wide shutdown hooks.
 *
 * The entry point's uncaughtException/unhandledRejection handlers run these
 * before exiting, so a crash still releases whatever the active run acquired.
 */

export type ShutdownHook = () => Promise<unknown> | void;

const hooks = new Set<ShutdownHook>();

/** Register a hook. Returns a function that unregisters it. */
export function registerShutdownHook(hook: ShutdownHook): () => void {
  hooks.add(hook);
  return () => {
    hooks.delete(hook);
  };
}

/**
 * Run every registered hook side by side and wait for all of them.
 * Hook failures are reported through `onError` and never rethrown.
 */
export async function runShutdownHooks(
  onError: (error: unknown) => void = () => {},
): Promise<void> {
  const pending = [...hooks].map(async (hook) => {
    try {
      await hook();
    } catch (error: unknown) {
      onError(error);
    }
  });
  await Promise.all(pending);
}
