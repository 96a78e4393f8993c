/**
 * Cleanup hooks run when the CLI receives SIGINT or SIGTERM
 */

type ShutdownHook = () => Promise<void> | void;

const hooks = new Set<ShutdownHook>();

/**
 * @returns Unregister function
 */
export function onShutdown(hook: ShutdownHook): () => void {
  hooks.add(hook);
  return () => {
    hooks.delete(hook);
  };
}

export async function runShutdownHooks(): Promise<void> {
  const pending = [...hooks];
  hooks.clear();
  await Promise.all(pending.map((hook) => hook()));
}
