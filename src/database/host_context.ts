import { AsyncLocalStorage } from "node:async_hooks";
import type { HostContext } from "./types.ts";

/** Singleton AsyncLocalStorage instance for tracking the calling host */
const hostContextStorage = new AsyncLocalStorage<HostContext>();

/**
 * Get the host of the current asynchronous context.
 * Returns undefined if called outside runWithHost().
 */
export function getCurrentHost(): HostContext | undefined {
  return hostContextStorage.getStore();
}

/**
 * Run a function on behalf of a host.
 * getCurrentDatabase() calls made within this context resolve against the
 * host's configuration.
 */
export function runWithHost<T>(
  host: HostContext,
  fn: () => T,
): T {
  return hostContextStorage.run(host, fn);
}
