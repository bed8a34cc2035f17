/**
 * packages/core/src/dev.ts — Development-mode diagnostics.
 *
 * The core reads the environment through globalThis so it never imports
 * Node-specific modules.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

/** True unless NODE_ENV is "production". */
export const DEV_MODE: boolean = NODE_ENV !== "production";

export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}
