/**
 * packages/core/src/runtime/devWarnings.ts — Deduplicated development warnings.
 *
 * Why: Protocol oddities that are not errors (an update for a widget that was
 * just removed, a form submit with nothing pending) are worth one warning in
 * development and nothing in production.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEFAULT_DEV_MODE = NODE_ENV !== "production";

export type WarnSink = (message: string) => void;

export type DevWarner = Readonly<{
  /** Warn once per `key` for the lifetime of this warner. */
  warnOnce: (key: string, detail: string) => void;
  /** Forget every key already warned about. */
  reset: () => void;
}>;

export function defaultWarnSink(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function createDevWarner(
  area: string,
  opts: Readonly<{ devMode?: boolean; warn?: WarnSink }> = {},
): DevWarner {
  const devMode = opts.devMode ?? DEFAULT_DEV_MODE;
  const sink = opts.warn ?? defaultWarnSink;
  const warned = new Set<string>();

  return Object.freeze({
    warnOnce: (key: string, detail: string) => {
      if (!devMode) return;
      if (warned.has(key)) return;
      warned.add(key);
      sink(`[rerun-ui][${area}] ${detail}`);
    },
    reset: () => {
      warned.clear();
    },
  });
}
