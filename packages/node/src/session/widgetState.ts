/**
 * packages/node/src/session/widgetState.ts — Session-scoped committed widget values.
 *
 * Why: A rerun must recover exactly the value the user produced. The session
 * keeps the last committed value per widget id, remembers which ids the
 * current run registered, and evicts ids a completed run no longer produced.
 *
 * Owned by one AppSession; never shared across sessions.
 */

import {
  type DevWarner,
  RerunUiError,
  type Selection,
  type ValueUpdate,
  normalizeIndices,
} from "@rerun-ui/core";

export type WidgetSessionState = Readonly<{
  /** Start collecting registrations for a new run. */
  beginRun: () => void;
  /** Mark `id` as produced by the current run. Returns false if already registered. */
  register: (id: string) => boolean;
  isRegistered: (id: string) => boolean;
  getCommitted: (id: string) => Selection | undefined;
  commit: (id: string, value: readonly number[]) => void;
  /** Programmatic set: the next encode of `id` pushes `value` with setValue. */
  queueValue: (id: string, value: readonly number[]) => void;
  /** Consume the queued push for `id`, if any. */
  takeQueued: (id: string) => Selection | undefined;
  /**
   * Merge a client update. Updates for ids the latest run did not produce are
   * dropped (the widget was removed) and reported as false.
   */
  applyValueUpdate: (update: ValueUpdate) => boolean;
  /** Finish the run; a completed run evicts every id it did not register. */
  endRun: (result: Readonly<{ completed: boolean }>) => readonly string[];
  clear: () => void;
  ids: () => readonly string[];
  readonly size: number;
}>;

type Entry = {
  committed: Selection;
  queued: Selection | undefined;
};

export function createWidgetSessionState(dev: DevWarner): WidgetSessionState {
  const table = new Map<string, Entry>();
  let activeIds = new Set<string>();
  let runIds: Set<string> | null = null;

  function entryFor(id: string): Entry {
    let entry = table.get(id);
    if (!entry) {
      entry = { committed: normalizeIndices([]), queued: undefined };
      table.set(id, entry);
    }
    return entry;
  }

  return Object.freeze({
    beginRun: () => {
      if (runIds !== null) {
        throw new RerunUiError("RRUI_INVALID_STATE", "beginRun: a run is already in progress");
      }
      runIds = new Set<string>();
    },
    register: (id: string) => {
      if (runIds === null) {
        throw new RerunUiError("RRUI_INVALID_STATE", `register("${id}") outside a script run`);
      }
      if (runIds.has(id)) return false;
      runIds.add(id);
      return true;
    },
    isRegistered: (id: string) => activeIds.has(id) || (runIds?.has(id) ?? false),
    getCommitted: (id: string) => table.get(id)?.committed,
    commit: (id: string, value: readonly number[]) => {
      entryFor(id).committed = normalizeIndices(value);
    },
    queueValue: (id: string, value: readonly number[]) => {
      entryFor(id).queued = normalizeIndices(value);
    },
    takeQueued: (id: string) => {
      const entry = table.get(id);
      if (!entry || entry.queued === undefined) return undefined;
      const queued = entry.queued;
      entry.queued = undefined;
      return queued;
    },
    applyValueUpdate: (update: ValueUpdate) => {
      if (!activeIds.has(update.id) || !table.has(update.id)) {
        dev.warnOnce(
          `stale-update:${update.id}`,
          `value update for widget "${update.id}" ignored; it is not part of the latest run`,
        );
        return false;
      }
      entryFor(update.id).committed = normalizeIndices(update.value);
      return true;
    },
    endRun: ({ completed }: Readonly<{ completed: boolean }>) => {
      const ran = runIds;
      runIds = null;
      if (ran === null) {
        throw new RerunUiError("RRUI_INVALID_STATE", "endRun: no run in progress");
      }
      if (!completed) {
        for (const id of ran) activeIds.add(id);
        return Object.freeze([]);
      }
      const evicted: string[] = [];
      for (const id of table.keys()) {
        if (!ran.has(id)) evicted.push(id);
      }
      for (const id of evicted) table.delete(id);
      activeIds = ran;
      return Object.freeze(evicted);
    },
    clear: () => {
      table.clear();
      activeIds = new Set<string>();
      runIds = null;
    },
    ids: () => Object.freeze([...table.keys()]),
    get size() {
      return table.size;
    },
  });
}
