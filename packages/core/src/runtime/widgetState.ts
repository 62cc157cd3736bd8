/**
 * packages/core/src/runtime/widgetState.ts — Per-widget client state storage.
 *
 * Why: Selection state must survive re-renders of the same widget id and be
 * dropped when the widget disappears. Entries are frozen snapshots; iteration
 * follows first-sighting order.
 *
 * Stored state:
 *   - descriptor: latest descriptor received for the id
 *   - phase: DEFAULTED (seeded or server-set) or INTERACTED (user clicked)
 *   - selection: what the UI currently shows
 *   - committed: last value the server is known to hold
 *   - formPending: selection differs from committed and waits for form submit
 */

import type { ButtonGroupDescriptor } from "../protocol/types.js";
import type { Selection } from "../widgets/buttonGroup.js";

/** UNSEEN is represented by absence from the store. */
export type WidgetPhase = "DEFAULTED" | "INTERACTED";

export type WidgetState = Readonly<{
  id: string;
  descriptor: ButtonGroupDescriptor;
  phase: WidgetPhase;
  selection: Selection;
  committed: Selection;
  formPending: boolean;
}>;

/** Partial update (undefined fields are not changed). */
export type WidgetStatePatch = Readonly<{
  descriptor?: ButtonGroupDescriptor;
  phase?: WidgetPhase;
  selection?: Selection;
  committed?: Selection;
  formPending?: boolean;
}>;

export type WidgetStateStore = Readonly<{
  get: (id: string) => WidgetState | undefined;
  create: (state: WidgetState) => WidgetState;
  update: (id: string, patch: WidgetStatePatch) => WidgetState | undefined;
  delete: (id: string) => boolean;
  ids: () => readonly string[];
  values: () => readonly WidgetState[];
  readonly size: number;
}>;

function freezeState(s: WidgetState): WidgetState {
  return Object.freeze({
    id: s.id,
    descriptor: s.descriptor,
    phase: s.phase,
    selection: Object.isFrozen(s.selection) ? s.selection : Object.freeze([...s.selection]),
    committed: Object.isFrozen(s.committed) ? s.committed : Object.freeze([...s.committed]),
    formPending: s.formPending,
  });
}

export function createWidgetStateStore(): WidgetStateStore {
  const table = new Map<string, WidgetState>();

  return Object.freeze({
    get: (id: string) => table.get(id),
    create: (state: WidgetState) => {
      const frozen = freezeState(state);
      table.set(state.id, frozen);
      return frozen;
    },
    update: (id: string, patch: WidgetStatePatch) => {
      const prev = table.get(id);
      if (!prev) return undefined;
      const next = freezeState({
        id,
        descriptor: patch.descriptor ?? prev.descriptor,
        phase: patch.phase ?? prev.phase,
        selection: patch.selection ?? prev.selection,
        committed: patch.committed ?? prev.committed,
        formPending: patch.formPending ?? prev.formPending,
      });
      table.set(id, next);
      return next;
    },
    delete: (id: string) => table.delete(id),
    ids: () => Object.freeze([...table.keys()]),
    values: () => Object.freeze([...table.values()]),
    get size() {
      return table.size;
    },
  });
}
