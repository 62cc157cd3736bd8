/**
 * packages/core/src/runtime/reconciler.ts — Client-side button group reconciler.
 *
 * Why: Owns the transient selection state of every button group on screen,
 * merges incoming descriptors with it, applies clicks, and decides when a
 * value update goes back to the server.
 *
 * Per-widget lifecycle:
 *   UNSEEN → DEFAULTED      first descriptor; selection := value (setValue) or defaults
 *   any    → DEFAULTED      descriptor with setValue and a different value (server wins)
 *   reshape                 selection no longer fits: back to committed, else defaults
 *   DEFAULTED/INTERACTED → INTERACTED   click
 *   formPending             click inside a form; cleared by submitForm or a server push
 *
 * Descriptors with setValue=false never overwrite a local selection that still
 * fits, pending or not.
 * All handlers run to completion on one event loop; there is no locking.
 */

import { ContractViolation, RerunUiError } from "../abi.js";
import type { IconRegistry } from "../icons/registry.js";
import { encodeValueUpdate } from "../protocol/wire.js";
import type { ButtonGroupDescriptor, RenderPass, ValueUpdate } from "../protocol/types.js";
import {
  type ButtonGroupView,
  type Selection,
  describeSelectionProblem,
  normalizeIndices,
  renderButtonGroupOptions,
  selectionsEqual,
  toggleSelection,
  validateSelection,
} from "../widgets/buttonGroup.js";
import { type WarnSink, createDevWarner } from "./devWarnings.js";
import { type WidgetState, createWidgetStateStore } from "./widgetState.js";

/** Result of a click. */
export type ClickOutcome = "ignored" | "committed" | "buffered";

export type ButtonGroupReconcilerOptions = Readonly<{
  /** Called for every outbound value update, in order. */
  emit: (update: ValueUpdate) => void;
  /** Resolves icon tokens in option labels during render. */
  icons?: IconRegistry;
  warn?: WarnSink;
  /** Default: NODE_ENV !== "production". */
  devMode?: boolean;
  /** Drop state for ids missing from a render pass. Default: true. */
  evictMissing?: boolean;
}>;

export type ButtonGroupReconciler = Readonly<{
  applyDescriptor: (descriptor: ButtonGroupDescriptor) => WidgetState;
  /**
   * Applies every descriptor, then returns the ids evicted. Rejected
   * descriptors leave their widget untouched; after the rest of the pass is
   * applied they are reported in one ContractViolation.
   */
  applyRenderPass: (pass: RenderPass) => readonly string[];
  click: (id: string, index: number) => ClickOutcome;
  /** Flushes buffered selections of `formId`; returns the updates emitted. */
  submitForm: (formId: string) => readonly ValueUpdate[];
  getState: (id: string) => WidgetState | undefined;
  render: (id: string) => ButtonGroupView;
  hasPendingForm: (formId: string) => boolean;
  ids: () => readonly string[];
}>;

function validateOptions(opts: ButtonGroupReconcilerOptions): void {
  if (typeof opts.emit !== "function") {
    throw new RerunUiError("RRUI_INVALID_PROPS", "reconciler: emit must be a function");
  }
  if (opts.icons !== undefined && typeof opts.icons.resolve !== "function") {
    throw new RerunUiError("RRUI_INVALID_PROPS", "reconciler: icons must be an IconRegistry");
  }
  if (opts.evictMissing !== undefined && typeof opts.evictMissing !== "boolean") {
    throw new RerunUiError("RRUI_INVALID_PROPS", "reconciler: evictMissing must be a boolean");
  }
}

function assertDescriptor(d: ButtonGroupDescriptor): void {
  if (d.id.length === 0) {
    throw new ContractViolation("descriptor without id");
  }
  const defaultProblem = validateSelection(d.options.length, d.clickMode, d.defaultIndices);
  if (defaultProblem) {
    throw new ContractViolation(
      `descriptor "${d.id}": default ${describeSelectionProblem(defaultProblem)}`,
    );
  }
  if (d.setValue) {
    const valueProblem = validateSelection(d.options.length, d.clickMode, d.value);
    if (valueProblem) {
      throw new ContractViolation(
        `descriptor "${d.id}": value ${describeSelectionProblem(valueProblem)}`,
      );
    }
  }
}

export function createButtonGroupReconciler(
  opts: ButtonGroupReconcilerOptions,
): ButtonGroupReconciler {
  validateOptions(opts);
  const emit = opts.emit;
  const icons = opts.icons;
  const evictMissing = opts.evictMissing ?? true;
  const dev = createDevWarner("reconciler", { devMode: opts.devMode, warn: opts.warn });
  const store = createWidgetStateStore();

  function requireState(id: string, op: string): WidgetState {
    const state = store.get(id);
    if (!state) throw new ContractViolation(`${op}: unknown widget "${id}"`);
    return state;
  }

  function commitNow(id: string, selection: Selection): void {
    store.update(id, { committed: selection, formPending: false });
    emit(Object.freeze({ id, value: selection }));
  }

  function applyDescriptor(d: ButtonGroupDescriptor): WidgetState {
    assertDescriptor(d);
    const prev = store.get(d.id);

    if (!prev) {
      const seeded = normalizeIndices(d.setValue ? d.value : d.defaultIndices);
      return store.create({
        id: d.id,
        descriptor: d,
        phase: "DEFAULTED",
        selection: seeded,
        committed: seeded,
        formPending: false,
      });
    }

    if (d.setValue) {
      const pushed = normalizeIndices(d.value);
      if (!selectionsEqual(pushed, prev.selection)) {
        const next = store.update(d.id, {
          descriptor: d,
          phase: "DEFAULTED",
          selection: pushed,
          committed: pushed,
          formPending: false,
        });
        return next ?? requireState(d.id, "applyDescriptor");
      }
      const next = store.update(d.id, { descriptor: d, committed: pushed, formPending: false });
      return next ?? requireState(d.id, "applyDescriptor");
    }

    const problem = validateSelection(d.options.length, d.clickMode, prev.selection);
    if (problem) {
      // Fall back to what the server holds; defaults only when that no longer fits either.
      const committedFits = validateSelection(d.options.length, d.clickMode, prev.committed) === null;
      const fallback = committedFits ? prev.committed : normalizeIndices(d.defaultIndices);
      dev.warnOnce(
        `reshape:${d.id}`,
        `widget "${d.id}" changed shape (${describeSelectionProblem(problem)}); selection reset to ${
          committedFits ? "last committed value" : "defaults"
        }`,
      );
      const next = store.update(d.id, {
        descriptor: d,
        phase: committedFits ? prev.phase : "DEFAULTED",
        selection: fallback,
        committed: fallback,
        formPending: false,
      });
      return next ?? requireState(d.id, "applyDescriptor");
    }

    store.update(d.id, { descriptor: d });
    if (prev.formPending && d.formId.length === 0 && !d.disabled) {
      // Left its form: nothing will ever submit the buffered value.
      commitNow(d.id, prev.selection);
    }
    return requireState(d.id, "applyDescriptor");
  }

  function applyRenderPass(pass: RenderPass): readonly string[] {
    const seen = new Set<string>();
    for (const d of pass.widgets) {
      if (seen.has(d.id)) {
        throw new ContractViolation(
          `render pass ${String(pass.scriptRunId)}: duplicate widget id "${d.id}"`,
        );
      }
      seen.add(d.id);
    }

    // A rejected descriptor only affects its own widget; the rest of the pass still applies.
    const violations: ContractViolation[] = [];
    for (const d of pass.widgets) {
      try {
        applyDescriptor(d);
      } catch (err) {
        if (!(err instanceof ContractViolation)) throw err;
        violations.push(err);
      }
    }

    const evicted: string[] = [];
    if (evictMissing) {
      for (const id of store.ids()) {
        if (seen.has(id)) continue;
        store.delete(id);
        evicted.push(id);
      }
    }

    if (violations.length > 0) {
      throw new ContractViolation(
        `render pass ${String(pass.scriptRunId)}: ${violations.map((v) => v.message).join("; ")}`,
      );
    }
    return Object.freeze(evicted);
  }

  function click(id: string, index: number): ClickOutcome {
    const state = requireState(id, "click");
    const d = state.descriptor;
    if (!Number.isInteger(index) || index < 0 || index >= d.options.length) {
      throw new ContractViolation(
        `click on widget "${id}": index ${String(index)} is out of range [0, ${String(d.options.length)})`,
      );
    }
    if (d.disabled) return "ignored";

    const next = toggleSelection(d.clickMode, state.selection, index);
    if (d.formId.length === 0) {
      store.update(id, { phase: "INTERACTED", selection: next });
      commitNow(id, next);
      return "committed";
    }

    store.update(id, { phase: "INTERACTED", selection: next, formPending: true });
    return "buffered";
  }

  function submitForm(formId: string): readonly ValueUpdate[] {
    if (formId.length === 0) {
      throw new RerunUiError("RRUI_INVALID_PROPS", "submitForm: formId must be non-empty");
    }

    const updates: ValueUpdate[] = [];
    for (const state of store.values()) {
      if (state.descriptor.formId !== formId) continue;
      if (!state.formPending || state.descriptor.disabled) continue;
      store.update(state.id, { committed: state.selection, formPending: false });
      updates.push(Object.freeze({ id: state.id, value: state.selection }));
    }

    if (updates.length === 0) {
      dev.warnOnce(`empty-submit:${formId}`, `form "${formId}" submitted with no pending changes`);
    }
    for (const update of updates) emit(update);
    return Object.freeze(updates);
  }

  function render(id: string): ButtonGroupView {
    const state = requireState(id, "render");
    const d = state.descriptor;
    return Object.freeze({
      id,
      disabled: d.disabled,
      visualization: d.selectionVisualization,
      options: renderButtonGroupOptions(d, state.selection, icons),
    });
  }

  function hasPendingForm(formId: string): boolean {
    for (const state of store.values()) {
      if (state.descriptor.formId === formId && state.formPending) return true;
    }
    return false;
  }

  return Object.freeze({
    applyDescriptor,
    applyRenderPass,
    click,
    submitForm,
    getState: (id: string) => store.get(id),
    render,
    hasPendingForm,
    ids: () => store.ids(),
  });
}

/** Adapts a byte transport to the reconciler's `emit`. */
export function createWireEmitter(write: (bytes: Uint8Array) => void): (update: ValueUpdate) => void {
  return (update) => {
    write(encodeValueUpdate(update));
  };
}
