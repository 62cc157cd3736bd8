/**
 * packages/node/src/encoder/buttonGroup.ts — Server-side button group encoder.
 *
 * Turns a script's button group call into an immutable descriptor and returns
 * the value the script sees:
 *   - explicit `value` (or a value queued since the last run) → pushed with setValue
 *   - otherwise the committed value from session state
 *   - otherwise the defaults, which become the committed value
 *
 * Invalid calls throw ConfigurationError and produce no descriptor.
 */

import {
  type ButtonGroupDescriptor,
  type ButtonGroupOption,
  type ClickMode,
  ConfigurationError,
  type DevWarner,
  EMPTY_SELECTION,
  type IconRegistry,
  RerunUiError,
  type Selection,
  type SelectionVisualization,
  describeSelectionProblem,
  normalizeIndices,
  parseIconLabel,
  validateSelection,
} from "@rerun-ui/core";
import type { WidgetSessionState } from "../session/widgetState.js";
import { computeWidgetId } from "./widgetId.js";

export const BUTTON_GROUP_WIDGET_TYPE = "button_group";

export type ButtonGroupOptionInput =
  | string
  | Readonly<{ content: string; selectedContent?: string }>;

export type ButtonGroupCall = Readonly<{
  options: readonly ButtonGroupOptionInput[];
  /** Index or indices selected when nothing has been committed yet. */
  default?: number | readonly number[] | null;
  disabled?: boolean;
  /** Default: SINGLE_SELECT. */
  clickMode?: ClickMode;
  /** Empty or omitted: not inside a form. */
  formId?: string;
  /** Default: ONLY_SELECTED. */
  selectionVisualization?: SelectionVisualization;
  /** User key; makes the id independent of the other arguments. */
  key?: string;
  /** Programmatic set; pushed to the client with setValue. */
  value?: readonly number[];
}>;

export type EncoderContext = Readonly<{
  state: WidgetSessionState;
  dev: DevWarner;
  /** When given, icon tokens in labels must name a registered icon. */
  icons?: IconRegistry;
}>;

export type EncodedButtonGroup = Readonly<{
  descriptor: ButtonGroupDescriptor;
  /** What the script call returns. */
  value: Selection;
}>;

const CLICK_MODES: ReadonlySet<string> = new Set<ClickMode>(["SINGLE_SELECT", "MULTI_SELECT"]);
const VISUALIZATIONS: ReadonlySet<string> = new Set<SelectionVisualization>([
  "ONLY_SELECTED",
  "ALL_UP_TO_SELECTED",
]);

function isClickMode(v: unknown): v is ClickMode {
  return typeof v === "string" && CLICK_MODES.has(v);
}

function isSelectionVisualization(v: unknown): v is SelectionVisualization {
  return typeof v === "string" && VISUALIZATIONS.has(v);
}

function normalizeOption(input: ButtonGroupOptionInput, index: number): ButtonGroupOption {
  if (typeof input === "string") {
    return Object.freeze({ content: input, selectedContent: "" });
  }
  if (!input || typeof input !== "object" || typeof input.content !== "string") {
    throw new ConfigurationError(`button group option ${String(index)} must be a string or { content }`);
  }
  const selectedContent = input.selectedContent ?? "";
  if (typeof selectedContent !== "string") {
    throw new ConfigurationError(`button group option ${String(index)}: selectedContent must be a string`);
  }
  return Object.freeze({ content: input.content, selectedContent });
}

function checkIcons(options: readonly ButtonGroupOption[], icons: IconRegistry): void {
  options.forEach((option, index) => {
    for (const label of [option.content, option.selectedContent]) {
      const { iconKey } = parseIconLabel(label);
      if (iconKey !== null && !icons.has(iconKey)) {
        throw new ConfigurationError(`button group option ${String(index)}: unknown icon "${iconKey}"`);
      }
    }
  });
}

function defaultsFrom(input: ButtonGroupCall["default"]): readonly number[] {
  if (input === undefined || input === null) return EMPTY_SELECTION;
  if (typeof input === "number") return [input];
  return input;
}

function checkSelection(
  what: string,
  optionCount: number,
  clickMode: ClickMode,
  indices: readonly number[],
): Selection {
  const problem = validateSelection(optionCount, clickMode, indices);
  if (problem) {
    throw new ConfigurationError(`button group ${what}: ${describeSelectionProblem(problem)}`);
  }
  return normalizeIndices(indices);
}

export function encodeButtonGroup(ctx: EncoderContext, call: ButtonGroupCall): EncodedButtonGroup {
  const options = Object.freeze(call.options.map(normalizeOption));
  if (ctx.icons) checkIcons(options, ctx.icons);

  const clickMode = call.clickMode ?? "SINGLE_SELECT";
  if (!isClickMode(clickMode)) {
    throw new ConfigurationError(`unknown clickMode ${String(clickMode)}`);
  }
  const selectionVisualization = call.selectionVisualization ?? "ONLY_SELECTED";
  if (!isSelectionVisualization(selectionVisualization)) {
    throw new ConfigurationError(`unknown selectionVisualization ${String(selectionVisualization)}`);
  }
  const formId = call.formId ?? "";
  const disabled = call.disabled ?? false;

  const defaults = checkSelection("default", options.length, clickMode, defaultsFrom(call.default));
  const explicit =
    call.value === undefined ? undefined : checkSelection("value", options.length, clickMode, call.value);

  // Rendering-only fields (disabled, selectionVisualization) stay out of the id.
  const id = computeWidgetId(
    BUTTON_GROUP_WIDGET_TYPE,
    {
      options,
      default: defaults,
      clickMode,
      formId,
    },
    call.key,
  );

  const { state, dev } = ctx;
  // Queued pushes are validated before registration; an invalid one is dropped.
  const queued = state.takeQueued(id);
  const pushed =
    explicit ??
    (queued === undefined ? undefined : checkSelection("queued value", options.length, clickMode, queued));

  if (!state.register(id)) {
    throw new RerunUiError(
      "RRUI_DUPLICATE_ID",
      `two button groups share id "${id}"; pass a unique key to one of them`,
    );
  }

  let value: Selection;
  if (pushed !== undefined) {
    value = pushed;
    state.commit(id, pushed);
  } else {
    const committed = state.getCommitted(id);
    const problem =
      committed === undefined ? null : validateSelection(options.length, clickMode, committed);
    if (committed !== undefined && problem === null) {
      value = committed;
    } else {
      if (problem) {
        dev.warnOnce(
          `stale-committed:${id}`,
          `committed value of "${id}" no longer fits (${describeSelectionProblem(problem)}); using defaults`,
        );
      }
      value = defaults;
      state.commit(id, defaults);
    }
  }

  const descriptor: ButtonGroupDescriptor = Object.freeze({
    id,
    options,
    defaultIndices: defaults,
    disabled,
    clickMode,
    formId,
    value: pushed ?? EMPTY_SELECTION,
    setValue: pushed !== undefined,
    selectionVisualization,
  });

  return Object.freeze({ descriptor, value });
}
