/**
 * packages/core/src/widgets/buttonGroup.ts — Button group selection utilities.
 *
 * Why: The encoder validates selections and the reconciler mutates and renders
 * them. Both go through these helpers so the selection rules live in one
 * place and every mode switch is exhaustive.
 */

import type { IconRegistry, IconVariant } from "../icons/registry.js";
import { parseIconLabel } from "../icons/registry.js";
import type {
  ButtonGroupDescriptor,
  ButtonGroupOption,
  ClickMode,
  SelectionVisualization,
} from "../protocol/types.js";

/** Ascending, de-duplicated selection. */
export type Selection = readonly number[];

export type SelectionProblem =
  | Readonly<{ kind: "notInteger"; index: number }>
  | Readonly<{ kind: "outOfRange"; index: number; optionCount: number }>
  | Readonly<{ kind: "tooMany"; count: number; clickMode: ClickMode }>;

/** One option as it should be drawn. */
export type RenderedButtonGroupOption = Readonly<{
  index: number;
  selected: boolean;
  /** Raw label (content or selectedContent) before icon resolution. */
  content: string;
  icon: IconVariant | null;
  text: string;
}>;

export type ButtonGroupView = Readonly<{
  id: string;
  disabled: boolean;
  visualization: SelectionVisualization;
  options: readonly RenderedButtonGroupOption[];
}>;

export const EMPTY_SELECTION: Selection = Object.freeze([]);

export function normalizeIndices(indices: readonly number[]): Selection {
  if (indices.length === 0) return EMPTY_SELECTION;
  const unique = [...new Set(indices)].sort((a, b) => a - b);
  return Object.freeze(unique);
}

export function selectionsEqual(a: readonly number[], b: readonly number[]): boolean {
  const na = normalizeIndices(a);
  const nb = normalizeIndices(b);
  if (na.length !== nb.length) return false;
  for (let i = 0; i < na.length; i++) {
    if (na[i] !== nb[i]) return false;
  }
  return true;
}

export function maxSelected(clickMode: ClickMode): number {
  switch (clickMode) {
    case "SINGLE_SELECT":
      return 1;
    case "MULTI_SELECT":
      return Number.POSITIVE_INFINITY;
  }
}

/**
 * First problem with `indices` for a widget with `optionCount` options, or null.
 * Duplicates are not a problem; they collapse on normalization.
 */
export function validateSelection(
  optionCount: number,
  clickMode: ClickMode,
  indices: readonly number[],
): SelectionProblem | null {
  for (const index of indices) {
    if (!Number.isInteger(index)) return { kind: "notInteger", index };
    if (index < 0 || index >= optionCount) return { kind: "outOfRange", index, optionCount };
  }
  const count = new Set(indices).size;
  if (count > maxSelected(clickMode)) return { kind: "tooMany", count, clickMode };
  return null;
}

export function describeSelectionProblem(problem: SelectionProblem): string {
  switch (problem.kind) {
    case "notInteger":
      return `index ${String(problem.index)} is not an integer`;
    case "outOfRange":
      return `index ${String(problem.index)} is out of range [0, ${String(problem.optionCount)})`;
    case "tooMany":
      return `${String(problem.count)} indices given but ${problem.clickMode} allows at most one`;
  }
}

/**
 * Selection after clicking `index`.
 *
 * SINGLE_SELECT: clicking the selected option clears the selection, anything
 * else replaces it. MULTI_SELECT: toggles membership.
 */
export function toggleSelection(clickMode: ClickMode, current: Selection, index: number): Selection {
  const isSelected = current.includes(index);
  switch (clickMode) {
    case "SINGLE_SELECT":
      return isSelected ? EMPTY_SELECTION : Object.freeze([index]);
    case "MULTI_SELECT":
      return isSelected
        ? normalizeIndices(current.filter((i) => i !== index))
        : normalizeIndices([...current, index]);
  }
}

function labelFor(option: ButtonGroupOption, selected: boolean): string {
  if (selected && option.selectedContent.length > 0) return option.selectedContent;
  return option.content;
}

/** Index one past the last option to draw. */
function renderLimit(
  visualization: SelectionVisualization,
  optionCount: number,
  selection: Selection,
): number {
  switch (visualization) {
    case "ONLY_SELECTED":
      return optionCount;
    case "ALL_UP_TO_SELECTED": {
      const highest = selection[selection.length - 1];
      // Nothing selected yet: draw every option so there is something to click.
      return highest === undefined ? optionCount : Math.min(optionCount, highest + 1);
    }
  }
}

/**
 * Resolve the options to draw for `selection`.
 *
 * ONLY_SELECTED draws every option. ALL_UP_TO_SELECTED draws options 0 through
 * the highest selected index and omits the rest. Icon tokens are resolved
 * through `icons` when given; an unknown icon throws NotFoundError.
 */
export function renderButtonGroupOptions(
  descriptor: ButtonGroupDescriptor,
  selection: Selection,
  icons?: IconRegistry,
): readonly RenderedButtonGroupOption[] {
  const limit = renderLimit(descriptor.selectionVisualization, descriptor.options.length, selection);
  const out: RenderedButtonGroupOption[] = [];
  for (let index = 0; index < limit; index++) {
    const option = descriptor.options[index];
    if (!option) continue;
    const selected = selection.includes(index);
    const content = labelFor(option, selected);
    const label = icons ? parseIconLabel(content) : null;
    const icon = label?.iconKey && icons ? icons.resolve(label.iconKey) : null;
    out.push(
      Object.freeze({
        index,
        selected,
        content,
        icon,
        text: icon && label ? label.text : content,
      }),
    );
  }
  return Object.freeze(out);
}
