/**
 * packages/core/src/protocol/types.ts — Widget sync message type definitions.
 *
 * Why: Defines the TypeScript representations of the messages exchanged
 * between the server-side encoder and the client-side reconciler. Both sides
 * only ever share these shapes; there is no shared memory.
 *
 * Binary format: protobuf wire encoding (field numbers pinned in wire.ts).
 */

/**
 * Selection cardinality and click semantics.
 *   - SINGLE_SELECT (0): at most one index; clicking the selected one clears it
 *   - MULTI_SELECT (1): any subset; clicking toggles membership
 */
export type ClickMode = "SINGLE_SELECT" | "MULTI_SELECT";

/**
 * Rendering hint only; never changes the logical value.
 *   - ONLY_SELECTED (0): selected options use their selected content
 *   - ALL_UP_TO_SELECTED (1): options up to the highest selected index are shown
 */
export type SelectionVisualization = "ONLY_SELECTED" | "ALL_UP_TO_SELECTED";

export type ButtonGroupOption = Readonly<{
  /** Label shown while unselected. */
  content: string;
  /** Label shown while selected. Empty means reuse `content`. */
  selectedContent: string;
}>;

/**
 * Immutable description of one button group for one script run.
 * Options have no identity beyond their index.
 */
export type ButtonGroupDescriptor = Readonly<{
  id: string;
  options: readonly ButtonGroupOption[];
  defaultIndices: readonly number[];
  disabled: boolean;
  clickMode: ClickMode;
  /** Empty string means the widget is not inside a form. */
  formId: string;
  /** Only meaningful when `setValue` is true. */
  value: readonly number[];
  /** True when the server authoritatively pushes `value`. */
  setValue: boolean;
  selectionVisualization: SelectionVisualization;
}>;

/** Client → server: the user's selection for one widget. */
export type ValueUpdate = Readonly<{
  id: string;
  value: readonly number[];
}>;

/** Server → client: every descriptor produced by one rerun. */
export type RenderPass = Readonly<{
  scriptRunId: number;
  widgets: readonly ButtonGroupDescriptor[];
}>;

/**
 * Error codes for wire decoding failures.
 *
 *   - WIRE_TRUNCATED: buffer ends inside a tag, varint or length-delimited field
 *   - WIRE_BAD_WIRE_TYPE: deprecated group wire types (3/4) or unknown types (6/7)
 *   - WIRE_VARINT_OVERFLOW: varint longer than 10 bytes
 *   - WIRE_VALUE_OUT_OF_RANGE: value exceeds the declared field width
 *   - WIRE_INVALID_UTF8: string field is not valid UTF-8
 *   - WIRE_INVALID_ENUM: enum value unknown to this reader
 */
export type WireErrorCode =
  | "WIRE_TRUNCATED"
  | "WIRE_BAD_WIRE_TYPE"
  | "WIRE_VARINT_OVERFLOW"
  | "WIRE_VALUE_OUT_OF_RANGE"
  | "WIRE_INVALID_UTF8"
  | "WIRE_INVALID_ENUM";

/**
 * Structured decode error. Offset points to the byte position where decoding
 * failed, relative to the start of the outermost buffer.
 */
export type WireError = Readonly<{
  code: WireErrorCode;
  offset: number;
  detail: string;
}>;

/**
 * Discriminated union result type for decode operations.
 * Malformed input is reported, never thrown.
 */
export type ParseResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: WireError }>;
