/**
 * @rerun-ui/core
 *
 * Runtime-agnostic TypeScript core for the widget value sync protocol.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Re-exports from modules
// =============================================================================

export {
  // Wire limits
  RRUI_MAX_VARINT_BYTES,
  RRUI_UINT32_MAX,
  // Error types
  RerunUiError,
  ConfigurationError,
  ContractViolation,
  NotFoundError,
  isRerunUiError,
  type RerunUiErrorCode,
} from "./abi.js";

export type {
  ClickMode,
  SelectionVisualization,
  ButtonGroupOption,
  ButtonGroupDescriptor,
  ValueUpdate,
  RenderPass,
  WireErrorCode,
  WireError,
  ParseResult,
} from "./protocol/types.js";

export {
  encodeButtonGroupDescriptor,
  decodeButtonGroupDescriptor,
  encodeValueUpdate,
  decodeValueUpdate,
  encodeRenderPass,
  decodeRenderPass,
} from "./protocol/wire.js";

export {
  EMPTY_SELECTION,
  normalizeIndices,
  selectionsEqual,
  maxSelected,
  validateSelection,
  describeSelectionProblem,
  toggleSelection,
  renderButtonGroupOptions,
  type Selection,
  type SelectionProblem,
  type RenderedButtonGroupOption,
  type ButtonGroupView,
} from "./widgets/buttonGroup.js";

export {
  createIconRegistry,
  isIconKey,
  parseIconLabel,
  type IconRegistry,
  type IconVariant,
  type IconKey,
  type IconLabel,
} from "./icons/index.js";

export {
  DEFAULT_DEV_MODE,
  createDevWarner,
  defaultWarnSink,
  type DevWarner,
  type WarnSink,
} from "./runtime/devWarnings.js";

export {
  createWidgetStateStore,
  type WidgetPhase,
  type WidgetState,
  type WidgetStatePatch,
  type WidgetStateStore,
} from "./runtime/widgetState.js";

export {
  createButtonGroupReconciler,
  createWireEmitter,
  type ClickOutcome,
  type ButtonGroupReconciler,
  type ButtonGroupReconcilerOptions,
} from "./runtime/reconciler.js";
