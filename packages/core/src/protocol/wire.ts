/**
 * packages/core/src/protocol/wire.ts — Binary codec for widget sync messages.
 *
 * Why: Descriptors and value updates cross a process boundary. The encoding is
 * protobuf-wire compatible so readers skip fields they do not know, which lets
 * new optional fields ship without breaking older clients.
 *
 * Field numbers (never reuse):
 *   ButtonGroup: id=1 options=2 default=3 disabled=4 click_mode=5 form_id=6
 *                value=7 set_value=8 selection_visualization=9
 *   ButtonGroup.Option: content=1 selected_content=2
 *   ValueUpdate: id=1 value=2
 *   RenderPass: script_run_id=1 widgets=2
 */

import { RRUI_MAX_VARINT_BYTES, RRUI_UINT32_MAX, RerunUiError } from "../abi.js";
import type {
  ButtonGroupDescriptor,
  ButtonGroupOption,
  ClickMode,
  ParseResult,
  RenderPass,
  SelectionVisualization,
  ValueUpdate,
  WireError,
  WireErrorCode,
} from "./types.js";

const WIRE_VARINT = 0;
const WIRE_I64 = 1;
const WIRE_LEN = 2;
const WIRE_I32 = 5;

type WireType = typeof WIRE_VARINT | typeof WIRE_I64 | typeof WIRE_LEN | typeof WIRE_I32;

const DEFAULT_INITIAL_CAPACITY = 64;

const CLICK_MODE_TO_WIRE: Readonly<Record<ClickMode, number>> = Object.freeze({
  SINGLE_SELECT: 0,
  MULTI_SELECT: 1,
});

const SELECTION_VISUALIZATION_TO_WIRE: Readonly<Record<SelectionVisualization, number>> =
  Object.freeze({
    ONLY_SELECTED: 0,
    ALL_UP_TO_SELECTED: 1,
  });

function clickModeFromWire(v: number): ClickMode | null {
  switch (v) {
    case 0:
      return "SINGLE_SELECT";
    case 1:
      return "MULTI_SELECT";
    default:
      return null;
  }
}

function selectionVisualizationFromWire(v: number): SelectionVisualization | null {
  switch (v) {
    case 0:
      return "ONLY_SELECTED";
    case 1:
      return "ALL_UP_TO_SELECTED";
    default:
      return null;
  }
}

// =============================================================================
// Writer
// =============================================================================

function nextPowerOfTwoAtLeast(current: number, required: number): number {
  let next = current;
  while (next < required) {
    const doubled = next * 2;
    if (!Number.isSafeInteger(doubled) || doubled <= next) return required;
    next = doubled;
  }
  return next;
}

function assertUint32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > RRUI_UINT32_MAX) {
    throw new RerunUiError(
      "RRUI_PROTOCOL_ERROR",
      `${field} must be a uint32, got ${String(value)}`,
    );
  }
}

class WireWriter {
  private buf: Uint8Array;
  private len = 0;
  private readonly encoder = new TextEncoder();

  constructor(initialCapacity = DEFAULT_INITIAL_CAPACITY) {
    this.buf = new Uint8Array(initialCapacity);
  }

  private reserve(extra: number): void {
    const required = this.len + extra;
    if (required <= this.buf.byteLength) return;
    const next = new Uint8Array(nextPowerOfTwoAtLeast(this.buf.byteLength, required));
    next.set(this.buf.subarray(0, this.len), 0);
    this.buf = next;
  }

  varint(value: number): void {
    this.reserve(RRUI_MAX_VARINT_BYTES);
    let v = value;
    while (v > 0x7f) {
      this.buf[this.len++] = (v % 0x80) | 0x80;
      v = Math.floor(v / 0x80);
    }
    this.buf[this.len++] = v;
  }

  tag(field: number, wireType: WireType): void {
    this.varint(field * 8 + wireType);
  }

  bytes(field: number, data: Uint8Array): void {
    this.tag(field, WIRE_LEN);
    this.varint(data.byteLength);
    this.reserve(data.byteLength);
    this.buf.set(data, this.len);
    this.len += data.byteLength;
  }

  string(field: number, value: string): void {
    if (value.length === 0) return;
    this.bytes(field, this.encoder.encode(value));
  }

  bool(field: number, value: boolean): void {
    if (!value) return;
    this.tag(field, WIRE_VARINT);
    this.varint(1);
  }

  uint32(field: number, value: number, name: string): void {
    assertUint32(value, name);
    if (value === 0) return;
    this.tag(field, WIRE_VARINT);
    this.varint(value);
  }

  packedUint32(field: number, values: readonly number[], name: string): void {
    if (values.length === 0) return;
    const inner = new WireWriter(values.length * 2);
    for (const v of values) {
      assertUint32(v, name);
      inner.varint(v);
    }
    this.bytes(field, inner.finish());
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

// =============================================================================
// Reader
// =============================================================================

class WireAbort extends Error {
  readonly wireError: WireError;

  constructor(wireError: WireError) {
    super(wireError.detail);
    this.wireError = wireError;
  }
}

class WireReader {
  private pos: number;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(
    private readonly data: Uint8Array,
    start: number,
    private readonly end: number,
  ) {
    this.pos = start;
  }

  get offset(): number {
    return this.pos;
  }

  done(): boolean {
    return this.pos >= this.end;
  }

  fail(code: WireErrorCode, detail: string, offset = this.pos): never {
    throw new WireAbort(Object.freeze({ code, offset, detail }));
  }

  varint(): number {
    const start = this.pos;
    let result = 0;
    let scale = 1;
    for (let i = 0; i < RRUI_MAX_VARINT_BYTES; i++) {
      if (this.pos >= this.end) this.fail("WIRE_TRUNCATED", "varint runs past end", start);
      const b = this.data[this.pos] ?? 0;
      this.pos++;
      result += (b & 0x7f) * scale;
      if (b < 0x80) return result;
      scale *= 0x80;
    }
    return this.fail("WIRE_VARINT_OVERFLOW", "varint longer than 10 bytes", start);
  }

  uint32(field: string): number {
    const start = this.pos;
    const v = this.varint();
    if (v > RRUI_UINT32_MAX) {
      this.fail("WIRE_VALUE_OUT_OF_RANGE", `${field} does not fit in uint32`, start);
    }
    return v;
  }

  tag(): Readonly<{ field: number; wireType: number; offset: number }> {
    const offset = this.pos;
    const raw = this.uint32("tag");
    const field = Math.floor(raw / 8);
    if (field === 0) this.fail("WIRE_VALUE_OUT_OF_RANGE", "field number 0", offset);
    return { field, wireType: raw % 8, offset };
  }

  sub(): WireReader {
    const start = this.pos;
    const len = this.varint();
    if (len > this.end - this.pos) {
      this.fail("WIRE_TRUNCATED", `length ${String(len)} runs past end`, start);
    }
    const reader = new WireReader(this.data, this.pos, this.pos + len);
    this.pos += len;
    return reader;
  }

  string(): string {
    const inner = this.sub();
    try {
      return this.decoder.decode(this.data.subarray(inner.pos, inner.end));
    } catch {
      return this.fail("WIRE_INVALID_UTF8", "string field is not valid UTF-8", inner.pos);
    }
  }

  repeatedUint32(wireType: number, field: string, out: number[]): void {
    if (wireType === WIRE_VARINT) {
      out.push(this.uint32(field));
      return;
    }
    if (wireType === WIRE_LEN) {
      const inner = this.sub();
      while (!inner.done()) out.push(inner.uint32(field));
      return;
    }
    this.fail("WIRE_BAD_WIRE_TYPE", `${field}: unexpected wire type ${String(wireType)}`);
  }

  expect(wireType: number, expected: WireType, field: string, offset: number): void {
    if (wireType !== expected) {
      this.fail(
        "WIRE_BAD_WIRE_TYPE",
        `${field}: wire type ${String(wireType)}, expected ${String(expected)}`,
        offset,
      );
    }
  }

  skip(wireType: number, offset: number): void {
    switch (wireType) {
      case WIRE_VARINT:
        this.varint();
        return;
      case WIRE_I64:
        this.advance(8, offset);
        return;
      case WIRE_LEN:
        this.sub();
        return;
      case WIRE_I32:
        this.advance(4, offset);
        return;
      default:
        this.fail("WIRE_BAD_WIRE_TYPE", `unsupported wire type ${String(wireType)}`, offset);
    }
  }

  private advance(n: number, offset: number): void {
    if (this.end - this.pos < n) this.fail("WIRE_TRUNCATED", "fixed-width field runs past end", offset);
    this.pos += n;
  }
}

function decodeWith<T>(bytes: Uint8Array, read: (reader: WireReader) => T): ParseResult<T> {
  const reader = new WireReader(bytes, 0, bytes.byteLength);
  try {
    return { ok: true, value: read(reader) };
  } catch (err) {
    if (err instanceof WireAbort) return { ok: false, error: err.wireError };
    throw err;
  }
}

// =============================================================================
// ButtonGroup
// =============================================================================

function writeOption(option: ButtonGroupOption): Uint8Array {
  const w = new WireWriter();
  w.string(1, option.content);
  w.string(2, option.selectedContent);
  return w.finish();
}

function writeDescriptor(w: WireWriter, d: ButtonGroupDescriptor): void {
  w.string(1, d.id);
  for (const option of d.options) {
    w.bytes(2, writeOption(option));
  }
  w.packedUint32(3, d.defaultIndices, "default");
  w.bool(4, d.disabled);
  w.uint32(5, CLICK_MODE_TO_WIRE[d.clickMode], "click_mode");
  w.string(6, d.formId);
  w.packedUint32(7, d.value, "value");
  w.bool(8, d.setValue);
  w.uint32(9, SELECTION_VISUALIZATION_TO_WIRE[d.selectionVisualization], "selection_visualization");
}

function readOption(r: WireReader): ButtonGroupOption {
  let content = "";
  let selectedContent = "";
  while (!r.done()) {
    const { field, wireType, offset } = r.tag();
    switch (field) {
      case 1:
        r.expect(wireType, WIRE_LEN, "option.content", offset);
        content = r.string();
        break;
      case 2:
        r.expect(wireType, WIRE_LEN, "option.selected_content", offset);
        selectedContent = r.string();
        break;
      default:
        r.skip(wireType, offset);
    }
  }
  return Object.freeze({ content, selectedContent });
}

function readDescriptor(r: WireReader): ButtonGroupDescriptor {
  let id = "";
  const options: ButtonGroupOption[] = [];
  const defaultIndices: number[] = [];
  let disabled = false;
  let clickMode: ClickMode = "SINGLE_SELECT";
  let formId = "";
  const value: number[] = [];
  let setValue = false;
  let selectionVisualization: SelectionVisualization = "ONLY_SELECTED";

  while (!r.done()) {
    const { field, wireType, offset } = r.tag();
    switch (field) {
      case 1:
        r.expect(wireType, WIRE_LEN, "id", offset);
        id = r.string();
        break;
      case 2:
        r.expect(wireType, WIRE_LEN, "options", offset);
        options.push(readOption(r.sub()));
        break;
      case 3:
        r.repeatedUint32(wireType, "default", defaultIndices);
        break;
      case 4:
        r.expect(wireType, WIRE_VARINT, "disabled", offset);
        disabled = r.varint() !== 0;
        break;
      case 5: {
        r.expect(wireType, WIRE_VARINT, "click_mode", offset);
        const raw = r.uint32("click_mode");
        const mode = clickModeFromWire(raw);
        if (mode === null) r.fail("WIRE_INVALID_ENUM", `click_mode ${String(raw)}`, offset);
        clickMode = mode;
        break;
      }
      case 6:
        r.expect(wireType, WIRE_LEN, "form_id", offset);
        formId = r.string();
        break;
      case 7:
        r.repeatedUint32(wireType, "value", value);
        break;
      case 8:
        r.expect(wireType, WIRE_VARINT, "set_value", offset);
        setValue = r.varint() !== 0;
        break;
      case 9: {
        r.expect(wireType, WIRE_VARINT, "selection_visualization", offset);
        const raw = r.uint32("selection_visualization");
        const vis = selectionVisualizationFromWire(raw);
        if (vis === null) {
          r.fail("WIRE_INVALID_ENUM", `selection_visualization ${String(raw)}`, offset);
        }
        selectionVisualization = vis;
        break;
      }
      default:
        r.skip(wireType, offset);
    }
  }

  return Object.freeze({
    id,
    options: Object.freeze(options),
    defaultIndices: Object.freeze(defaultIndices),
    disabled,
    clickMode,
    formId,
    value: Object.freeze(value),
    setValue,
    selectionVisualization,
  });
}

export function encodeButtonGroupDescriptor(descriptor: ButtonGroupDescriptor): Uint8Array {
  const w = new WireWriter();
  writeDescriptor(w, descriptor);
  return w.finish();
}

export function decodeButtonGroupDescriptor(bytes: Uint8Array): ParseResult<ButtonGroupDescriptor> {
  return decodeWith(bytes, readDescriptor);
}

// =============================================================================
// ValueUpdate
// =============================================================================

export function encodeValueUpdate(update: ValueUpdate): Uint8Array {
  const w = new WireWriter();
  w.string(1, update.id);
  w.packedUint32(2, update.value, "value");
  return w.finish();
}

export function decodeValueUpdate(bytes: Uint8Array): ParseResult<ValueUpdate> {
  return decodeWith(bytes, (r) => {
    let id = "";
    const value: number[] = [];
    while (!r.done()) {
      const { field, wireType, offset } = r.tag();
      switch (field) {
        case 1:
          r.expect(wireType, WIRE_LEN, "id", offset);
          id = r.string();
          break;
        case 2:
          r.repeatedUint32(wireType, "value", value);
          break;
        default:
          r.skip(wireType, offset);
      }
    }
    return Object.freeze({ id, value: Object.freeze(value) });
  });
}

// =============================================================================
// RenderPass
// =============================================================================

export function encodeRenderPass(pass: RenderPass): Uint8Array {
  const w = new WireWriter(256);
  w.uint32(1, pass.scriptRunId, "script_run_id");
  for (const widget of pass.widgets) {
    const inner = new WireWriter();
    writeDescriptor(inner, widget);
    w.bytes(2, inner.finish());
  }
  return w.finish();
}

export function decodeRenderPass(bytes: Uint8Array): ParseResult<RenderPass> {
  return decodeWith(bytes, (r) => {
    let scriptRunId = 0;
    const widgets: ButtonGroupDescriptor[] = [];
    while (!r.done()) {
      const { field, wireType, offset } = r.tag();
      switch (field) {
        case 1:
          r.expect(wireType, WIRE_VARINT, "script_run_id", offset);
          scriptRunId = r.uint32("script_run_id");
          break;
        case 2:
          r.expect(wireType, WIRE_LEN, "widgets", offset);
          widgets.push(readDescriptor(r.sub()));
          break;
        default:
          r.skip(wireType, offset);
      }
    }
    return Object.freeze({ scriptRunId, widgets: Object.freeze(widgets) });
  });
}
