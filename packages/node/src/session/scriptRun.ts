/**
 * packages/node/src/session/scriptRun.ts — Script-facing API for one rerun.
 */

import type { ButtonGroupDescriptor, Selection } from "@rerun-ui/core";
import { type ButtonGroupCall, type EncoderContext, encodeButtonGroup } from "../encoder/buttonGroup.js";

export type ScriptRunContext = Readonly<{
  /** Monotonic per session, starting at 1. */
  scriptRunId: number;
  sessionId: string;
  /** Declare a button group; returns its current value. */
  buttonGroup: (call: ButtonGroupCall) => Selection;
  /** Push `value` to widget `id` on the next rerun. */
  setWidgetValue: (id: string, value: readonly number[]) => void;
}>;

export type ScriptFn = (ctx: ScriptRunContext) => void;

export type ScriptRunCollector = Readonly<{
  ctx: ScriptRunContext;
  widgets: () => readonly ButtonGroupDescriptor[];
}>;

export function createScriptRunContext(
  sessionId: string,
  scriptRunId: number,
  encoder: EncoderContext,
): ScriptRunCollector {
  const widgets: ButtonGroupDescriptor[] = [];

  const ctx: ScriptRunContext = Object.freeze({
    scriptRunId,
    sessionId,
    buttonGroup: (call: ButtonGroupCall) => {
      const encoded = encodeButtonGroup(encoder, call);
      widgets.push(encoded.descriptor);
      return encoded.value;
    },
    setWidgetValue: (id: string, value: readonly number[]) => {
      encoder.state.queueValue(id, value);
    },
  });

  return Object.freeze({
    ctx,
    widgets: () => Object.freeze([...widgets]),
  });
}
