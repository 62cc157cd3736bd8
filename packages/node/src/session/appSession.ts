/**
 * packages/node/src/session/appSession.ts — One connected client's session.
 *
 * Why: Widget state is scoped to a session and lives exactly as long as the
 * session does. A rerun executes the script synchronously, sends the
 * resulting render pass to the client, and evicts widgets the script stopped
 * producing. Value updates from the client merge into session state and
 * (by default) trigger the next rerun.
 */

import {
  type ButtonGroupDescriptor,
  type DevWarner,
  type IconRegistry,
  RerunUiError,
  type ValueUpdate,
  decodeValueUpdate,
  encodeRenderPass,
} from "@rerun-ui/core";
import { type ScriptFn, createScriptRunContext } from "./scriptRun.js";
import { type WidgetSessionState, createWidgetSessionState } from "./widgetState.js";

/** Transport collaborator: receives encoded render passes in order. */
export type SessionClient = Readonly<{
  write: (bytes: Uint8Array) => void;
}>;

export type RunResult = Readonly<{
  scriptRunId: number;
  widgets: readonly ButtonGroupDescriptor[];
  /** Widget ids whose state was evicted after this run. */
  evicted: readonly string[];
  /** Error thrown by the script, if it did not complete. */
  error: Error | null;
}>;

export type AppSessionOptions = Readonly<{
  id: string;
  client: SessionClient;
  script: ScriptFn;
  dev: DevWarner;
  icons?: IconRegistry;
  rerunOnValueUpdate: boolean;
}>;

export type AppSession = Readonly<{
  id: string;
  widgets: WidgetSessionState;
  rerun: () => RunResult;
  /** Merge updates, then rerun once if any was accepted and reruns are enabled. */
  applyValueUpdates: (updates: readonly ValueUpdate[]) => RunResult | null;
  /** Decode one wire ValueUpdate and apply it. */
  handleBackMessage: (bytes: Uint8Array) => RunResult | null;
  shutdown: () => void;
  readonly isShutdown: boolean;
  readonly lastRun: RunResult | null;
}>;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createAppSession(opts: AppSessionOptions): AppSession {
  const { id, client, script, dev, icons } = opts;
  const widgets = createWidgetSessionState(dev);
  let scriptRunId = 0;
  let running = false;
  let shutdownDone = false;
  let lastRun: RunResult | null = null;

  function assertLive(op: string): void {
    if (shutdownDone) {
      throw new RerunUiError("RRUI_INVALID_STATE", `${op}: session "${id}" is shut down`);
    }
  }

  function rerun(): RunResult {
    assertLive("rerun");
    if (running) {
      throw new RerunUiError("RRUI_INVALID_STATE", `rerun: session "${id}" is already running`);
    }
    running = true;
    scriptRunId++;

    let error: Error | null = null;
    let collected: readonly ButtonGroupDescriptor[] = [];
    try {
      widgets.beginRun();
      const run = createScriptRunContext(id, scriptRunId, { state: widgets, dev, icons });
      try {
        script(run.ctx);
      } catch (err) {
        error = toError(err);
        dev.warnOnce(`script-error:${error.message}`, `script run ${String(scriptRunId)} aborted: ${error.message}`);
      }
      collected = run.widgets();
    } finally {
      running = false;
    }
    const evicted = widgets.endRun({ completed: error === null });

    client.write(encodeRenderPass({ scriptRunId, widgets: collected }));

    const result: RunResult = Object.freeze({ scriptRunId, widgets: collected, evicted, error });
    lastRun = result;
    return result;
  }

  function applyValueUpdates(updates: readonly ValueUpdate[]): RunResult | null {
    assertLive("applyValueUpdates");
    let accepted = 0;
    for (const update of updates) {
      if (widgets.applyValueUpdate(update)) accepted++;
    }
    if (accepted === 0 || !opts.rerunOnValueUpdate) return null;
    return rerun();
  }

  function handleBackMessage(bytes: Uint8Array): RunResult | null {
    assertLive("handleBackMessage");
    const parsed = decodeValueUpdate(bytes);
    if (!parsed.ok) {
      const { code, offset, detail } = parsed.error;
      throw new RerunUiError("RRUI_PROTOCOL_ERROR", `${code} at byte ${String(offset)}: ${detail}`);
    }
    return applyValueUpdates([parsed.value]);
  }

  return Object.freeze({
    id,
    widgets,
    rerun,
    applyValueUpdates,
    handleBackMessage,
    shutdown: () => {
      if (shutdownDone) return;
      shutdownDone = true;
      widgets.clear();
    },
    get isShutdown() {
      return shutdownDone;
    },
    get lastRun() {
      return lastRun;
    },
  });
}
