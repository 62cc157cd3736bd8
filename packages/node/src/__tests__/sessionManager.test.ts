import assert from "node:assert/strict";
import test from "node:test";
import { RerunUiError } from "@rerun-ui/core";
import { type SessionManagerOptions, createSessionManager } from "../session/sessionManager.js";
import type { ScriptFn } from "../session/scriptRun.js";

const script: ScriptFn = (ctx) => {
  ctx.buttonGroup({ key: "size", options: ["S", "M", "L"] });
};

const client = { write: (_bytes: Uint8Array) => {} };

function hasCode(code: string) {
  return (err: unknown) => err instanceof RerunUiError && err.code === code;
}

test("session manager: connect, look up and list sessions", () => {
  const manager = createSessionManager({ script, devMode: false });
  const a = manager.connectSession(client, { sessionIdOverride: "a" });
  const b = manager.connectSession(client);
  assert.equal(a, "a");
  assert.match(b, /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  assert.equal(manager.getSessionInfo("a")?.session.id, "a");
  assert.equal(manager.getSessionInfo("a")?.client, client);
  assert.deepEqual(
    manager.listSessions().map((info) => info.session.id),
    ["a", b],
  );
});

test("session manager: session ids are unique", () => {
  const manager = createSessionManager({ script, devMode: false });
  manager.connectSession(client, { sessionIdOverride: "a" });
  assert.throws(() => manager.connectSession(client, { sessionIdOverride: "a" }), hasCode("RRUI_DUPLICATE_ID"));
});

test("session manager: enforces the session cap", () => {
  const manager = createSessionManager({ script, devMode: false, maxSessions: 1 });
  manager.connectSession(client, { sessionIdOverride: "a" });
  assert.throws(() => manager.connectSession(client, { sessionIdOverride: "b" }), hasCode("RRUI_INVALID_STATE"));
  manager.closeSession("a");
  assert.equal(manager.connectSession(client, { sessionIdOverride: "b" }), "b");
});

test("session manager: closing a session shuts it down and drops its state", () => {
  const manager = createSessionManager({ script, devMode: false });
  manager.connectSession(client, { sessionIdOverride: "a" });
  const session = manager.getSessionInfo("a")?.session;
  session?.rerun();
  assert.equal(session?.widgets.size, 1);

  manager.closeSession("a");
  assert.equal(session?.isShutdown, true);
  assert.equal(session?.widgets.size, 0);
  assert.equal(manager.getSessionInfo("a"), undefined);
  assert.doesNotThrow(() => manager.closeSession("a"));
});

test("session manager: sessions keep separate widget values", () => {
  const manager = createSessionManager({ script, devMode: false });
  manager.connectSession(client, { sessionIdOverride: "a" });
  manager.connectSession(client, { sessionIdOverride: "b" });
  const a = manager.getSessionInfo("a")?.session;
  const b = manager.getSessionInfo("b")?.session;
  a?.rerun();
  b?.rerun();
  a?.applyValueUpdates([{ id: "$$WIDGET_ID-button_group-size", value: [2] }]);
  assert.deepEqual(a?.widgets.getCommitted("$$WIDGET_ID-button_group-size"), [2]);
  assert.deepEqual(b?.widgets.getCommitted("$$WIDGET_ID-button_group-size"), []);
});

test("session manager: rejects invalid options", () => {
  const noScript = { script: 1 } as unknown as SessionManagerOptions;
  assert.throws(
    () => createSessionManager(noScript),
    (err: unknown) =>
      err instanceof RerunUiError && err.message === "createSessionManager: script must be a function",
  );
  assert.throws(() => createSessionManager({ script, maxSessions: 0 }), hasCode("RRUI_INVALID_PROPS"));
  assert.throws(() => createSessionManager({ script, maxSessions: 1.5 }), hasCode("RRUI_INVALID_PROPS"));
});

test("session manager: rejects clients without write", () => {
  const manager = createSessionManager({ script, devMode: false });
  const broken = {} as unknown as typeof client;
  assert.throws(() => manager.connectSession(broken), hasCode("RRUI_INVALID_PROPS"));
  assert.throws(() => manager.connectSession(client, { sessionIdOverride: "" }), hasCode("RRUI_INVALID_PROPS"));
});
