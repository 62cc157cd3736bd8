/**
 * packages/node/src/session/sessionManager.ts — Connected session registry.
 *
 * Why: Session state is created on connect and evicted on close; nothing
 * about a session outlives it. The manager is the only place sessions are
 * created, so id uniqueness and the session cap are enforced here.
 */

import { randomUUID } from "node:crypto";
import {
  type IconRegistry,
  RerunUiError,
  type WarnSink,
  createDevWarner,
} from "@rerun-ui/core";
import { type AppSession, type SessionClient, createAppSession } from "./appSession.js";
import type { ScriptFn } from "./scriptRun.js";

export type SessionManagerOptions = Readonly<{
  /** Executed synchronously on every rerun. */
  script: ScriptFn;
  /** Validates icon tokens in widget labels at encode time. */
  icons?: IconRegistry;
  warn?: WarnSink;
  /** Default: NODE_ENV !== "production". */
  devMode?: boolean;
  /** Default: unlimited. */
  maxSessions?: number;
  /** Rerun after an accepted value update. Default: true. */
  rerunOnValueUpdate?: boolean;
}>;

export type ConnectSessionOptions = Readonly<{
  sessionIdOverride?: string;
}>;

export type SessionInfo = Readonly<{
  client: SessionClient;
  session: AppSession;
}>;

export type SessionManager = Readonly<{
  connectSession: (client: SessionClient, opts?: ConnectSessionOptions) => string;
  /** Shut the session down and drop its state. Unknown ids are ignored. */
  closeSession: (sessionId: string) => void;
  getSessionInfo: (sessionId: string) => SessionInfo | undefined;
  listSessions: () => readonly SessionInfo[];
}>;

function invalidProps(detail: string): never {
  throw new RerunUiError("RRUI_INVALID_PROPS", `createSessionManager: ${detail}`);
}

function validateOptions(opts: SessionManagerOptions): void {
  if (typeof opts.script !== "function") invalidProps("script must be a function");
  if (opts.warn !== undefined && typeof opts.warn !== "function") {
    invalidProps("warn must be a function");
  }
  if (opts.devMode !== undefined && typeof opts.devMode !== "boolean") {
    invalidProps("devMode must be a boolean");
  }
  if (opts.rerunOnValueUpdate !== undefined && typeof opts.rerunOnValueUpdate !== "boolean") {
    invalidProps("rerunOnValueUpdate must be a boolean");
  }
  if (
    opts.maxSessions !== undefined &&
    (!Number.isInteger(opts.maxSessions) || opts.maxSessions < 1)
  ) {
    invalidProps(`maxSessions must be a positive integer, got ${String(opts.maxSessions)}`);
  }
}

export function createSessionManager(opts: SessionManagerOptions): SessionManager {
  validateOptions(opts);
  const maxSessions = opts.maxSessions ?? Number.POSITIVE_INFINITY;
  const rerunOnValueUpdate = opts.rerunOnValueUpdate ?? true;
  const sessions = new Map<string, SessionInfo>();

  return Object.freeze({
    connectSession: (client: SessionClient, connectOpts?: ConnectSessionOptions) => {
      if (!client || typeof client.write !== "function") {
        throw new RerunUiError("RRUI_INVALID_PROPS", "connectSession: client.write must be a function");
      }
      const id = connectOpts?.sessionIdOverride ?? randomUUID();
      if (id.length === 0) {
        throw new RerunUiError("RRUI_INVALID_PROPS", "connectSession: session id must be non-empty");
      }
      if (sessions.has(id)) {
        throw new RerunUiError("RRUI_DUPLICATE_ID", `session id "${id}" registered twice`);
      }
      if (sessions.size >= maxSessions) {
        throw new RerunUiError(
          "RRUI_INVALID_STATE",
          `connectSession: session limit ${String(maxSessions)} reached`,
        );
      }

      const session = createAppSession({
        id,
        client,
        script: opts.script,
        dev: createDevWarner(`session:${id}`, { devMode: opts.devMode, warn: opts.warn }),
        icons: opts.icons,
        rerunOnValueUpdate,
      });
      sessions.set(id, Object.freeze({ client, session }));
      return id;
    },
    closeSession: (sessionId: string) => {
      const info = sessions.get(sessionId);
      if (!info) return;
      sessions.delete(sessionId);
      info.session.shutdown();
    },
    getSessionInfo: (sessionId: string) => sessions.get(sessionId),
    listSessions: () => Object.freeze([...sessions.values()]),
  });
}
