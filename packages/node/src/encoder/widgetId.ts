/**
 * packages/node/src/encoder/widgetId.ts — Stable widget ids.
 *
 * An explicit user key wins. Otherwise the id hashes every field that defines
 * the widget's identity, so an equivalent call on the next rerun maps to the
 * same id and a changed call (new options, new default) to a new one.
 */

import { createHash } from "node:crypto";

export const WIDGET_ID_PREFIX = "$$WIDGET_ID";

function stableJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => stableJson(item === undefined ? null : item)).join(",")}]`;
  }
  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const parts: string[] = [];
  for (const [key, current] of entries) {
    if (current === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${stableJson(current)}`);
  }
  return `{${parts.join(",")}}`;
}

export function computeWidgetId(
  widgetType: string,
  identity: Readonly<Record<string, unknown>>,
  userKey?: string,
): string {
  if (userKey !== undefined && userKey.length > 0) {
    return `${WIDGET_ID_PREFIX}-${widgetType}-${userKey}`;
  }
  const digest = createHash("sha256").update(widgetType).update("\0").update(stableJson(identity));
  return `${WIDGET_ID_PREFIX}-${digest.digest("hex").slice(0, 32)}-${widgetType}`;
}
