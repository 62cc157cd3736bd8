/**
 * packages/node/src/icons/loadIconSet.ts — Icon set loading from JSON.
 *
 * Icon sets are JSON files:
 *   { "set": "material", "icons": { "star": { "glyph": "★", "fallback": "*" },
 *                                   "label": { "text": "[label]" } } }
 * Each entry registers as `<set>/<name>`.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  type IconRegistry,
  type IconVariant,
  RerunUiError,
  createIconRegistry,
} from "@rerun-ui/core";

export const BUNDLED_ICON_SET_PATH = fileURLToPath(
  new URL("../../icons/material-rounded.json", import.meta.url),
);

function invalid(source: string, detail: string): never {
  throw new RerunUiError("RRUI_INVALID_PROPS", `icon set ${source}: ${detail}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseVariant(source: string, name: string, raw: unknown): IconVariant {
  if (!isRecord(raw)) invalid(source, `"${name}" must be an object`);
  if (typeof raw.glyph === "string") {
    const fallback = raw.fallback ?? raw.glyph;
    if (typeof fallback !== "string") invalid(source, `"${name}".fallback must be a string`);
    return { kind: "glyph", glyph: raw.glyph, fallback };
  }
  if (typeof raw.text === "string") {
    return { kind: "text", text: raw.text };
  }
  return invalid(source, `"${name}" needs a "glyph" or "text" string`);
}

function parseJson(json: string): unknown {
  return JSON.parse(json);
}

/** Parse icon set JSON into `[key, variant]` entries. */
export function parseIconSet(
  json: string,
  source = "<inline>",
): ReadonlyArray<readonly [string, IconVariant]> {
  let doc: unknown = null;
  try {
    doc = parseJson(json);
  } catch (err) {
    invalid(source, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!isRecord(doc)) invalid(source, "top level must be an object");
  const set = doc.set;
  if (typeof set !== "string" || set.length === 0) {
    invalid(source, `"set" must be a non-empty string`);
  }
  const icons = doc.icons;
  if (!isRecord(icons)) invalid(source, `"icons" must be an object`);

  const entries: Array<readonly [string, IconVariant]> = [];
  for (const name of Object.keys(icons).sort()) {
    entries.push([`${set}/${name}`, parseVariant(source, name, icons[name])]);
  }
  return Object.freeze(entries);
}

/** Register every icon of the JSON file at `filePath` into `registry`. */
export function loadIconSet(registry: IconRegistry, filePath: string): number {
  const entries = parseIconSet(readFileSync(filePath, "utf8"), filePath);
  for (const [key, variant] of entries) registry.register(key, variant);
  return entries.length;
}

/** Registry holding the bundled icon set, frozen. */
export function createDefaultIconRegistry(extraSets: readonly string[] = []): IconRegistry {
  const registry = createIconRegistry();
  loadIconSet(registry, BUNDLED_ICON_SET_PATH);
  for (const filePath of extraSets) loadIconSet(registry, filePath);
  registry.freeze();
  return registry;
}
