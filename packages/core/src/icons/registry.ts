/**
 * packages/core/src/icons/registry.ts — String-keyed icon registry.
 *
 * Why: Option labels reference icons by name (`material/star`). The registry
 * maps those names to renderable variants. It is populated once at process
 * start and then frozen; unknown names fail with NotFoundError.
 */

import { NotFoundError, RerunUiError } from "../abi.js";

/** Renderable icon variant. */
export type IconVariant =
  | Readonly<{ kind: "glyph"; glyph: string; fallback: string }>
  | Readonly<{ kind: "text"; text: string }>;

/** Icon key: `<set>/<name>`, lowercase letters, digits and underscores. */
export type IconKey = `${string}/${string}`;

export type IconRegistry = Readonly<{
  register: (key: string, variant: IconVariant) => void;
  /** Throws NotFoundError for unknown keys. */
  resolve: (key: string) => IconVariant;
  tryResolve: (key: string) => IconVariant | undefined;
  has: (key: string) => boolean;
  keys: () => readonly string[];
  /** Reject further registration. */
  freeze: () => void;
  readonly frozen: boolean;
}>;

const ICON_KEY_RE = /^[a-z][a-z0-9_]*\/[a-z0-9_]+$/u;

export function isIconKey(key: string): key is IconKey {
  return ICON_KEY_RE.test(key);
}

function freezeVariant(variant: IconVariant): IconVariant {
  switch (variant.kind) {
    case "glyph":
      return Object.freeze({ kind: "glyph", glyph: variant.glyph, fallback: variant.fallback });
    case "text":
      return Object.freeze({ kind: "text", text: variant.text });
  }
}

/** Create a registry, optionally seeded with `[key, variant]` entries. */
export function createIconRegistry(
  entries?: Iterable<readonly [string, IconVariant]>,
): IconRegistry {
  const table = new Map<string, IconVariant>();
  let frozen = false;

  const register = (key: string, variant: IconVariant): void => {
    if (frozen) {
      throw new RerunUiError("RRUI_INVALID_STATE", `icon registry is frozen; cannot register "${key}"`);
    }
    if (!isIconKey(key)) {
      throw new RerunUiError("RRUI_INVALID_PROPS", `invalid icon key "${key}" (expected "<set>/<name>")`);
    }
    table.set(key, freezeVariant(variant));
  };

  if (entries) {
    for (const [key, variant] of entries) register(key, variant);
  }

  return Object.freeze({
    register,
    resolve: (key: string) => {
      const icon = table.get(key);
      if (!icon) throw new NotFoundError(key, `unknown icon "${key}"`);
      return icon;
    },
    tryResolve: (key: string) => table.get(key),
    has: (key: string) => table.has(key),
    keys: () => Object.freeze([...table.keys()].sort()),
    freeze: () => {
      frozen = true;
    },
    get frozen() {
      return frozen;
    },
  });
}

/** Label with its leading icon token split off. */
export type IconLabel = Readonly<{
  iconKey: IconKey | null;
  text: string;
}>;

const ICON_TOKEN_RE = /^:([a-z][a-z0-9_]*\/[a-z0-9_]+):(?:\s+|$)/u;

/**
 * Split a leading `:<set>/<name>:` token from a label.
 *
 * `":material/star: Rate"` → `{ iconKey: "material/star", text: "Rate" }`.
 * Labels without a token come back unchanged with `iconKey: null`.
 */
export function parseIconLabel(content: string): IconLabel {
  const match = ICON_TOKEN_RE.exec(content);
  const key = match?.[1];
  if (!match || key === undefined || !isIconKey(key)) {
    return Object.freeze({ iconKey: null, text: content });
  }
  return Object.freeze({ iconKey: key, text: content.slice(match[0].length) });
}
