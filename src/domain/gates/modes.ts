export const SCREENING_MODES = ["strict", "permissible", "loose"] as const;

export type ScreeningMode = (typeof SCREENING_MODES)[number];

/** Legacy and canonical mode names → rule-set key. */
const MODE_ALIASES: Readonly<Record<string, ScreeningMode>> = {
  strict: "strict",
  buy: "strict",
  portfolio: "strict",
  permissible: "permissible",
  shortlist: "permissible",
  screen: "permissible",
  loose: "loose",
  broad: "loose",
};

function normalizeModeName(name: string | null | undefined): string {
  return (name ?? "").trim().toLowerCase();
}

export function isKnownModeName(name: string | null | undefined): boolean {
  return Object.hasOwn(MODE_ALIASES, normalizeModeName(name));
}

/**
 * Resolve a mode name or alias. Total: anything unrecognized resolves to
 * the strictest mode.
 */
export function resolveMode(name: string | null | undefined): ScreeningMode {
  const key = normalizeModeName(name);
  return Object.hasOwn(MODE_ALIASES, key) ? MODE_ALIASES[key] : "strict";
}
