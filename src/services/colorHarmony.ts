/**
 * Color Harmony Service
 * An outfit may carry any number of neutrals but only one accent color
 */

import { DEFAULT_NEUTRAL_COLORS } from "../utils/config.js";

/**
 * Normalize color name for lookup
 */
export function normalizeColor(color: string): string {
  return color.toLowerCase().trim();
}

export function isNeutral(color: string, neutrals: ReadonlySet<string>): boolean {
  return neutrals.has(normalizeColor(color));
}

export function buildNeutralSet(colors: readonly string[] = DEFAULT_NEUTRAL_COLORS): Set<string> {
  return new Set(colors.map(normalizeColor));
}

/**
 * Distinct non-neutral colors in the outfit
 */
export function getAccentColors(colors: readonly string[], neutrals: ReadonlySet<string>): string[] {
  const accents = new Set<string>();
  for (const color of colors) {
    if (!isNeutral(color, neutrals)) {
      accents.add(normalizeColor(color));
    }
  }
  return Array.from(accents);
}

export function isColorMatched(colors: readonly string[], neutrals: ReadonlySet<string>): boolean {
  return getAccentColors(colors, neutrals).length <= 1;
}
