/**
 * Outfit Policy
 * Style rules checked against partial and complete outfits during the search.
 * A partial outfit passes when nothing picked so far breaks a rule, so the
 * generator can prune early.
 */

import { SILHOUETTE_SLOTS, WARMTH_SLOTS, type OutfitSlot } from "../constants/slots.js";
import type { ClosetItem } from "./closet.js";
import { buildNeutralSet, isColorMatched } from "./colorHarmony.js";

export interface PolicyOptions {
  /** Exact warmth level for bottoms and outerwear */
  warmth?: number;
  /** Minimum comfort level for every piece */
  comfort?: number;
  fancy?: boolean;
  /** Name of a piece that must be worn */
  include?: string;
  neutralColors?: readonly string[];
}

export interface SelectedPiece {
  category: string;
  slot: OutfitSlot | null;
  item: ClosetItem;
}

export interface OutfitPolicy {
  isValid(pieces: readonly SelectedPiece[]): boolean;
}

interface RequiredPiece {
  category: string;
  name: string;
}

// ============================================================================
// RULES
// ============================================================================

export function meetsWarmthLevel(pieces: readonly SelectedPiece[], warmth: number): boolean {
  return pieces.every(
    (piece) =>
      piece.slot === null ||
      !WARMTH_SLOTS.includes(piece.slot) ||
      piece.item.attributes.warmth === warmth
  );
}

export function meetsComfortLevel(pieces: readonly SelectedPiece[], comfort: number): boolean {
  return pieces.every((piece) => (piece.item.attributes.comfort ?? 0) >= comfort);
}

export function isAllFancy(pieces: readonly SelectedPiece[]): boolean {
  return pieces.every((piece) => piece.item.attributes.fancy);
}

/**
 * Either top or bottom (or neither) can be loose, but not both
 */
export function hasSilhouette(pieces: readonly SelectedPiece[]): boolean {
  const loose = pieces.filter(
    (piece) =>
      piece.slot !== null && SILHOUETTE_SLOTS.includes(piece.slot) && piece.item.attributes.loose
  );
  return loose.length <= 1;
}

function containsRequiredPiece(pieces: readonly SelectedPiece[], required: RequiredPiece): boolean {
  return pieces.every(
    (piece) => piece.category !== required.category || piece.item.name === required.name
  );
}

// ============================================================================
// POLICY
// ============================================================================

/**
 * @param requiredCategory category holding `options.include`, resolved by the caller
 */
export function createOutfitPolicy(
  options: PolicyOptions,
  requiredCategory: string | null = null
): OutfitPolicy {
  const neutrals = buildNeutralSet(options.neutralColors);
  const required: RequiredPiece | null =
    options.include && requiredCategory
      ? { category: requiredCategory, name: options.include }
      : null;

  return {
    isValid(pieces) {
      return (
        isColorMatched(
          pieces.map((piece) => piece.item.attributes.color),
          neutrals
        ) &&
        hasSilhouette(pieces) &&
        (options.warmth === undefined || meetsWarmthLevel(pieces, options.warmth)) &&
        (options.comfort === undefined || meetsComfortLevel(pieces, options.comfort)) &&
        (!options.fancy || isAllFancy(pieces)) &&
        (required === null || containsRequiredPiece(pieces, required))
      );
    },
  };
}
