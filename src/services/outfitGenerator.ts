/**
 * Outfit Generator Service
 * Picks one item per category at random, subject to the outfit policy.
 *
 * Each category's items are shuffled, then a depth-first search walks the
 * categories in order and backtracks as soon as a partial outfit breaks a
 * rule. The first complete outfit wins, so the shuffle is what makes it random.
 */

import { getSlotForCategory } from "../constants/slots.js";
import {
  NoEligibleItemsError,
  NoValidOutfitError,
  RequiredPieceNotFoundError,
  UnknownCategoryError,
} from "../utils/errors.js";
import { debugLog } from "../utils/log.js";
import { createRandom, shuffle, type RandomSource } from "../utils/random.js";
import { addBreadcrumb } from "../utils/sentry.js";
import {
  filterBySeason,
  resolveSeason,
  type SeasonOption,
  type WearableSeason,
} from "../utils/seasonalFilter.js";
import { findItemCategory, getCategories, hasCategory, type Closet } from "./closet.js";
import {
  createOutfitPolicy,
  type OutfitPolicy,
  type PolicyOptions,
  type SelectedPiece,
} from "./outfitPolicy.js";

// ============================================================================
// TYPES
// ============================================================================

export interface GenerationOptions extends PolicyOptions {
  season?: SeasonOption;
  /** Item names that must not be picked */
  exclude?: Iterable<string>;
  /** Categories to dress, in this order. Defaults to every category in the closet */
  categories?: string[];
  skip?: string[];
  seed?: string;
  /** Overrides `seed` */
  random?: RandomSource;
  now?: Date;
}

export interface GeneratedOutfit {
  pieces: SelectedPiece[];
  season: WearableSeason | null;
  /** Partial outfits checked against the policy */
  checked: number;
}

interface Candidates {
  category: string;
  pieces: SelectedPiece[];
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function assertKnownCategories(closet: Closet, names: readonly string[]): void {
  const known = getCategories(closet);
  for (const name of names) {
    if (!hasCategory(closet, name)) {
      throw new UnknownCategoryError(name, known);
    }
  }
}

/**
 * Categories to dress, in order. The category of a required piece is always
 * dressed, even when the selection left it out.
 */
export function resolveCategories(
  closet: Closet,
  options: Pick<GenerationOptions, "categories" | "skip">,
  requiredCategory: string | null = null
): string[] {
  const selected =
    options.categories && options.categories.length > 0
      ? options.categories
      : getCategories(closet);
  const skip = options.skip ?? [];

  assertKnownCategories(closet, selected);
  assertKnownCategories(closet, skip);

  const result = Array.from(new Set(selected)).filter((category) => !skip.includes(category));
  if (requiredCategory && !result.includes(requiredCategory)) {
    result.push(requiredCategory);
  }
  return result;
}

function buildCandidates(
  closet: Closet,
  category: string,
  policy: OutfitPolicy,
  excluded: ReadonlySet<string>,
  season: WearableSeason | null
): Candidates {
  const slot = getSlotForCategory(category);
  const inSeason = season ? filterBySeason(closet[category], season) : closet[category];

  const pieces = inSeason
    .filter((item) => !excluded.has(item.name))
    .map((item): SelectedPiece => ({ category, slot, item }))
    .filter((piece) => policy.isValid([piece]));

  if (pieces.length === 0) {
    throw new NoEligibleItemsError(category);
  }
  return { category, pieces };
}

// ============================================================================
// MAIN GENERATION
// ============================================================================

export function generateOutfit(closet: Closet, options: GenerationOptions = {}): GeneratedOutfit {
  let requiredCategory: string | null = null;
  if (options.include) {
    requiredCategory = findItemCategory(closet, options.include);
    if (!requiredCategory) {
      throw new RequiredPieceNotFoundError(options.include);
    }
  }

  const categories = resolveCategories(closet, options, requiredCategory);
  const policy = createOutfitPolicy(options, requiredCategory);
  const excluded = new Set(options.exclude ?? []);
  const season = options.season ? resolveSeason(options.season, options.now) : null;
  const random = options.random ?? createRandom(options.seed);

  addBreadcrumb("generator", "Generating outfit", {
    categories,
    season,
    excluded: excluded.size,
  });

  // To generate a different outfit each time
  const candidates = categories.map((category) => {
    const { pieces } = buildCandidates(closet, category, policy, excluded, season);
    return { category, pieces: shuffle(pieces, random) };
  });

  debugLog(
    "Generator",
    `Candidates: ${candidates.map((entry) => `${entry.category}=${entry.pieces.length}`).join(" ")}`
  );

  let checked = 0;
  const search = (depth: number, picked: SelectedPiece[]): SelectedPiece[] | null => {
    if (depth === candidates.length) return picked;

    for (const piece of candidates[depth].pieces) {
      const next = [...picked, piece];
      checked++;
      if (!policy.isValid(next)) continue;

      const found = search(depth + 1, next);
      if (found) return found;
    }
    return null;
  };

  const pieces = search(0, []);
  if (!pieces) {
    throw new NoValidOutfitError();
  }

  debugLog("Generator", `Found outfit after ${checked} checks`);
  return { pieces, season, checked };
}
