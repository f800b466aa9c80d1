/**
 * Seasonal Filter Utility
 * Keeps the items that can be worn in a given season
 */

export const SEASONS = ["spring", "summer", "fall", "winter", "all"] as const;

export type Season = (typeof SEASONS)[number];
export type WearableSeason = Exclude<Season, "all">;
export type SeasonOption = WearableSeason | "auto";

export interface SeasonTagged {
  attributes: {
    seasons?: Season[];
  };
}

// Month index (0 = January) -> season, northern hemisphere
const MONTH_TO_SEASON: WearableSeason[] = [
  "winter",
  "winter",
  "spring",
  "spring",
  "spring",
  "summer",
  "summer",
  "summer",
  "fall",
  "fall",
  "fall",
  "winter",
];

export function getSeasonForDate(date: Date): WearableSeason {
  return MONTH_TO_SEASON[date.getMonth()];
}

/**
 * "auto" resolves from the calendar
 */
export function resolveSeason(option: SeasonOption, now: Date = new Date()): WearableSeason {
  return option === "auto" ? getSeasonForDate(now) : option;
}

/**
 * Untagged items and "all" items fit every season
 */
export function isInSeason(item: SeasonTagged, season: WearableSeason): boolean {
  const itemSeasons = item.attributes.seasons ?? [];
  if (itemSeasons.length === 0) return true;
  return itemSeasons.includes("all") || itemSeasons.includes(season);
}

export function filterBySeason<T extends SeasonTagged>(items: T[], season: WearableSeason): T[] {
  return items.filter((item) => isInSeason(item, season));
}
