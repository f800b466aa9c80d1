/**
 * Runtime configuration from environment (.env is loaded by the entry point)
 */

export const DEFAULT_NEUTRAL_COLORS = ["black", "white", "tan", "gray", "jeanblue"];

export interface AppConfig {
  closetFile: string;
  imagesDir: string;
  historyFile: string;
  neutralColors: string[];
  sentryDsn: string | null;
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const neutralColors = parseList(env.OUTFIT_NEUTRAL_COLORS);

  return {
    closetFile: env.CLOSET_FILE || "closet.json",
    imagesDir: env.CLOSET_IMAGES_DIR || "images",
    historyFile: env.OUTFIT_HISTORY_FILE || ".outfit-history.json",
    neutralColors: neutralColors.length > 0 ? neutralColors : DEFAULT_NEUTRAL_COLORS,
    sentryDsn: env.SENTRY_DSN || null,
  };
}
