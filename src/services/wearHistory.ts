/**
 * Wear History
 * Remembers what was worn on which day so recent pieces can be skipped.
 *
 * If a piece was worn on day D with noRepeatDays = N, days D through D+N are
 * blocked; from D+N+1 it is eligible again. N = 0 blocks nothing.
 */

import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";

import { HistoryFormatError } from "../utils/errors.js";
import { debugLog } from "../utils/log.js";

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const historySchema = z.object({
  entries: z.array(
    z.object({
      date: z.string().regex(DATE_REGEX, "date_must_be_yyyy_mm_dd"),
      items: z.array(z.string().min(1)),
    })
  ),
});

export type WearHistory = z.infer<typeof historySchema>;
export type WearEntry = WearHistory["entries"][number];

export function emptyHistory(): WearHistory {
  return { entries: [] };
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function toDateKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function dateKeyToDayNumber(key: string): number {
  const [year, month, day] = key.split("-").map(Number);
  return Math.round(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

export async function loadHistory(filePath: string): Promise<WearHistory> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      debugLog("History", `No history at ${filePath}, starting fresh`);
      return emptyHistory();
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new HistoryFormatError(filePath, error instanceof Error ? error.message : String(error));
  }

  const result = historySchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new HistoryFormatError(filePath, `${issue.path.join(".")}: ${issue.message}`);
  }
  return result.data;
}

export async function saveHistory(filePath: string, history: WearHistory): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(history, null, 2)}\n`, "utf8");
  debugLog("History", `Saved ${history.entries.length} entries to ${filePath}`);
}

export function recordOutfit(history: WearHistory, itemNames: string[], date: Date): WearHistory {
  return {
    entries: [...history.entries, { date: toDateKey(date), items: [...itemNames] }],
  };
}

/**
 * Names of pieces still inside the no-repeat window on `today`
 */
export function recentlyWornItems(history: WearHistory, today: Date, days: number): Set<string> {
  const blocked = new Set<string>();
  if (days <= 0) return blocked;

  const todayNumber = dateKeyToDayNumber(toDateKey(today));
  for (const entry of history.entries) {
    const age = todayNumber - dateKeyToDayNumber(entry.date);
    if (age >= 0 && age <= days) {
      entry.items.forEach((name) => blocked.add(name));
    }
  }
  return blocked;
}
