import { resolveImagePath, type CategorySummary, type Closet } from "../services/closet.js";
import type { GeneratedOutfit } from "../services/outfitGenerator.js";

export function formatOutfit(outfit: GeneratedOutfit): string {
  return `Your outfit for today: ${outfit.pieces.map((piece) => piece.item.name).join(", ")}`;
}

export function formatOutfitJson(outfit: GeneratedOutfit, imagesDir: string): string {
  return JSON.stringify(
    {
      season: outfit.season,
      pieces: outfit.pieces.map((piece) => ({
        category: piece.category,
        slot: piece.slot,
        name: piece.item.name,
        image: resolveImagePath(piece.item, imagesDir),
      })),
    },
    null,
    2
  );
}

export function formatClosetSummary(summary: CategorySummary[]): string {
  const width = Math.max(...summary.map((entry) => entry.category.length));
  const total = summary.reduce((sum, entry) => sum + entry.count, 0);
  const lines = summary.map(
    (entry) => `${entry.category.padEnd(width)}  ${entry.count} item${entry.count === 1 ? "" : "s"}`
  );
  return [...lines, `${total} items in ${summary.length} categories`].join("\n");
}

export function formatItemList(closet: Closet, categories: string[]): string {
  return categories
    .map((category) => {
      const names = closet[category].map((item) => `  - ${item.name}`);
      return [`${category}:`, ...names].join("\n");
    })
    .join("\n");
}
