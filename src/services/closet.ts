/**
 * Closet Service
 * Loads and validates the closet inventory file
 *
 * The file maps category name -> ordered list of items. Key order is kept
 * and used as the outfit order.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { SEASONS } from "../utils/seasonalFilter.js";
import { debugLog } from "../utils/log.js";
import { ClosetFormatError, ClosetNotFoundError, MissingImageError } from "../utils/errors.js";

// ============================================================================
// SCHEMA
// ============================================================================

const levelSchema = z.number().int().min(1).max(3);

const attributesSchema = z.object({
  color: z.string().trim().min(1, "color_required").toLowerCase(),
  warmth: levelSchema.optional(),
  comfort: levelSchema.optional(),
  fancy: z.boolean().optional().default(false),
  loose: z.boolean().optional().default(false),
  seasons: z.array(z.enum(SEASONS)).optional().default([]),
});

const itemSchema = z.object({
  name: z.string().trim().min(1, "name_required"),
  filename: z.string().trim().min(1, "filename_required"),
  attributes: attributesSchema,
});

export const closetSchema = z
  .record(z.string(), z.array(itemSchema))
  .superRefine((closet, ctx) => {
    if (Object.keys(closet).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "closet has no categories",
        path: [],
      });
    }

    const seen = new Set<string>();
    for (const [category, items] of Object.entries(closet)) {
      items.forEach((item, index) => {
        if (seen.has(item.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate item name "${item.name}"`,
            path: [category, index, "name"],
          });
        }
        seen.add(item.name);
      });
    }
  });

// ============================================================================
// TYPES
// ============================================================================

export type ClosetItem = z.infer<typeof itemSchema>;
export type Closet = z.infer<typeof closetSchema>;

export interface CategorySummary {
  category: string;
  count: number;
}

export interface MissingImage {
  category: string;
  name: string;
  imagePath: string;
}

// ============================================================================
// LOADING
// ============================================================================

function formatIssuePath(issuePath: (string | number)[]): string {
  return issuePath.length > 0 ? issuePath.join(".") : "(root)";
}

/**
 * Validate an already-parsed JSON value
 */
export function parseCloset(raw: unknown, source = "<closet>"): Closet {
  const result = closetSchema.safeParse(raw);
  if (!result.success) {
    throw new ClosetFormatError(
      source,
      result.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`)
    );
  }
  return result.data;
}

export async function loadCloset(filePath: string): Promise<Closet> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ClosetNotFoundError(filePath);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ClosetFormatError(filePath, [`invalid JSON: ${detail}`]);
  }

  const closet = parseCloset(raw, filePath);
  debugLog(
    "Closet",
    `Loaded ${filePath}: ${summarizeCloset(closet)
      .map((entry) => `${entry.category}=${entry.count}`)
      .join(" ")}`
  );
  return closet;
}

// ============================================================================
// QUERIES
// ============================================================================

export function getCategories(closet: Closet): string[] {
  return Object.keys(closet);
}

/**
 * Own keys only, so names like "toString" are not categories
 */
export function hasCategory(closet: Closet, name: string): boolean {
  return Object.hasOwn(closet, name);
}

export function summarizeCloset(closet: Closet): CategorySummary[] {
  return Object.entries(closet).map(([category, items]) => ({
    category,
    count: items.length,
  }));
}

export function findItemCategory(closet: Closet, name: string): string | null {
  for (const [category, items] of Object.entries(closet)) {
    if (items.some((item) => item.name === name)) {
      return category;
    }
  }
  return null;
}

export function resolveImagePath(item: ClosetItem, imagesDir: string): string {
  return path.join(imagesDir, item.filename);
}

export function findMissingImages(closet: Closet, imagesDir: string): MissingImage[] {
  const missing: MissingImage[] = [];
  for (const [category, items] of Object.entries(closet)) {
    for (const item of items) {
      const imagePath = resolveImagePath(item, imagesDir);
      if (!existsSync(imagePath)) {
        missing.push({ category, name: item.name, imagePath });
      }
    }
  }
  return missing;
}

/**
 * Throws when any of the given items has no image on disk
 */
export function assertImagesExist(items: ClosetItem[], imagesDir: string): void {
  const missing = items
    .map((item) => resolveImagePath(item, imagesDir))
    .filter((imagePath) => !existsSync(imagePath));

  if (missing.length > 0) {
    throw new MissingImageError(missing);
  }
}
