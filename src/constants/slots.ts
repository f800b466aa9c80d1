/**
 * Outfit slots
 * Closet categories are free-form names; the style rules reason about slots.
 */

export const OUTFIT_SLOTS = ["top", "bottom", "outerwear", "footwear", "accessory"] as const;

export type OutfitSlot = (typeof OUTFIT_SLOTS)[number];

// Slots whose warmth must match --warmth
export const WARMTH_SLOTS: readonly OutfitSlot[] = ["bottom", "outerwear"];

// At most one loose piece among these
export const SILHOUETTE_SLOTS: readonly OutfitSlot[] = ["top", "bottom"];

// Category to slot mapping
const CATEGORY_TO_SLOT: Record<string, OutfitSlot> = {
  top: "top",
  tops: "top",
  shirt: "top",
  shirts: "top",
  "t-shirt": "top",
  "t-shirts": "top",
  blouse: "top",
  blouses: "top",
  sweater: "top",
  sweaters: "top",
  hoodie: "top",
  hoodies: "top",

  bottom: "bottom",
  bottoms: "bottom",
  pants: "bottom",
  jeans: "bottom",
  trousers: "bottom",
  shorts: "bottom",
  skirt: "bottom",
  skirts: "bottom",

  jacket: "outerwear",
  jackets: "outerwear",
  coat: "outerwear",
  coats: "outerwear",
  blazer: "outerwear",
  blazers: "outerwear",
  outerwear: "outerwear",

  shoe: "footwear",
  shoes: "footwear",
  sneakers: "footwear",
  boots: "footwear",
  sandals: "footwear",
  footwear: "footwear",

  accessory: "accessory",
  accessories: "accessory",
  hats: "accessory",
  scarves: "accessory",
  bags: "accessory",
  jewelry: "accessory",
};

export function getSlotForCategory(category: string): OutfitSlot | null {
  const normalized = category.toLowerCase().trim();
  return CATEGORY_TO_SLOT[normalized] ?? null;
}
