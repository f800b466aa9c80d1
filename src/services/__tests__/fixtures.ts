import { parseCloset, type Closet } from "../closet.js";

interface ItemInput {
  color?: string;
  warmth?: number;
  comfort?: number;
  fancy?: boolean;
  loose?: boolean;
  seasons?: string[];
}

export function item(name: string, attributes: ItemInput = {}) {
  return {
    name,
    filename: `${name.replace(/\s+/g, "-")}.png`,
    attributes: { color: "black", ...attributes },
  };
}

export function buildCloset(raw: Record<string, ReturnType<typeof item>[]>): Closet {
  return parseCloset(raw, "test-closet.json");
}

/**
 * Small closet where every piece is neutral and tight, so any pick is valid
 */
export function neutralCloset(): Closet {
  return buildCloset({
    tops: [item("white tee", { color: "white" }), item("black shirt"), item("gray sweater", { color: "gray" })],
    bottoms: [item("black jeans"), item("tan chinos", { color: "tan" })],
    jackets: [item("black blazer"), item("white denim jacket", { color: "white" })],
    shoes: [item("black boots"), item("white sneakers", { color: "white" })],
  });
}
