import {
  NoEligibleItemsError,
  NoValidOutfitError,
  RequiredPieceNotFoundError,
  UnknownCategoryError,
} from "../../utils/errors.js";
import { generateOutfit, resolveCategories } from "../outfitGenerator.js";
import { createOutfitPolicy } from "../outfitPolicy.js";
import { buildCloset, item, neutralCloset } from "./fixtures.js";

const SEEDS = Array.from({ length: 40 }, (_, index) => `seed-${index}`);

function names(outfit: ReturnType<typeof generateOutfit>): string[] {
  return outfit.pieces.map((piece) => piece.item.name);
}

describe("generateOutfit", () => {
  it("returns exactly one piece per category, in closet order", () => {
    const closet = neutralCloset();

    for (const seed of SEEDS) {
      const outfit = generateOutfit(closet, { seed });

      expect(outfit.pieces.map((piece) => piece.category)).toEqual([
        "tops",
        "bottoms",
        "jackets",
        "shoes",
      ]);
      for (const piece of outfit.pieces) {
        expect(closet[piece.category]).toContain(piece.item);
      }
    }
  });

  it("picks the same outfit for the same seed", () => {
    const closet = neutralCloset();
    expect(names(generateOutfit(closet, { seed: "wednesday" }))).toEqual(
      names(generateOutfit(closet, { seed: "wednesday" }))
    );
  });

  it("varies across seeds", () => {
    const closet = neutralCloset();
    const tops = new Set(SEEDS.map((seed) => generateOutfit(closet, { seed }).pieces[0].item.name));
    expect(tops.size).toBeGreaterThan(1);
  });

  it("assigns slots from category names", () => {
    const outfit = generateOutfit(neutralCloset(), { seed: "slots" });
    expect(outfit.pieces.map((piece) => piece.slot)).toEqual(["top", "bottom", "outerwear", "footwear"]);
  });

  it("fails cleanly on an empty category", () => {
    const closet = buildCloset({ tops: [item("tee")], hats: [] });

    expect(() => generateOutfit(closet, { seed: "x" })).toThrow(NoEligibleItemsError);
    try {
      generateOutfit(closet, { seed: "x" });
    } catch (error) {
      expect(error).toBeInstanceOf(NoEligibleItemsError);
      if (error instanceof NoEligibleItemsError) {
        expect(error.category).toBe("hats");
      }
    }
  });

  it("fails when a filter empties a category", () => {
    const closet = buildCloset({
      tops: [item("silk blouse", { fancy: true })],
      shoes: [item("sneakers")],
    });
    expect(() => generateOutfit(closet, { fancy: true })).toThrow(
      'No eligible items left in category "shoes"'
    );
  });

  it("fails when no combination satisfies the rules", () => {
    const closet = buildCloset({
      tops: [item("red tee", { color: "red" })],
      bottoms: [item("green skirt", { color: "green" })],
    });
    expect(() => generateOutfit(closet, { seed: "x" })).toThrow(NoValidOutfitError);
  });

  it("backtracks to the only valid combinations", () => {
    const closet = buildCloset({
      tops: [
        item("red tee", { color: "red" }),
        item("blue tee", { color: "blue" }),
        item("white tee", { color: "white" }),
      ],
      bottoms: [item("green skirt", { color: "green" }), item("black jeans")],
      shoes: [item("blue flats", { color: "blue" })],
    });

    for (const seed of SEEDS) {
      const [top, bottom, shoes] = names(generateOutfit(closet, { seed }));
      expect(["blue tee", "white tee"]).toContain(top);
      expect(bottom).toBe("black jeans");
      expect(shoes).toBe("blue flats");
    }
  });

  it("always wears the required piece", () => {
    const closet = neutralCloset();
    for (const seed of SEEDS) {
      expect(names(generateOutfit(closet, { seed, include: "tan chinos" }))).toContain("tan chinos");
    }
  });

  it("rejects an unknown required piece", () => {
    expect(() => generateOutfit(neutralCloset(), { include: "pink tutu" })).toThrow(
      RequiredPieceNotFoundError
    );
  });

  it("dresses the required piece's category even when skipped", () => {
    const outfit = generateOutfit(neutralCloset(), {
      seed: "x",
      skip: ["shoes"],
      include: "white sneakers",
    });
    expect(outfit.pieces.map((piece) => piece.category)).toEqual([
      "tops",
      "bottoms",
      "jackets",
      "shoes",
    ]);
    expect(outfit.pieces[3].item.name).toBe("white sneakers");
  });

  it("leaves out excluded pieces", () => {
    for (const seed of SEEDS) {
      const outfit = generateOutfit(neutralCloset(), {
        seed,
        exclude: ["white tee", "black shirt"],
      });
      expect(outfit.pieces[0].item.name).toBe("gray sweater");
    }
  });

  it("filters by season", () => {
    const closet = buildCloset({
      tops: [item("linen shirt", { seasons: ["summer"] }), item("wool sweater", { seasons: ["fall", "winter"] })],
      shoes: [item("boots", { seasons: ["all"] })],
    });

    for (const seed of SEEDS) {
      const outfit = generateOutfit(closet, { seed, season: "winter" });
      expect(names(outfit)).toEqual(["wool sweater", "boots"]);
      expect(outfit.season).toBe("winter");
    }
  });

  it("resolves an automatic season from the date", () => {
    const closet = buildCloset({
      tops: [item("linen shirt", { seasons: ["summer"] }), item("wool sweater", { seasons: ["winter"] })],
    });
    const outfit = generateOutfit(closet, { season: "auto", now: new Date(2024, 6, 4) });

    expect(outfit.season).toBe("summer");
    expect(names(outfit)).toEqual(["linen shirt"]);
  });

  it("honors the warmth level on bottoms and outerwear", () => {
    const closet = buildCloset({
      tops: [item("tee", { warmth: 1 })],
      bottoms: [item("shorts", { warmth: 1 }), item("wool pants", { warmth: 3 })],
      jackets: [item("windbreaker", { warmth: 1 }), item("parka", { warmth: 3 })],
    });

    for (const seed of SEEDS) {
      expect(names(generateOutfit(closet, { seed, warmth: 3 }))).toEqual(["tee", "wool pants", "parka"]);
    }
  });

  it("produces outfits that satisfy the policy", () => {
    const closet = buildCloset({
      tops: [
        item("red tee", { color: "red", loose: true, comfort: 3 }),
        item("blue shirt", { color: "blue", comfort: 2 }),
        item("white tank", { color: "white", comfort: 3 }),
      ],
      bottoms: [
        item("wide jeans", { color: "jeanblue", loose: true, comfort: 3 }),
        item("red skirt", { color: "red", comfort: 2 }),
        item("black slacks", { comfort: 2 }),
      ],
      shoes: [
        item("blue heels", { color: "blue", comfort: 1 }),
        item("white sneakers", { color: "white", comfort: 3 }),
      ],
    });
    const options = { comfort: 2 };
    const policy = createOutfitPolicy(options);

    for (const seed of SEEDS) {
      const outfit = generateOutfit(closet, { ...options, seed });
      expect(outfit.pieces).toHaveLength(3);
      expect(policy.isValid(outfit.pieces)).toBe(true);
      expect(outfit.checked).toBeGreaterThanOrEqual(3);
    }
  });

  it("uses an injected random source", () => {
    // always 0: shuffle rotates [a, b, c] to [b, c, a]
    const closet = buildCloset({ tops: [item("a"), item("b"), item("c")] });
    expect(names(generateOutfit(closet, { random: () => 0 }))).toEqual(["b"]);
  });
});

describe("resolveCategories", () => {
  const closet = neutralCloset();

  it("defaults to every category", () => {
    expect(resolveCategories(closet, {})).toEqual(["tops", "bottoms", "jackets", "shoes"]);
  });

  it("follows the requested order and drops skipped ones", () => {
    expect(resolveCategories(closet, { categories: ["shoes", "tops", "jackets"], skip: ["jackets"] })).toEqual([
      "shoes",
      "tops",
    ]);
  });

  it("rejects unknown categories", () => {
    expect(() => resolveCategories(closet, { categories: ["hats"] })).toThrow(UnknownCategoryError);
    expect(() => resolveCategories(closet, { skip: ["socks"] })).toThrow(UnknownCategoryError);
  });

  it("does not treat inherited object keys as categories", () => {
    expect(() => resolveCategories(closet, { categories: ["toString"] })).toThrow(
      'Unknown category "toString" (closet has: tops, bottoms, jackets, shoes)'
    );
    expect(() => resolveCategories(closet, { skip: ["hasOwnProperty"] })).toThrow(UnknownCategoryError);
  });
});
