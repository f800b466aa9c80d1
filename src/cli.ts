/**
 * Command-line interface
 *
 *   closet-picker [generate]   pick an outfit (default)
 *   closet-picker check        validate the closet file and its images
 *   closet-picker list [cat]   list items per category
 */

import { tmpdir } from "node:os";
import path from "node:path";
import yargs from "yargs";

import {
  assertImagesExist,
  findMissingImages,
  getCategories,
  hasCategory,
  loadCloset,
  resolveImagePath,
  summarizeCloset,
} from "./services/closet.js";
import { generateOutfit } from "./services/outfitGenerator.js";
import { composeOutfitImage, openImage } from "./services/outfitImage.js";
import {
  loadHistory,
  recentlyWornItems,
  recordOutfit,
  saveHistory,
} from "./services/wearHistory.js";
import type { AppConfig } from "./utils/config.js";
import { MissingImageError, UnknownCategoryError, UsageError, isOutfitError } from "./utils/errors.js";
import { formatClosetSummary, formatItemList, formatOutfit, formatOutfitJson } from "./utils/format.js";
import { debugLog, setVerbose } from "./utils/log.js";
import { SEASONS, type SeasonOption } from "./utils/seasonalFilter.js";
import { addBreadcrumb, captureError } from "./utils/sentry.js";

// ============================================================================
// TYPES
// ============================================================================

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface ClosetArgs {
  closet: string;
  images: string;
}

export interface GenerateArgs extends ClosetArgs {
  warmth?: number;
  comfort?: number;
  fancy: boolean;
  include?: string;
  season?: SeasonOption;
  exclude: string[];
  categories: string[];
  skip: string[];
  seed?: string;
  avoidRecent: number;
  save: boolean;
  json: boolean;
  image?: string;
  show: boolean;
}

export interface ListArgs extends ClosetArgs {
  category?: string;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const SEASON_OPTIONS: readonly string[] = [...SEASONS.filter((season) => season !== "all"), "auto"];

function isSeasonOption(value: string): value is SeasonOption {
  return SEASON_OPTIONS.includes(value);
}

export function parseSeasonOption(value: string | undefined): SeasonOption | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase().trim();
  if (!isSeasonOption(normalized)) {
    throw new UsageError(`Invalid season "${value}" (choose from ${SEASON_OPTIONS.join(", ")})`);
  }
  return normalized;
}

export function parseDayCount(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const text = String(value).trim();
  if (!/^\d+$/.test(text)) {
    throw new UsageError(`Invalid --avoid-recent value "${value}" (expected a whole number of days)`);
  }
  return Number(text);
}

/**
 * Accepts repeated flags and comma-separated values alike
 */
export function parseList(values: string | string[] | undefined): string[] {
  if (values === undefined) return [];
  const list = Array.isArray(values) ? values : [values];
  return list
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

// ============================================================================
// COMMANDS
// ============================================================================

export async function runGenerate(
  args: GenerateArgs,
  config: AppConfig,
  io: CliOutput = consoleOutput,
  now: Date = new Date()
): Promise<void> {
  const closet = await loadCloset(args.closet);

  const needsHistory = args.avoidRecent > 0 || args.save;
  const history = needsHistory ? await loadHistory(config.historyFile) : null;
  const recent = history ? recentlyWornItems(history, now, args.avoidRecent) : new Set<string>();
  if (recent.size > 0) {
    debugLog("History", `Skipping ${recent.size} recently worn items`);
  }

  const outfit = generateOutfit(closet, {
    warmth: args.warmth,
    comfort: args.comfort,
    fancy: args.fancy,
    include: args.include,
    season: args.season,
    exclude: [...args.exclude, ...recent],
    categories: args.categories,
    skip: args.skip,
    seed: args.seed,
    neutralColors: config.neutralColors,
    now,
  });

  io.out(args.json ? formatOutfitJson(outfit, args.images) : formatOutfit(outfit));

  if (args.image || args.show) {
    const items = outfit.pieces.map((piece) => piece.item);
    assertImagesExist(items, args.images);

    const outPath = args.image ?? path.join(tmpdir(), `outfit-${now.getTime()}.png`);
    await composeOutfitImage(
      items.map((item) => resolveImagePath(item, args.images)),
      outPath
    );
    if (args.image) {
      io.err(`Outfit image written to ${outPath}`);
    }
    if (args.show) {
      await openImage(outPath);
    }
  }

  if (history && args.save) {
    await saveHistory(
      config.historyFile,
      recordOutfit(
        history,
        outfit.pieces.map((piece) => piece.item.name),
        now
      )
    );
  }
}

export async function runCheck(args: ClosetArgs, io: CliOutput = consoleOutput): Promise<void> {
  const closet = await loadCloset(args.closet);
  io.out(formatClosetSummary(summarizeCloset(closet)));

  const missing = findMissingImages(closet, args.images);
  if (missing.length > 0) {
    for (const entry of missing) {
      io.err(`[Closet] ${entry.category}/${entry.name}: missing ${entry.imagePath}`);
    }
    throw new MissingImageError(missing.map((entry) => entry.imagePath));
  }

  const empty = summarizeCloset(closet).filter((entry) => entry.count === 0);
  for (const entry of empty) {
    io.err(`[Closet] Category "${entry.category}" is empty; outfits including it cannot be generated`);
  }
}

export async function runList(args: ListArgs, io: CliOutput = consoleOutput): Promise<void> {
  const closet = await loadCloset(args.closet);
  const known = getCategories(closet);

  if (args.category !== undefined && !hasCategory(closet, args.category)) {
    throw new UnknownCategoryError(args.category, known);
  }
  io.out(formatItemList(closet, args.category ? [args.category] : known));
}

// ============================================================================
// PARSER
// ============================================================================

export function buildParser(argv: string[], config: AppConfig, io: CliOutput = consoleOutput) {
  return yargs(argv)
    .scriptName("closet-picker")
    .usage("$0 [command] [options]")
    .option("closet", {
      type: "string",
      default: config.closetFile,
      describe: "closet inventory JSON file",
    })
    .option("images", {
      type: "string",
      default: config.imagesDir,
      describe: "directory the closet's image filenames are relative to",
    })
    .option("verbose", {
      type: "boolean",
      default: false,
      describe: "print debug output to stderr",
    })
    .middleware((args) => setVerbose(args.verbose))
    .command(
      ["generate", "$0"],
      "pick a random outfit",
      (y) =>
        y
          .option("warmth", {
            alias: "w",
            type: "number",
            choices: [1, 2, 3],
            describe: "specific warmth level for bottom and outerwear",
          })
          .option("comfort", {
            alias: "c",
            type: "number",
            choices: [1, 2, 3],
            describe: "minimum comfort level for all pieces",
          })
          .option("fancy", {
            alias: "f",
            type: "boolean",
            default: false,
            describe: "all pieces must be fancy",
          })
          .option("include", {
            alias: "i",
            type: "string",
            describe: "required piece name to include",
          })
          .option("season", {
            alias: "s",
            type: "string",
            describe: `only pieces for this season (${SEASON_OPTIONS.join(", ")})`,
            coerce: parseSeasonOption,
          })
          .option("exclude", {
            alias: "x",
            type: "string",
            array: true,
            describe: "piece names to leave out",
            coerce: parseList,
          })
          .option("categories", {
            type: "string",
            describe: "comma-separated categories to dress, in order",
            coerce: parseList,
          })
          .option("skip", {
            type: "string",
            describe: "comma-separated categories to leave out",
            coerce: parseList,
          })
          .option("seed", {
            type: "string",
            describe: "seed for a repeatable pick",
          })
          .option("avoid-recent", {
            type: "string",
            describe: "skip pieces worn in the last N days",
            coerce: parseDayCount,
          })
          .option("save", {
            type: "boolean",
            default: false,
            describe: "record this outfit in the wear history",
          })
          .option("json", {
            type: "boolean",
            default: false,
            describe: "print the outfit as JSON",
          })
          .option("image", {
            type: "string",
            describe: "write a composite outfit image to this path",
          })
          .option("show", {
            type: "boolean",
            default: false,
            describe: "open the outfit image in the system viewer",
          }),
      async (args) => {
        addBreadcrumb("cli", "generate");
        await runGenerate(
          {
            closet: args.closet,
            images: args.images,
            warmth: args.warmth,
            comfort: args.comfort,
            fancy: args.fancy,
            include: args.include,
            season: args.season,
            exclude: args.exclude ?? [],
            categories: args.categories ?? [],
            skip: args.skip ?? [],
            seed: args.seed,
            avoidRecent: args["avoid-recent"] ?? 0,
            save: args.save,
            json: args.json,
            image: args.image,
            show: args.show,
          },
          config,
          io
        );
      }
    )
    .command(
      "check",
      "validate the closet file and its images",
      (y) => y,
      async (args) => {
        addBreadcrumb("cli", "check");
        await runCheck({ closet: args.closet, images: args.images }, io);
      }
    )
    .command(
      "list [category]",
      "list the pieces in the closet",
      (y) => y.positional("category", { type: "string", describe: "only this category" }),
      async (args) => {
        addBreadcrumb("cli", "list");
        await runList({ closet: args.closet, images: args.images, category: args.category }, io);
      }
    )
    .strict()
    .help()
    .exitProcess(false)
    .fail((message, error) => {
      // yargs reports its own validation failures as YError
      if (error && error.name !== "YError") throw error;
      throw new UsageError(message || error?.message || "Invalid arguments");
    });
}

/**
 * Runs the CLI and returns the process exit code
 */
export async function runCli(
  argv: string[],
  config: AppConfig,
  io: CliOutput = consoleOutput
): Promise<number> {
  try {
    await buildParser(argv, config, io).parseAsync();
    return 0;
  } catch (error) {
    if (isOutfitError(error)) {
      io.err(error.message);
      if (error.code === "USAGE") {
        io.err("Run with --help for usage");
      }
      return 1;
    }

    io.err(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    captureError(error, { argv });
    return 2;
  }
}
