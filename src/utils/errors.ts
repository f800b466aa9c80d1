/**
 * Error types
 * Everything the user can fix (bad closet file, impossible constraints) is an
 * OutfitError; the CLI prints its message and exits 1. Anything else is a bug.
 */

export type OutfitErrorCode =
  | "USAGE"
  | "CLOSET_NOT_FOUND"
  | "CLOSET_FORMAT"
  | "MISSING_IMAGE"
  | "NO_ELIGIBLE_ITEMS"
  | "NO_VALID_OUTFIT"
  | "REQUIRED_PIECE_NOT_FOUND"
  | "UNKNOWN_CATEGORY"
  | "HISTORY_FORMAT";

export class OutfitError extends Error {
  readonly code: OutfitErrorCode;

  constructor(code: OutfitErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends OutfitError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export class ClosetNotFoundError extends OutfitError {
  constructor(readonly path: string) {
    super("CLOSET_NOT_FOUND", `Closet file not found: ${path}`);
  }
}

export class ClosetFormatError extends OutfitError {
  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(
      "CLOSET_FORMAT",
      `Closet file ${path} is malformed:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`
    );
  }
}

export class MissingImageError extends OutfitError {
  constructor(readonly missing: string[]) {
    super("MISSING_IMAGE", `Image file(s) not found: ${missing.join(", ")}`);
  }
}

export class NoEligibleItemsError extends OutfitError {
  constructor(readonly category: string) {
    super("NO_ELIGIBLE_ITEMS", `No eligible items left in category "${category}"`);
  }
}

export class NoValidOutfitError extends OutfitError {
  constructor() {
    super(
      "NO_VALID_OUTFIT",
      "Outfit cannot be generated with the existing closet and constraints"
    );
  }
}

export class RequiredPieceNotFoundError extends OutfitError {
  constructor(readonly pieceName: string) {
    super(
      "REQUIRED_PIECE_NOT_FOUND",
      `Required piece "${pieceName}" not found. Make sure the name exists in your closet`
    );
  }
}

export class UnknownCategoryError extends OutfitError {
  constructor(
    readonly category: string,
    readonly known: string[]
  ) {
    super(
      "UNKNOWN_CATEGORY",
      `Unknown category "${category}" (closet has: ${known.join(", ")})`
    );
  }
}

export class HistoryFormatError extends OutfitError {
  constructor(
    readonly path: string,
    detail: string
  ) {
    super("HISTORY_FORMAT", `Wear history ${path} is malformed: ${detail}`);
  }
}

export function isOutfitError(error: unknown): error is OutfitError {
  return error instanceof OutfitError;
}
