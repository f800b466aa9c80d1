/**
 * Outfit Image Service
 * Stacks the item pictures top to bottom into one PNG and opens it
 */

import { spawn } from "node:child_process";
import sharp from "sharp";

import { debugLog } from "../utils/log.js";

export interface ComposeOptions {
  /** Every piece is resized to this width */
  width?: number;
  /** Vertical gap between pieces, in pixels */
  gap?: number;
}

export interface ComposedImage {
  path: string;
  width: number;
  height: number;
}

const DEFAULT_WIDTH = 400;
const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

export async function composeOutfitImage(
  imagePaths: string[],
  outPath: string,
  options: ComposeOptions = {}
): Promise<ComposedImage> {
  if (imagePaths.length === 0) {
    throw new Error("No images to compose");
  }

  const width = options.width ?? DEFAULT_WIDTH;
  const gap = options.gap ?? 0;

  const pieces = await Promise.all(
    imagePaths.map(async (imagePath) => {
      const { data, info } = await sharp(imagePath)
        .rotate()
        .resize({ width })
        .flatten({ background: WHITE })
        .png()
        .toBuffer({ resolveWithObject: true });
      return { input: data, height: info.height };
    })
  );

  let top = 0;
  const layers = pieces.map((piece) => {
    const layer = { input: piece.input, top, left: 0 };
    top += piece.height + gap;
    return layer;
  });
  const height = top - gap;

  await sharp({
    create: { width, height, channels: 4, background: WHITE },
  })
    .composite(layers)
    .png()
    .toFile(outPath);

  debugLog("Image", `Wrote ${width}x${height} outfit image to ${outPath}`);
  return { path: outPath, width, height };
}

export function viewerCommand(platform: NodeJS.Platform): { command: string; args: string[] } {
  if (platform === "darwin") return { command: "open", args: [] };
  if (platform === "win32") return { command: "cmd", args: ["/c", "start", '""'] };
  return { command: "xdg-open", args: [] };
}

/**
 * Open in the platform image viewer without waiting for it to close
 */
export function openImage(imagePath: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  const { command, args } = viewerCommand(platform);

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args, imagePath], {
      detached: true,
      stdio: "ignore",
    });
    child.once("error", (error) => reject(new Error(`Could not open image viewer "${command}": ${error.message}`)));
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}
