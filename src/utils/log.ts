/**
 * Console logging with [Tag] prefixes. Everything goes to stderr so stdout
 * only ever carries the outfit.
 */

let verbose = false;

export function setVerbose(enabled: boolean) {
  verbose = enabled;
}

export function debugLog(tag: string, message: string) {
  if (!verbose) return;
  console.error(`[${tag}] ${message}`);
}
