export type ParsedSize = {
  size: number;
  /** True when `raw` was given but was not a positive integer. */
  usedFallback: boolean;
};

/**
 * Parses a pixel size. Empty input means the default; anything that is not a
 * positive integer also falls back to it, and the caller is told so.
 */
export function parseTargetSize(raw: string | undefined, fallback: number): ParsedSize {
  const trimmed = raw?.trim() ?? "";
  if (!trimmed) {
    return { size: fallback, usedFallback: false };
  }
  if (!/^\+?\d+$/.test(trimmed)) {
    return { size: fallback, usedFallback: true };
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value) || value < 1) {
    return { size: fallback, usedFallback: true };
  }
  return { size: value, usedFallback: false };
}
