export type Size = { width: number; height: number };

/**
 * Fit `origW`x`origH` inside a square of `maxSide`, preserving aspect ratio.
 * Never upscales; the shorter side is rounded and floored at 1.
 */
export const targetSize = (origW: number, origH: number, maxSide: number): Size => {
  if (origW <= maxSide && origH <= maxSide) {
    return { width: origW, height: origH };
  }

  if (origW >= origH) {
    const ratio = maxSide / origW;
    return { width: maxSide, height: Math.max(1, Math.round(origH * ratio)) };
  }

  const ratio = maxSide / origH;
  return { width: Math.max(1, Math.round(origW * ratio)), height: maxSide };
};

const isBound = (value: number | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

/** A single bound becomes the max-side constraint for both axes; two bounds use the smaller. */
export const resolveMaxSide = (maxWidth?: number, maxHeight?: number): number | undefined => {
  const hasWidth = isBound(maxWidth);
  const hasHeight = isBound(maxHeight);
  if (hasWidth && hasHeight) return Math.min(maxWidth, maxHeight);
  if (hasWidth) return maxWidth;
  if (hasHeight) return maxHeight;
  return undefined;
};

export const needsResize = (
  width: number,
  height: number,
  maxWidth?: number,
  maxHeight?: number
): boolean =>
  (isBound(maxWidth) && width > maxWidth) || (isBound(maxHeight) && height > maxHeight);
