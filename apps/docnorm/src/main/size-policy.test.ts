import { describe, expect, it } from "vitest";
import { needsResize, resolveMaxSide, targetSize } from "./size-policy.js";

describe("size-policy", () => {
  it("never upscales images already inside the bound", () => {
    expect(targetSize(640, 480, 2000)).toEqual({ width: 640, height: 480 });
    expect(targetSize(2000, 2000, 2000)).toEqual({ width: 2000, height: 2000 });
  });

  it("scales the longer side to the bound", () => {
    expect(targetSize(4000, 3000, 800)).toEqual({ width: 800, height: 600 });
    expect(targetSize(3000, 4000, 2000)).toEqual({ width: 1500, height: 2000 });
  });

  it("rounds the shorter side to the nearest pixel", () => {
    // 337 * (200 / 1000) = 67.4
    expect(targetSize(1000, 337, 200)).toEqual({ width: 200, height: 67 });
    // 338 * (200 / 1000) = 67.6
    expect(targetSize(338, 1000, 200)).toEqual({ width: 68, height: 200 });
  });

  it("floors degenerate dimensions at one pixel", () => {
    expect(targetSize(10000, 1, 100)).toEqual({ width: 100, height: 1 });
    expect(targetSize(1, 10000, 100)).toEqual({ width: 1, height: 100 });
  });

  it("treats square images as width-led", () => {
    expect(targetSize(500, 500, 200)).toEqual({ width: 200, height: 200 });
  });

  it("preserves aspect ratio across a range of shapes", () => {
    const shapes: Array<[number, number]> = [
      [4032, 3024],
      [1080, 1920],
      [2480, 3508],
      [7000, 500],
    ];
    for (const [w, h] of shapes) {
      const result = targetSize(w, h, 1000);
      expect(Math.max(result.width, result.height)).toBe(1000);
      const expectedRatio = w / h;
      const actualRatio = result.width / result.height;
      expect(Math.abs(actualRatio - expectedRatio) / expectedRatio).toBeLessThan(0.02);
    }
  });

  it("resolves the max side from optional bounds", () => {
    expect(resolveMaxSide(800, 600)).toBe(600);
    expect(resolveMaxSide(800, 0)).toBe(800);
    expect(resolveMaxSide(0, 300)).toBe(300);
    expect(resolveMaxSide(0, 0)).toBeUndefined();
    expect(resolveMaxSide()).toBeUndefined();
  });

  it("only requests a resize when a bound is exceeded", () => {
    expect(needsResize(4000, 3000, 800, 0)).toBe(true);
    expect(needsResize(4000, 3000, 0, 3000)).toBe(false);
    expect(needsResize(4000, 3000, 0, 0)).toBe(false);
    expect(needsResize(100, 100, 100, 100)).toBe(false);
  });
});
