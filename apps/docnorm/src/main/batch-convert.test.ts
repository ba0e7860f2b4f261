import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { convertImagesToWebpRecursive } from "./batch-convert.js";
import { isNormalizerError } from "./errors.js";

const tempDirs: string[] = [];

const makeTempDir = async (prefix = "docnorm-batch-"): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
};

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

const image = (format: "jpeg" | "png", width = 12, height = 9): Promise<Buffer> => {
  const base = sharp({ create: { width, height, channels: 3, background: "#c0ffee" } });
  return format === "jpeg" ? base.jpeg().toBuffer() : base.png().toBuffer();
};

const createTree = async (): Promise<string> => {
  const root = await makeTempDir();
  await fs.mkdir(path.join(root, "sub"));
  await fs.writeFile(path.join(root, "a.jpg"), await image("jpeg"));
  await fs.writeFile(path.join(root, "sub", "b.PNG"), await image("png"));
  await fs.writeFile(path.join(root, "README"), "no extension");
  await fs.writeFile(path.join(root, "c.txt"), "not an image");
  await fs.writeFile(path.join(root, "d.webp"), "already webp");
  await fs.writeFile(path.join(root, "e.png"), await image("png"));
  await fs.writeFile(path.join(root, "e.webp"), "existing sibling");
  await fs.writeFile(path.join(root, "broken.gif"), "GIF89a garbage");
  return root;
};

describe("convertImagesToWebpRecursive", () => {
  it("converts supported images and counts skips and failures", async () => {
    const root = await createTree();

    const stats = await convertImagesToWebpRecursive(root, { concurrency: 2 });

    expect(stats.converted).toBe(2);
    expect(stats.skipped).toBe(5);
    expect(stats.errors).toBe(1);
    expect(stats.errorMessages).toHaveLength(1);
    expect(stats.errorMessages[0].startsWith(`Failed to open image '${path.join(root, "broken.gif")}': `)).toBe(
      true
    );
  });

  it("writes siblings next to the originals and leaves existing ones alone", async () => {
    const root = await createTree();

    await convertImagesToWebpRecursive(root);

    const converted = await sharp(path.join(root, "a.webp")).metadata();
    expect(converted.format).toBe("webp");
    expect(converted.width).toBe(12);
    expect((await sharp(path.join(root, "sub", "b.webp")).metadata()).format).toBe("webp");
    expect((await fs.stat(path.join(root, "a.jpg"))).isFile()).toBe(true);
    expect(await fs.readFile(path.join(root, "e.webp"), "utf-8")).toBe("existing sibling");
  });

  it("skips everything on a second run", async () => {
    const root = await createTree();
    await convertImagesToWebpRecursive(root);

    const again = await convertImagesToWebpRecursive(root);

    expect(again.converted).toBe(0);
    expect(again.errors).toBe(1);
  });

  it("converts only the first of several files sharing a target", async () => {
    const root = await makeTempDir();
    await fs.writeFile(path.join(root, "a.jpg"), await image("jpeg", 12, 9));
    await fs.writeFile(path.join(root, "a.png"), await image("png", 20, 10));
    await fs.writeFile(path.join(root, "a.tif"), "never decoded");

    const stats = await convertImagesToWebpRecursive(root, { concurrency: 4 });

    expect(stats).toEqual({ converted: 1, skipped: 2, errors: 0, errorMessages: [] });
    const written = await sharp(path.join(root, "a.webp")).metadata();
    expect(written.width).toBe(12);
    expect(written.height).toBe(9);
  });

  it("falls back to the default concurrency for unusable values", async () => {
    const root = await makeTempDir();
    await fs.writeFile(path.join(root, "a.jpg"), await image("jpeg"));

    const stats = await convertImagesToWebpRecursive(root, { concurrency: 0 });

    expect(stats.converted).toBe(1);
  });

  it("does not follow symbolic links", async () => {
    const root = await makeTempDir();
    const outside = await makeTempDir("docnorm-batch-outside-");
    await fs.writeFile(path.join(outside, "x.jpg"), await image("jpeg"));
    await fs.symlink(outside, path.join(root, "linked"));
    await fs.symlink(path.join(outside, "x.jpg"), path.join(root, "y.jpg"));

    const stats = await convertImagesToWebpRecursive(root);

    expect(stats).toEqual({ converted: 0, skipped: 0, errors: 0, errorMessages: [] });
    await expect(fs.stat(path.join(outside, "x.webp"))).rejects.toBeDefined();
  });

  it("rejects a missing root", async () => {
    const missing = path.join(os.tmpdir(), "docnorm-batch-missing-root");

    const error = await convertImagesToWebpRecursive(missing).catch((caught: unknown) => caught);

    expect(isNormalizerError(error) ? error.kind : undefined).toBe("InvalidInput");
    expect(error instanceof Error ? error.message : "").toBe(`Directory does not exist: ${missing}`);
  });

  it("rejects a root that is a file", async () => {
    const root = await makeTempDir();
    const file = path.join(root, "a.jpg");
    await fs.writeFile(file, await image("jpeg"));

    const error = await convertImagesToWebpRecursive(file).catch((caught: unknown) => caught);

    expect(isNormalizerError(error) ? error.kind : undefined).toBe("InvalidInput");
    expect(error instanceof Error ? error.message : "").toBe(`Path is not a directory: ${file}`);
  });
});
