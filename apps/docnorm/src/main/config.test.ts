import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { findEnvRoot, loadEnv } from "./config.js";

const tempDirs: string[] = [];

const makeWorkspace = (): string => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "docnorm-env-"));
  tempDirs.push(root);
  fs.writeFileSync(path.join(root, "package.json"), JSON.stringify({ workspaces: ["apps/docnorm"] }));
  fs.mkdirSync(path.join(root, "apps", "docnorm"), { recursive: true });
  return root;
};

afterEach(() => {
  tempDirs.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
});

describe("findEnvRoot", () => {
  it("walks up to the workspace manifest", () => {
    const root = makeWorkspace();

    expect(findEnvRoot(path.join(root, "apps", "docnorm"))).toBe(root);
  });

  it("falls back to the start directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docnorm-env-bare-"));
    tempDirs.push(dir);

    expect(findEnvRoot(dir)).toBe(dir);
  });
});

describe("loadEnv", () => {
  it("takes DOCNORM_ keys from .env.local before .env", () => {
    const root = makeWorkspace();
    const localPath = path.join(root, ".env.local");
    const sharedPath = path.join(root, ".env");
    fs.writeFileSync(localPath, "DOCNORM_LONG_SIDE_CAP=1200\n");
    fs.writeFileSync(
      sharedPath,
      ["DOCNORM_LONG_SIDE_CAP=1600", 'DOCNORM_LOG_LEVEL="debug"', "DOCNORM_PDF_OPTIMIZER=ghostscript # gs on PATH"].join(
        "\n"
      )
    );

    const env: Record<string, string> = {};
    const result = loadEnv({ cwd: path.join(root, "apps", "docnorm"), env });

    expect(result.loadedFiles).toEqual([localPath, sharedPath]);
    expect(result.appliedKeys).toEqual(["DOCNORM_LONG_SIDE_CAP", "DOCNORM_LOG_LEVEL", "DOCNORM_PDF_OPTIMIZER"]);
    expect(env).toEqual({
      DOCNORM_LONG_SIDE_CAP: "1200",
      DOCNORM_LOG_LEVEL: "debug",
      DOCNORM_PDF_OPTIMIZER: "ghostscript",
    });
  });

  it("keeps values already in the environment and ignores other keys", () => {
    const root = makeWorkspace();
    fs.writeFileSync(path.join(root, ".env"), "DOCNORM_JPEG_QUALITY=60\nUNRELATED=1\n");

    const env: Record<string, string> = { DOCNORM_JPEG_QUALITY: "90" };
    const result = loadEnv({ cwd: root, env });

    expect(result.appliedKeys).toEqual([]);
    expect(env).toEqual({ DOCNORM_JPEG_QUALITY: "90" });
  });

  it("skips env paths that are not files", () => {
    const root = makeWorkspace();
    fs.mkdirSync(path.join(root, ".env"));

    const env: Record<string, string> = {};
    const result = loadEnv({ cwd: root, env });

    expect(result.loadedFiles).toEqual([]);
    expect(env).toEqual({});
  });
});
