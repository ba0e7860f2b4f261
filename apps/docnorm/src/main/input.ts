import fs from "node:fs/promises";
import path from "node:path";
import { invalidInput, ioFailure } from "./errors.js";

const NON_BASE64_CHAR = /[^A-Za-z0-9+/=]/;

const CONTENT_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".pdf": "application/pdf",
};

export const bufferToBase64 = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");

// Linear scan: a repeated regex group over the whole payload overflows on multi-MB input.
const isPaddedBase64 = (compact: string): boolean => {
  if (compact.length % 4 !== 0 || NON_BASE64_CHAR.test(compact)) return false;
  const firstPad = compact.indexOf("=");
  if (firstPad === -1) return true;
  // Padding may only fill the last one or two characters.
  return firstPad >= compact.length - 2 && compact.endsWith("=");
};

/** Standard alphabet with padding; whitespace (line wrapping) is ignored. */
export const base64ToBuffer = (text: string): Uint8Array => {
  const compact = text.replace(/\s+/g, "");
  if (!isPaddedBase64(compact)) {
    throw invalidInput("Failed to decode Base64", "input is not valid padded base64");
  }
  return Buffer.from(compact, "base64");
};

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
};

export const readInputFile = async (filePath: string): Promise<Uint8Array> => {
  if (filePath.trim().length === 0) {
    throw invalidInput("Input path is empty");
  }
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw invalidInput(`Input file does not exist: ${filePath}`, error);
    }
    if (code === "EISDIR") {
      throw invalidInput(`Input path is a directory: ${filePath}`, error);
    }
    throw ioFailure(`Failed to read input file '${filePath}'`, error);
  }
};

export const guessContentType = (filePath: string): string =>
  CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
