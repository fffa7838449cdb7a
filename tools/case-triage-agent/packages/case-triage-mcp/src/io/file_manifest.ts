import fs from "node:fs";
import crypto from "node:crypto";

export type FileManifestEntry = {
  path: string;
  size: number;
  sha256: string;
};

export function sha256Hex(data: string | Buffer): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

export function buildManifest(filePaths: string[]): FileManifestEntry[] {
  return filePaths
    .filter((filePath) => fs.existsSync(filePath))
    .map((filePath) => {
      const buf = fs.readFileSync(filePath);
      return {
        path: filePath,
        size: buf.length,
        sha256: sha256Hex(buf)
      };
    });
}

const SAFE_KEY = /^[a-z0-9_-]+$/;

/**
 * File-safe key for a record id. Lowercase safe ids map to themselves;
 * anything else, uppercase letters included, gets a hash suffix so two ids
 * never share a file name, not even on a case-insensitive filesystem.
 */
export function artifactKey(recordId: string): string {
  if (SAFE_KEY.test(recordId)) {
    return recordId;
  }
  const cleaned = recordId.replace(/[^A-Za-z0-9_-]+/g, "_").replace(/^_+|_+$/g, "").slice(0, 80);
  const suffix = sha256Hex(recordId).slice(0, 8);
  return cleaned ? `${cleaned}_${suffix}` : suffix;
}
