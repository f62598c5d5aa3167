import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export type JsonReadResult = {
  /** Parsed but unvalidated; callers check the shape. */
  value: unknown;
  /** False when the file was absent and the fallback was returned. */
  exists: boolean;
};

/**
 * Read and parse a JSON file. A missing file yields the fallback; unreadable or
 * unparsable content is an error for the caller to surface.
 */
export async function readJsonFileWithFallback(
  filePath: string,
  fallback: unknown,
): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      return { value: fallback, exists: false };
    }
    throw err;
  }
  const value: unknown = JSON.parse(raw);
  return { value, exists: true };
}

/** Write to a sibling temp file, then rename over the target. */
export async function writeJsonFileAtomically(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.promises.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
