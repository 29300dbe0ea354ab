import path from "node:path";
import { randomBytes } from "node:crypto";
import { constants as fsConstants, promises as fs } from "node:fs";

/**
 * File helpers for the inventory.
 * - Writes go through a temp file + rename so a crash never leaves a truncated file.
 * - Backups are created exclusively and are never overwritten.
 */

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isMissingFileError(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

// Writes a file via a unique temp sibling + rename. The temp file is removed if anything fails,
// so the canonical file is either the old content or the new one.
export async function writeTextAtomic(filePath: string, contents: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
  );

  try {
    await fs.writeFile(tmpPath, contents, { encoding: "utf8", flag: "wx" });
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

// 2026-10-19T10:15:00.123Z -> 20261019T101500123Z
export function backupTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "");
}

/**
 * Copies `filePath` to `<filePath>.backup.<timestamp>`. When that name is taken, a numeric
 * suffix is appended until an unused name is found. Returns the backup path.
 */
export async function createBackup(filePath: string, now: Date = new Date()): Promise<string> {
  const base = `${filePath}.backup.${backupTimestamp(now)}`;

  for (let attempt = 0; ; attempt += 1) {
    const candidate = attempt === 0 ? base : `${base}-${attempt}`;
    try {
      await fs.copyFile(filePath, candidate, fsConstants.COPYFILE_EXCL);
      return candidate;
    } catch (err) {
      if (errorCode(err) !== "EEXIST") {
        throw err;
      }
    }
  }
}
