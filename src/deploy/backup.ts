/**
 * Backups
 *
 * A deployed file's previous content is copied to `<file>.<unix-seconds>.bak`
 * beside it. Existing backups are never overwritten: a `-1`, `-2`, ... suffix
 * is inserted before `.bak` instead.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { hasErrorCode } from "../errors.js";

const BACKUP_PATTERN = /^(.*)\.(\d+)(?:-(\d+))?\.bak$/;

export interface BackupEntry {
  /** Path of the backup file */
  path: string;
  /** File the backup was taken from */
  original: string;
  createdAt: Date;
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}

/**
 * First unused backup path for `file` at `now`.
 */
export async function nextBackupPath(file: string, now: Date): Promise<string> {
  const seconds = Math.floor(now.getTime() / 1000);
  let candidate = `${file}.${seconds}.bak`;
  let n = 0;
  while (await pathExists(candidate)) {
    n += 1;
    candidate = `${file}.${seconds}-${n}.bak`;
  }
  return candidate;
}

/**
 * Copy `file` to `backupPath`, failing with EEXIST rather than replacing a file already there.
 */
export async function writeBackup(file: string, backupPath: string): Promise<void> {
  await fs.copyFile(file, backupPath, fs.constants.COPYFILE_EXCL);
}

/**
 * Parse a backup file name, or undefined if it is not one.
 */
export function parseBackupPath(backupPath: string): BackupEntry | undefined {
  const match = BACKUP_PATTERN.exec(backupPath);
  if (!match) {
    return undefined;
  }
  const [, original, seconds] = match;
  if (!original || !seconds || original.endsWith(path.sep)) {
    return undefined;
  }
  return { path: backupPath, original, createdAt: new Date(Number(seconds) * 1000) };
}

/**
 * Backups found directly inside the given directories, newest first.
 * Missing directories are skipped.
 */
export async function listBackups(directories: readonly string[]): Promise<BackupEntry[]> {
  const unique = [...new Set(directories.map((dir) => path.resolve(dir)))].sort();
  const entries: BackupEntry[] = [];

  for (const dir of unique) {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) {
        continue;
      }
      throw err;
    }
    for (const name of names) {
      const entry = parseBackupPath(path.join(dir, name));
      if (entry) {
        entries.push(entry);
      }
    }
  }

  return entries.sort(
    (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || a.path.localeCompare(b.path)
  );
}

/**
 * Backups older than `days` days.
 */
export function findStaleBackups(
  entries: readonly BackupEntry[],
  days: number,
  now: Date = new Date()
): BackupEntry[] {
  const cutoff = now.getTime() - days * 24 * 60 * 60 * 1000;
  return entries.filter((entry) => entry.createdAt.getTime() < cutoff);
}

export async function removeBackups(entries: readonly BackupEntry[]): Promise<void> {
  for (const entry of entries) {
    await fs.rm(entry.path, { force: true });
  }
}

export interface RestoreResult {
  restored: string;
  /** Backup of the content that was replaced, if the file existed */
  backupPath?: string;
}

/**
 * Copy a backup over its original, backing up the current file first.
 *
 * @throws Error when `backupPath` is not a backup file name
 */
export async function restoreBackup(
  backupPath: string,
  options: { now?: () => Date } = {}
): Promise<RestoreResult> {
  const entry = parseBackupPath(path.resolve(backupPath));
  if (!entry) {
    throw new Error(`Not a backup file: ${backupPath}`);
  }
  const now = options.now ?? (() => new Date());

  let currentBackup: string | undefined;
  if (await pathExists(entry.original)) {
    currentBackup = await nextBackupPath(entry.original, now());
    await writeBackup(entry.original, currentBackup);
  }
  await fs.copyFile(entry.path, entry.original);

  return {
    restored: entry.original,
    ...(currentBackup ? { backupPath: currentBackup } : {}),
  };
}
