import path from "node:path";
import { promises as fs, type Dirent } from "node:fs";
import { SUPPORTED_AUDIO_EXTENSIONS, SUPPORTED_PLAYLIST_EXTENSIONS } from "../../shared/constants.js";

export interface ResolvedPath {
  resolvedPath: string;
  isDirectory: boolean;
}

export function isAudioFile(filePath: string): boolean {
  return SUPPORTED_AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function isPlaylistFile(filePath: string): boolean {
  return SUPPORTED_PLAYLIST_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function normalizePath(filePath: string): string {
  return path.resolve(filePath);
}

/**
 * Follows symlinks to the real file. Null when the path (or the target of a
 * dangling link) does not exist.
 */
export async function resolveTruePath(filePath: string): Promise<ResolvedPath | null> {
  try {
    const resolvedPath = await fs.realpath(normalizePath(filePath));
    const stat = await fs.stat(resolvedPath);
    return {
      resolvedPath,
      isDirectory: stat.isDirectory()
    };
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP") {
      return null;
    }
    throw error;
  }
}

function isTrackSource(filePath: string): boolean {
  return isAudioFile(filePath) || isPlaylistFile(filePath);
}

// A dangling link that looks like a track stays listed so it is reported as not found.
async function isUsableLink(linkPath: string): Promise<boolean> {
  const target = await resolveTruePath(linkPath);
  if (!target) {
    return isTrackSource(linkPath);
  }
  return target.isDirectory || isTrackSource(target.resolvedPath);
}

/**
 * Immediate children of a directory, sorted by name. Only entries that can
 * contribute tracks are returned; hidden entries are skipped.
 */
export async function listDirectoryEntries(dirPath: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }

  entries.sort((a, b) => a.name.localeCompare(b.name));

  const results: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) {
      continue;
    }

    const full = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      results.push(full);
    } else if (entry.isSymbolicLink()) {
      if (await isUsableLink(full)) {
        results.push(full);
      }
    } else if (entry.isFile() && isTrackSource(full)) {
      results.push(full);
    }
  }

  return results;
}
