import path from "node:path";
import { promises as fs } from "node:fs";
import { fileURLToPath } from "node:url";
import { describeError, PlaylistIoError, PlaylistParseError } from "../../shared/errors.js";
import type { Track } from "../../shared/types.js";
import { trackDisplayName } from "./playlist/track.js";

const EXTENDED_HEADER = "#EXTM3U";

function resolveEntry(entry: string, baseDir: string): string {
  if (/^file:\/\//i.test(entry)) {
    return fileURLToPath(entry);
  }
  return path.resolve(baseDir, entry);
}

export function parseM3u(contents: string, baseDir: string): string[] {
  const entries: string[] = [];

  for (const rawLine of contents.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }
    entries.push(resolveEntry(line, baseDir));
  }

  return entries;
}

export function formatM3u(tracks: readonly Track[]): string {
  const lines = [EXTENDED_HEADER];

  for (const track of tracks) {
    const duration = track.metadata.durationSec;
    const seconds = duration != null && Number.isFinite(duration) ? Math.round(duration) : -1;
    lines.push(`#EXTINF:${seconds},${trackDisplayName(track)}`);
    lines.push(track.path);
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Reads and writes M3U / M3U8 playlist files. Relative entries are resolved
 * against the playlist's own directory.
 */
export class PlaylistIO {
  public async load(playlistPath: string): Promise<string[]> {
    let contents: string;
    try {
      contents = await fs.readFile(playlistPath, "utf8");
    } catch (error) {
      throw new PlaylistParseError(playlistPath, `Unable to read playlist: ${describeError(error)}`, { cause: error });
    }

    if (contents.includes("\0")) {
      throw new PlaylistParseError(playlistPath, "Playlist is not a text file.");
    }

    try {
      return parseM3u(contents, path.dirname(playlistPath));
    } catch (error) {
      throw new PlaylistParseError(playlistPath, `Malformed playlist entry: ${describeError(error)}`, { cause: error });
    }
  }

  public async save(playlistPath: string, tracks: readonly Track[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(playlistPath), { recursive: true });
      await fs.writeFile(playlistPath, formatM3u(tracks), "utf8");
    } catch (error) {
      throw new PlaylistIoError(playlistPath, `Unable to save playlist: ${describeError(error)}`, { cause: error });
    }
  }
}
