import type { PathClassification } from "../../shared/types.js";
import { isAudioFile, isPlaylistFile, listDirectoryEntries, resolveTruePath } from "./path-utils.js";
import type { PlaylistIO } from "./playlist-io.js";

export class FileExpander {
  private readonly playlistIO: PlaylistIO;

  public constructor(playlistIO: PlaylistIO) {
    this.playlistIO = playlistIO;
  }

  /** Resolves symlinks first; the returned path is the resolved one. */
  public async classify(inputPath: string): Promise<PathClassification> {
    const resolved = await resolveTruePath(inputPath);
    if (!resolved) {
      return { type: "notFound", path: inputPath };
    }

    const filePath = resolved.resolvedPath;
    if (resolved.isDirectory) {
      return { type: "directory", path: filePath };
    }
    if (isPlaylistFile(filePath)) {
      return { type: "playlist", path: filePath };
    }
    if (isAudioFile(filePath)) {
      return { type: "track", path: filePath };
    }
    return { type: "unsupported", path: filePath };
  }

  public async listDirectory(dirPath: string): Promise<string[]> {
    return await listDirectoryEntries(dirPath);
  }

  public async expandPlaylistFile(playlistPath: string): Promise<string[]> {
    return await this.playlistIO.load(playlistPath);
  }

  /**
   * Depth-first: a subdirectory is flattened at its sorted position before
   * the next sibling. Playlist files inside the tree are not followed here.
   */
  public async expandDirectory(dirPath: string): Promise<string[]> {
    const results: string[] = [];
    const visited = new Set<string>();

    const walk = async (current: string): Promise<void> => {
      const classification = await this.classify(current);
      if (classification.type !== "directory" || visited.has(classification.path)) {
        return;
      }
      visited.add(classification.path);

      for (const entry of await this.listDirectory(classification.path)) {
        const child = await this.classify(entry);
        if (child.type === "directory") {
          await walk(child.path);
        } else if (child.type === "track") {
          results.push(child.path);
        }
      }
    };

    await walk(dirPath);
    return results;
  }
}
