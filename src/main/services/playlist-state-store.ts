import path from "node:path";
import { promises as fs } from "node:fs";
import type { PlaylistState } from "../../shared/types.js";

const STATE_FILE = "playlist-state.json";

function toPlaylistState(candidate: unknown): PlaylistState | null {
  if (!candidate || typeof candidate !== "object" || !("tracks" in candidate)) {
    return null;
  }

  const { tracks } = candidate;
  if (!Array.isArray(tracks)) {
    return null;
  }

  return {
    tracks: tracks.filter((entry): entry is string => typeof entry === "string" && entry.length > 0)
  };
}

/**
 * The remembered track list, restored on the next launch. Writes go to a
 * temp file first and are renamed into place, one at a time.
 */
export class PlaylistStateStore {
  private readonly statePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(dataDir: string) {
    this.statePath = path.join(dataDir, STATE_FILE);
  }

  public async load(): Promise<PlaylistState | null> {
    let data: string;
    try {
      data = await fs.readFile(this.statePath, "utf8");
    } catch {
      return null;
    }

    try {
      return toPlaylistState(JSON.parse(data));
    } catch (error) {
      console.warn(`Ignoring unreadable playlist state in ${this.statePath}:`, error);
      return null;
    }
  }

  public async save(state: PlaylistState): Promise<void> {
    const write = this.writeQueue.then(async () => {
      const dir = path.dirname(this.statePath);
      const tempPath = `${this.statePath}.${process.pid}.${Date.now()}.tmp`;

      await fs.mkdir(dir, { recursive: true });

      try {
        await fs.writeFile(tempPath, JSON.stringify(state, null, 2), "utf8");
        await fs.rename(tempPath, this.statePath);
      } catch (error) {
        try {
          await fs.unlink(tempPath);
        } catch {
          // give up if we can't clean up
        }
        throw error;
      }
    });

    // A failed write must not poison the writes queued behind it.
    this.writeQueue = write.catch(() => undefined);
    await write;
  }

  public getPath(): string {
    return this.statePath;
  }
}
