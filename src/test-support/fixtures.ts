import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { InvalidTrackError } from "../shared/errors.js";
import type { AsyncMessage, AsyncMessageOf, AsyncMessageType } from "../shared/messages.js";
import type { Track, TrackMetadata } from "../shared/types.js";
import { EventBus } from "../main/services/event-bus.js";
import { createTrack } from "../main/services/playlist/track.js";
import type { TrackLoader } from "../main/services/track-loader.js";

export function makeTrack(filePath: string, metadata: Partial<TrackMetadata> = {}): Track {
  const track = createTrack(filePath);
  track.metadata = { ...track.metadata, ...metadata };
  return track;
}

export async function makeTempDir(prefix = "playlist-engine-"): Promise<string> {
  // realpath so expected paths match what symlink resolution returns
  return await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function writeFiles(root: string, relativePaths: readonly string[]): Promise<string[]> {
  const written: string[] = [];
  for (const relativePath of relativePaths) {
    const full = path.join(root, relativePath);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, "placeholder", "utf8");
    written.push(full);
  }
  return written;
}

/**
 * Derives display info from the file name ("Artist - Title.mp3") and hands
 * out durations from a table instead of parsing audio.
 */
export class FakeTrackLoader implements TrackLoader {
  public readonly durations = new Map<string, number>();
  public readonly unreadable = new Set<string>();
  public readonly durationRequests: string[] = [];

  public async loadDisplayInfo(track: Track): Promise<TrackMetadata> {
    if (this.unreadable.has(track.path)) {
      throw new InvalidTrackError(track.path, "Unable to read audio file: bad header");
    }

    const base = path.parse(track.path).name;
    const separator = base.indexOf(" - ");
    if (separator === -1) {
      return { ...track.metadata, title: base };
    }

    return {
      ...track.metadata,
      artist: base.slice(0, separator),
      title: base.slice(separator + 3)
    };
  }

  public async loadDuration(track: Track): Promise<number | null> {
    this.durationRequests.push(track.path);
    return this.durations.get(track.path) ?? null;
  }
}

/** Keeps every async message in publish order, regardless of subscribers. */
export class RecordingBus extends EventBus {
  public readonly published: AsyncMessage[] = [];

  public override publish(message: AsyncMessage): void {
    this.published.push(message);
    super.publish(message);
  }

  public types(exclude: readonly AsyncMessageType[] = []): AsyncMessageType[] {
    return this.published.map((message) => message.type).filter((type) => !exclude.includes(type));
  }

  public ofType<K extends AsyncMessageType>(type: K): Array<AsyncMessageOf<K>> {
    return this.published.filter((message): message is AsyncMessageOf<K> => message.type === type);
  }
}
