import { parseFile } from "music-metadata";
import { describeError, InvalidTrackError } from "../../shared/errors.js";
import type { Track, TrackMetadata } from "../../shared/types.js";

/**
 * Reads what the playlist needs to know about an audio file. Display info is
 * awaited before a track is inserted; duration is loaded afterwards on the
 * metadata queue.
 */
export interface TrackLoader {
  loadDisplayInfo(track: Track): Promise<TrackMetadata>;
  loadDuration(track: Track): Promise<number | null>;
}

function firstNonEmpty(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return null;
}

export class MusicMetadataTrackLoader implements TrackLoader {
  public async loadDisplayInfo(track: Track): Promise<TrackMetadata> {
    try {
      const parsed = await parseFile(track.path, {
        skipCovers: true,
        duration: false
      });

      return {
        title: firstNonEmpty(parsed.common.title) ?? track.metadata.title,
        artist: firstNonEmpty(parsed.common.artist, parsed.common.albumartist),
        album: firstNonEmpty(parsed.common.album),
        genre: firstNonEmpty(...(parsed.common.genre ?? [])),
        durationSec: parsed.format.duration ?? null
      };
    } catch (error) {
      throw new InvalidTrackError(track.path, `Unable to read audio file: ${describeError(error)}`, { cause: error });
    }
  }

  public async loadDuration(track: Track): Promise<number | null> {
    const parsed = await parseFile(track.path, {
      skipCovers: true,
      duration: true
    });
    return parsed.format.duration ?? null;
  }
}
