import { promises as fs } from "node:fs";
import { PlaybackError } from "../../../shared/errors.js";
import { EMPTY_RESPONSE } from "../../../shared/messages.js";
import type { IndexedTrack, RemovalResult, Track } from "../../../shared/types.js";
import type { EventBus } from "../event-bus.js";
import type { PlaylistChangeListener } from "../playlist-change-listener.js";
import type { PlaylistStore } from "../playlist/playlist-store.js";
import type { PlaybackDelegate } from "./backend.js";

/**
 * Headless player state: which track is playing and at what flat index.
 * Audio output is not handled here.
 */
export class PlaybackSequencer implements PlaybackDelegate, PlaylistChangeListener {
  private readonly store: PlaylistStore;
  private playingTrack: Track | null = null;
  private cursor: number | null = null;

  public constructor(store: PlaylistStore) {
    this.store = store;
  }

  public registerHandlers(bus: EventBus): () => void {
    return bus.handleRequest("stopPlayback", () => {
      this.stop();
      return EMPTY_RESPONSE;
    });
  }

  public async play(index: number, interruptPlayback: boolean): Promise<IndexedTrack | null> {
    if (this.playingTrack && !interruptPlayback) {
      return null;
    }

    const track = this.store.trackAt(index);
    if (!track) {
      throw new PlaybackError(index, `No track at index ${index}.`);
    }

    try {
      await fs.access(track.path);
    } catch (error) {
      throw new PlaybackError(index, `Track file is no longer available: ${track.path}`, { cause: error });
    }

    // The playlist may have changed while the file was checked.
    const liveIndex = this.store.indexOfTrack(track);
    if (liveIndex === -1) {
      throw new PlaybackError(index, `Track was removed before playback started: ${track.path}`);
    }

    this.playingTrack = track;
    this.cursor = liveIndex;
    return { track, index: liveIndex };
  }

  public getPlayingTrack(): IndexedTrack | null {
    if (!this.playingTrack || this.cursor == null) {
      return null;
    }
    return { track: this.playingTrack, index: this.cursor };
  }

  public stop(): void {
    this.playingTrack = null;
    this.cursor = null;
  }

  public tracksRemoved(_result: RemovalResult, newCursor: number | null): void {
    this.moveCursor(newCursor);
  }

  public playlistReordered(newCursor: number | null): void {
    this.moveCursor(newCursor);
  }

  public playlistCleared(): void {
    this.stop();
  }

  private moveCursor(newCursor: number | null): void {
    if (!this.playingTrack) {
      return;
    }

    if (newCursor == null) {
      this.stop();
      return;
    }

    this.cursor = newCursor;
  }
}
