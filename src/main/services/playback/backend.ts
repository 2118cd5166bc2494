import type { IndexedTrack } from "../../../shared/types.js";

/**
 * What the playlist engine needs from the player. The player owns the
 * playing cursor; the engine only reads it and reports where it moved to.
 */
export interface PlaybackDelegate {
  /**
   * Starts playing the track at `index`. Resolves to null when another track
   * is playing and `interruptPlayback` is false. Rejects with a
   * PlaybackError when the track cannot be played.
   */
  play(index: number, interruptPlayback: boolean): Promise<IndexedTrack | null>;
  getPlayingTrack(): IndexedTrack | null;
}
