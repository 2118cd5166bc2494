import type { RemovalResult, Track } from "../../shared/types.js";

/**
 * Direct, synchronous observers of structural playlist changes. The playback
 * sequencer uses this to keep its cursor in step with the store.
 */
export interface PlaylistChangeListener {
  trackAdded?(track: Track): void;
  tracksRemoved?(result: RemovalResult, newCursor: number | null): void;
  playlistReordered?(newCursor: number | null): void;
  playlistCleared?(): void;
}
