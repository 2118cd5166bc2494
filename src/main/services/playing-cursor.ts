import type { IndexedTrack, MoveResult } from "../../shared/types.js";
import type { PlaylistStore } from "./playlist/playlist-store.js";

/** Null when nothing was playing or the playing track is gone. */
export function resolveCursor(playing: IndexedTrack | null, store: PlaylistStore): number | null {
  if (!playing) {
    return null;
  }

  const index = store.indexOfTrack(playing.track);
  return index === -1 ? null : index;
}

/**
 * If the playing track was one of the moved ones its new index comes from the
 * move result; otherwise neighbours may have shifted it, so look it up again.
 */
export function cursorAfterMove(
  playing: IndexedTrack | null,
  result: MoveResult,
  store: PlaylistStore
): number | null {
  if (!playing) {
    return null;
  }

  const moved = result.results.find((entry) => entry.oldIndex === playing.index);
  if (moved) {
    return moved.newIndex;
  }

  return resolveCursor(playing, store);
}
