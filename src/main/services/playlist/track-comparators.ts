import type { SortCriteria, SortField, Track } from "../../../shared/types.js";
import { trackDisplayName } from "./track.js";

export type TrackComparator = (a: Track, b: Track) => number;

function compareNullableNumber(a: number | null, b: number | null): number {
  if (a == null && b == null) {
    return 0;
  }
  if (a == null) {
    return 1;
  }
  if (b == null) {
    return -1;
  }
  return a - b;
}

function compareNullableString(a: string | null, b: string | null): number {
  if (a == null && b == null) {
    return 0;
  }
  if (a == null) {
    return 1;
  }
  if (b == null) {
    return -1;
  }
  return a.localeCompare(b);
}

export function compareTracksBy(field: SortField, a: Track, b: Track): number {
  switch (field) {
    case "name":
      return trackDisplayName(a).localeCompare(trackDisplayName(b));
    case "title":
      return a.metadata.title.localeCompare(b.metadata.title);
    case "artist":
      return compareNullableString(a.metadata.artist, b.metadata.artist);
    case "album":
      return compareNullableString(a.metadata.album, b.metadata.album);
    case "genre":
      return compareNullableString(a.metadata.genre, b.metadata.genre);
    case "duration":
      return compareNullableNumber(a.metadata.durationSec, b.metadata.durationSec);
    case "path":
      return a.path.localeCompare(b.path);
  }
}

/**
 * Ties on every field compare equal, so Array#sort (stable) keeps the
 * existing relative order for them.
 */
export function createTrackComparator(criteria: SortCriteria): TrackComparator {
  const direction = criteria.order === "ascending" ? 1 : -1;

  return (a, b) => {
    for (const field of criteria.fields) {
      const result = compareTracksBy(field, a, b);
      if (result !== 0) {
        return result * direction;
      }
    }
    return 0;
  };
}
