import type {
  GroupedTrack,
  SearchField,
  SearchQuery,
  SearchResult,
  SearchResults,
  Track
} from "../../../shared/types.js";
import { trackDisplayName } from "./track.js";

const SEARCH_FIELDS: readonly SearchField[] = ["name", "artist", "title", "album"];

function fieldValue(track: Track, field: SearchField): string | null {
  switch (field) {
    case "name":
      return trackDisplayName(track);
    case "artist":
      return track.metadata.artist;
    case "title":
      return track.metadata.title;
    case "album":
      return track.metadata.album;
  }
}

export function matchesQuery(value: string, query: SearchQuery): boolean {
  const haystack = query.caseSensitive ? value : value.toLowerCase();
  const needle = query.caseSensitive ? query.text : query.text.toLowerCase();

  switch (query.type) {
    case "contains":
      return haystack.includes(needle);
    case "beginsWith":
      return haystack.startsWith(needle);
    case "endsWith":
      return haystack.endsWith(needle);
    case "equals":
      return haystack === needle;
  }
}

export function searchTracks(
  tracks: readonly Track[],
  query: SearchQuery,
  locate: (track: Track) => GroupedTrack | null = () => null
): SearchResults {
  if (query.text.length === 0) {
    return { count: 0, results: [] };
  }

  const fields = SEARCH_FIELDS.filter((field) => query.fields[field]);
  const results: SearchResult[] = [];

  tracks.forEach((track, index) => {
    for (const field of fields) {
      const value = fieldValue(track, field);
      if (value != null && matchesQuery(value, query)) {
        results.push({
          index,
          track,
          match: { field, value },
          location: locate(track)
        });
        return;
      }
    }
  });

  return {
    count: results.length,
    results
  };
}
