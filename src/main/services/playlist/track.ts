import { randomUUID } from "node:crypto";
import path from "node:path";
import type { Track, TrackMetadata } from "../../../shared/types.js";

function emptyMetadata(filePath: string): TrackMetadata {
  return {
    title: path.parse(filePath).name,
    artist: null,
    album: null,
    genre: null,
    durationSec: null
  };
}

export function createTrack(filePath: string): Track {
  return {
    id: randomUUID(),
    path: filePath,
    metadata: emptyMetadata(filePath)
  };
}

export function trackDisplayName(track: Track): string {
  const { artist, title } = track.metadata;
  return artist ? `${artist} - ${title}` : title;
}
