import type { GroupType } from "./types.js";

export const SUPPORTED_AUDIO_EXTENSIONS = new Set([
  ".aac",
  ".aif",
  ".aiff",
  ".alac",
  ".ape",
  ".flac",
  ".m4a",
  ".mka",
  ".mp3",
  ".ogg",
  ".opus",
  ".wav",
  ".wv",
  ".wma"
]);

export const SUPPORTED_PLAYLIST_EXTENSIONS = new Set([".m3u", ".m3u8"]);

export const APP_NAME = "playlist-engine";

export const GROUP_TYPES: readonly GroupType[] = ["artist", "album", "genre"];

export const UNKNOWN_GROUP_NAMES: Record<GroupType, string> = {
  artist: "<Unknown Artist>",
  album: "<Unknown Album>",
  genre: "<Unknown Genre>"
};

export const DEFAULT_SETTINGS = {
  autoplayAfterAddingTracks: false,
  autoplayAfterAddingOption: "ifNotPlaying",
  autoplayOnStartup: false,
  playlistOnStartup: "rememberFromLastAppLaunch",
  metadataConcurrency: 4
} as const;
