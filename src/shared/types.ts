export type GroupType = "artist" | "album" | "genre";

export type AutoplayAfterAddingOption = "ifNotPlaying" | "always";

export type PlaylistStartupOption = "empty" | "rememberFromLastAppLaunch";

export interface AppSettings {
  autoplayAfterAddingTracks: boolean;
  autoplayAfterAddingOption: AutoplayAfterAddingOption;
  autoplayOnStartup: boolean;
  playlistOnStartup: PlaylistStartupOption;
  metadataConcurrency: number;
}

export interface TrackMetadata {
  title: string;
  artist: string | null;
  album: string | null;
  genre: string | null;
  durationSec: number | null;
}

export interface Track {
  readonly id: string;
  readonly path: string;
  metadata: TrackMetadata;
}

export interface IndexedTrack {
  track: Track;
  index: number;
}

export interface Group {
  readonly type: GroupType;
  readonly name: string;
  readonly tracks: readonly Track[];
}

export interface GroupedTrack {
  group: Group;
  groupIndex: number;
  trackIndex: number;
}

export interface GroupedTrackAddResult {
  groupedTrack: GroupedTrack;
  groupCreated: boolean;
}

export type GroupInfo = Record<GroupType, GroupedTrack>;

export interface TrackAddResult {
  index: number;
  groupInfo: Record<GroupType, GroupedTrackAddResult>;
}

export interface GroupRemovalResult {
  groupName: string;
  groupIndex: number;
  groupRemoved: boolean;
  trackIndexes: number[];
}

export interface RemovalResult {
  removedTracks: IndexedTrack[];
  groupResults: Record<GroupType, GroupRemovalResult[]>;
}

export interface ItemMovedResult {
  oldIndex: number;
  newIndex: number;
}

export interface MoveResult {
  results: ItemMovedResult[];
}

export interface GroupMovedResult extends ItemMovedResult {
  group: Group;
}

/** Indexes are positions inside `group`. */
export interface GroupedTrackMovedResult extends ItemMovedResult {
  group: Group;
  track: Track;
}

export interface GroupingMoveResult {
  groupType: GroupType;
  groupResults: GroupMovedResult[];
  trackResults: GroupedTrackMovedResult[];
}

export interface ReorderOperation {
  track: Track;
  newIndex: number;
}

/**
 * A group moves to `newIndex` within its grouping; a track moves to
 * `newIndex` within the group that holds it in that grouping.
 */
export type GroupingReorderOperation =
  | { type: "group"; group: Group; newIndex: number }
  | { type: "track"; track: Track; newIndex: number };

export type SortField = "name" | "title" | "artist" | "album" | "genre" | "duration" | "path";

export type SortOrder = "ascending" | "descending";

export interface SortCriteria {
  fields: SortField[];
  order: SortOrder;
}

export type SortScope =
  | { type: "flat" }
  | { type: "group"; groupType: GroupType };

export type SearchType = "contains" | "beginsWith" | "endsWith" | "equals";

export type SearchField = "name" | "artist" | "title" | "album";

export interface SearchQuery {
  text: string;
  type: SearchType;
  fields: Record<SearchField, boolean>;
  caseSensitive: boolean;
}

export interface SearchResult {
  index: number;
  track: Track;
  match: {
    field: SearchField;
    value: string;
  };
  location: GroupedTrack | null;
}

export interface SearchResults {
  count: number;
  results: SearchResult[];
}

export interface PlaylistSummary {
  size: number;
  totalDurationSec: number;
  groupCounts: Record<GroupType, number>;
}

export interface AutoplayOptions {
  autoplay: boolean;
  interruptPlayback: boolean;
}

export interface ProgressCounts {
  tracksAdded: number;
  totalTracks: number;
}

export type TrackAddFailure =
  | { reason: "fileNotFound"; path: string }
  | { reason: "invalidTrack"; path: string; message: string }
  | { reason: "invalidPlaylist"; path: string; message: string };

export type PathClassification =
  | { type: "track"; path: string }
  | { type: "playlist"; path: string }
  | { type: "directory"; path: string }
  | { type: "unsupported"; path: string }
  | { type: "notFound"; path: string };

export interface PlaylistState {
  tracks: string[];
}
