import { GROUP_TYPES } from "../../../shared/constants.js";
import type {
  Group,
  GroupedTrack,
  GroupInfo,
  GroupingMoveResult,
  GroupingReorderOperation,
  GroupRemovalResult,
  GroupType,
  MoveResult,
  PlaylistSummary,
  RemovalResult,
  ReorderOperation,
  SearchQuery,
  SearchResults,
  SortCriteria,
  SortScope,
  Track,
  TrackAddResult
} from "../../../shared/types.js";
import { GroupingPlaylist } from "./grouping-playlist.js";
import { collectPlacements, moveItemsDown, moveItemsUp, placeItems, validIndexes } from "./item-moves.js";
import { searchTracks } from "./playlist-search.js";
import { trackDisplayName } from "./track.js";
import { createTrackComparator } from "./track-comparators.js";

/**
 * The flat track list plus one grouping per GroupType. Every mutator is
 * synchronous, so a mutation always completes before any other code on the
 * event loop observes the store.
 */
export class PlaylistStore {
  private tracks: Track[] = [];
  private readonly paths = new Set<string>();
  private readonly groupings: Record<GroupType, GroupingPlaylist> = {
    artist: new GroupingPlaylist("artist"),
    album: new GroupingPlaylist("album"),
    genre: new GroupingPlaylist("genre")
  };

  public getTracks(): readonly Track[] {
    return this.tracks;
  }

  public size(): number {
    return this.tracks.length;
  }

  public totalDuration(): number {
    return this.tracks.reduce((total, track) => total + (track.metadata.durationSec ?? 0), 0);
  }

  public summary(): PlaylistSummary {
    return {
      size: this.size(),
      totalDurationSec: this.totalDuration(),
      groupCounts: {
        artist: this.groupings.artist.size(),
        album: this.groupings.album.size(),
        genre: this.groupings.genre.size()
      }
    };
  }

  public trackAt(index: number): Track | null {
    if (!Number.isInteger(index)) {
      return null;
    }
    return this.tracks[index] ?? null;
  }

  public getTrackById(trackId: string): Track | null {
    return this.tracks.find((track) => track.id === trackId) ?? null;
  }

  public indexOfTrack(track: Track): number {
    return this.tracks.indexOf(track);
  }

  public hasPath(filePath: string): boolean {
    return this.paths.has(filePath);
  }

  public groupAt(type: GroupType, index: number): Group | null {
    return this.groupings[type].groupAt(index);
  }

  public numberOfGroups(type: GroupType): number {
    return this.groupings[type].size();
  }

  public getGroups(type: GroupType): readonly Group[] {
    return this.groupings[type].getGroups();
  }

  public indexOfGroup(group: Group): number {
    return this.groupings[group.type].indexOfGroup(group);
  }

  public groupingInfoForTrack(type: GroupType, track: Track): GroupedTrack | null {
    return this.groupings[type].groupingInfoFor(track);
  }

  /** Grouping locations for a track that is in the store, null otherwise. */
  public groupInfoForTrack(track: Track): GroupInfo | null {
    const artist = this.groupings.artist.groupingInfoFor(track);
    const album = this.groupings.album.groupingInfoFor(track);
    const genre = this.groupings.genre.groupingInfoFor(track);
    if (!artist || !album || !genre) {
      return null;
    }
    return { artist, album, genre };
  }

  public displayNameFor(type: GroupType, track: Track): string {
    // Inside an artist or album group the artist is implied by the group.
    return type === "genre" ? trackDisplayName(track) : track.metadata.title;
  }

  public search(query: SearchQuery, groupType?: GroupType): SearchResults {
    const grouping = groupType ? this.groupings[groupType] : null;
    return searchTracks(this.tracks, query, (track) => grouping?.groupingInfoFor(track) ?? null);
  }

  /** Returns null when a track with the same path is already present. */
  public addTrack(track: Track): TrackAddResult | null {
    if (this.paths.has(track.path)) {
      return null;
    }

    this.tracks.push(track);
    this.paths.add(track.path);

    return {
      index: this.tracks.length - 1,
      groupInfo: {
        artist: this.groupings.artist.addTrack(track),
        album: this.groupings.album.addTrack(track),
        genre: this.groupings.genre.addTrack(track)
      }
    };
  }

  public updateDuration(trackId: string, durationSec: number | null): Track | null {
    const target = this.getTrackById(trackId);
    if (!target) {
      return null;
    }

    target.metadata = { ...target.metadata, durationSec };
    return target;
  }

  public removeTracks(indexes: Iterable<number>): RemovalResult {
    const removing = validIndexes(indexes, this.tracks.length).sort((a, b) => a - b);
    const removedTracks = removing.flatMap((index) => {
      const track = this.tracks[index];
      return track ? [{ index, track }] : [];
    });

    const emptyGroupResults: Record<GroupType, GroupRemovalResult[]> = { artist: [], album: [], genre: [] };
    if (removedTracks.length === 0) {
      return { removedTracks, groupResults: emptyGroupResults };
    }

    const removedSet = new Set(removedTracks.map((entry) => entry.track));
    this.tracks = this.tracks.filter((track) => !removedSet.has(track));
    for (const entry of removedTracks) {
      this.paths.delete(entry.track.path);
    }

    const tracks = removedTracks.map((entry) => entry.track);
    return {
      removedTracks,
      groupResults: {
        artist: this.groupings.artist.removeTracks(tracks),
        album: this.groupings.album.removeTracks(tracks),
        genre: this.groupings.genre.removeTracks(tracks)
      }
    };
  }

  /**
   * Moves each selected track one slot towards the top. A track at index 0,
   * or directly below a selected track that could not move, stays put.
   */
  public moveTracksUp(indexes: Iterable<number>): MoveResult {
    return { results: moveItemsUp(this.tracks, indexes) };
  }

  public moveTracksDown(indexes: Iterable<number>): MoveResult {
    return { results: moveItemsDown(this.tracks, indexes) };
  }

  /**
   * Places each named track at its new index; unnamed tracks fill the free
   * slots in their current relative order. Validation happens before any
   * change, so a rejected call leaves the order untouched.
   */
  public reorderTracks(operations: readonly ReorderOperation[]): void {
    const placed = collectPlacements(
      this.tracks,
      operations.map(({ track, newIndex }) => ({ item: track, newIndex })),
      { noun: "track", container: "playlist", describe: (track) => `Track "${track.path}"` }
    );

    if (placed.size === 0) {
      return;
    }

    this.tracks = placeItems(this.tracks, placed);
  }

  /** Grouped moves leave the flat order alone. */
  public moveTracksAndGroupsUp(tracks: readonly Track[], groups: readonly Group[], groupType: GroupType): GroupingMoveResult {
    return this.groupings[groupType].moveTracksAndGroupsUp(tracks, groups);
  }

  public moveTracksAndGroupsDown(tracks: readonly Track[], groups: readonly Group[], groupType: GroupType): GroupingMoveResult {
    return this.groupings[groupType].moveTracksAndGroupsDown(tracks, groups);
  }

  public reorderGrouping(groupType: GroupType, operations: readonly GroupingReorderOperation[]): void {
    this.groupings[groupType].reorder(operations);
  }

  public sort(criteria: SortCriteria, scope: SortScope = { type: "flat" }): void {
    const comparator = createTrackComparator(criteria);

    if (scope.type === "group") {
      this.groupings[scope.groupType].sortTracks(comparator);
      return;
    }

    this.tracks.sort(comparator);
  }

  public clear(): void {
    this.tracks = [];
    this.paths.clear();
    for (const type of GROUP_TYPES) {
      this.groupings[type].clear();
    }
  }
}
