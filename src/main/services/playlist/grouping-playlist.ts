import { UNKNOWN_GROUP_NAMES } from "../../../shared/constants.js";
import { InvalidReorderError } from "../../../shared/errors.js";
import type {
  Group,
  GroupedTrack,
  GroupedTrackAddResult,
  GroupedTrackMovedResult,
  GroupingMoveResult,
  GroupingReorderOperation,
  GroupMovedResult,
  GroupRemovalResult,
  GroupType,
  ItemMovedResult,
  Track
} from "../../../shared/types.js";
import { collectPlacements, moveItemsDown, moveItemsUp, placeItems, type Placement } from "./item-moves.js";
import type { TrackComparator } from "./track-comparators.js";

// Callers only ever see the read-only Group view.
interface GroupEntry extends Group {
  tracks: Track[];
}

type ItemMover = <T>(items: T[], indexes: Iterable<number>) => ItemMovedResult[];

export function groupNameFor(type: GroupType, track: Track): string {
  const value = track.metadata[type]?.trim();
  return value ? value : UNKNOWN_GROUP_NAMES[type];
}

/**
 * One partition of the flat playlist. Groups keep the order in which they
 * were created; tracks keep the order in which they joined their group until
 * a grouped sort reorders them.
 */
export class GroupingPlaylist {
  public readonly type: GroupType;
  private groups: GroupEntry[] = [];
  private readonly groupsByName = new Map<string, GroupEntry>();
  private readonly groupByTrackId = new Map<string, GroupEntry>();

  public constructor(type: GroupType) {
    this.type = type;
  }

  public getGroups(): readonly Group[] {
    return this.groups;
  }

  public size(): number {
    return this.groups.length;
  }

  public groupAt(index: number): Group | null {
    if (!Number.isInteger(index)) {
      return null;
    }
    return this.groups[index] ?? null;
  }

  public indexOfGroup(group: Group): number {
    return this.groups.findIndex((candidate) => candidate === group);
  }

  public addTrack(track: Track): GroupedTrackAddResult {
    const name = groupNameFor(this.type, track);
    let group = this.groupsByName.get(name);
    let groupCreated = false;

    if (!group) {
      group = { type: this.type, name, tracks: [] };
      this.groups.push(group);
      this.groupsByName.set(name, group);
      groupCreated = true;
    }

    group.tracks.push(track);
    this.groupByTrackId.set(track.id, group);

    return {
      groupedTrack: {
        group,
        groupIndex: this.groups.indexOf(group),
        trackIndex: group.tracks.length - 1
      },
      groupCreated
    };
  }

  public groupingInfoFor(track: Track): GroupedTrack | null {
    const group = this.groupByTrackId.get(track.id);
    if (!group) {
      return null;
    }

    return {
      group,
      groupIndex: this.groups.indexOf(group),
      trackIndex: group.tracks.indexOf(track)
    };
  }

  /**
   * Indexes in the result refer to the state before removal. Groups left
   * empty are deleted.
   */
  public removeTracks(tracks: readonly Track[]): GroupRemovalResult[] {
    const removing = new Set(tracks.map((track) => track.id));
    const results: GroupRemovalResult[] = [];

    this.groups.forEach((group, groupIndex) => {
      const trackIndexes: number[] = [];
      group.tracks.forEach((track, trackIndex) => {
        if (removing.has(track.id)) {
          trackIndexes.push(trackIndex);
        }
      });

      if (trackIndexes.length === 0) {
        return;
      }

      group.tracks = group.tracks.filter((track) => !removing.has(track.id));
      results.push({
        groupName: group.name,
        groupIndex,
        groupRemoved: group.tracks.length === 0,
        trackIndexes
      });
    });

    for (const trackId of removing) {
      this.groupByTrackId.delete(trackId);
    }

    const emptied = this.groups.filter((group) => group.tracks.length === 0);
    for (const group of emptied) {
      this.groupsByName.delete(group.name);
    }
    if (emptied.length > 0) {
      this.groups = this.groups.filter((group) => group.tracks.length > 0);
    }

    return results;
  }

  public moveTracksAndGroupsUp(tracks: readonly Track[], groups: readonly Group[]): GroupingMoveResult {
    return this.moveTracksAndGroups(tracks, groups, moveItemsUp);
  }

  public moveTracksAndGroupsDown(tracks: readonly Track[], groups: readonly Group[]): GroupingMoveResult {
    return this.moveTracksAndGroups(tracks, groups, moveItemsDown);
  }

  /**
   * Groups are placed within the grouping and tracks within their own group,
   * with the same fill rule as a flat reorder. Every operation is checked
   * before anything moves.
   */
  public reorder(operations: readonly GroupingReorderOperation[]): void {
    const groupPlacements: Array<Placement<GroupEntry>> = [];
    const trackPlacements = new Map<GroupEntry, Array<Placement<Track>>>();

    for (const operation of operations) {
      if (operation.type === "group") {
        const entry = this.entryFor(operation.group);
        if (!entry) {
          throw new InvalidReorderError(`Group "${operation.group.name}" is not in the ${this.type} grouping.`);
        }
        groupPlacements.push({ item: entry, newIndex: operation.newIndex });
        continue;
      }

      const parent = this.groupByTrackId.get(operation.track.id);
      if (!parent) {
        throw new InvalidReorderError(`Track "${operation.track.path}" is not in the ${this.type} grouping.`);
      }
      const bucket = trackPlacements.get(parent) ?? [];
      bucket.push({ item: operation.track, newIndex: operation.newIndex });
      trackPlacements.set(parent, bucket);
    }

    const placedGroups = collectPlacements(this.groups, groupPlacements, {
      noun: "group",
      container: `${this.type} grouping`,
      describe: (group) => `Group "${group.name}"`
    });
    const placedTracks = [...trackPlacements].map(([parent, placements]) => ({
      parent,
      placed: collectPlacements(parent.tracks, placements, {
        noun: "track",
        container: `group "${parent.name}"`,
        describe: (track) => `Track "${track.path}"`
      })
    }));

    if (placedGroups.size > 0) {
      this.groups = placeItems(this.groups, placedGroups);
    }
    for (const { parent, placed } of placedTracks) {
      parent.tracks = placeItems(parent.tracks, placed);
    }
  }

  public sortTracks(comparator: TrackComparator): void {
    for (const group of this.groups) {
      group.tracks.sort(comparator);
    }
  }

  public clear(): void {
    this.groups = [];
    this.groupsByName.clear();
    this.groupByTrackId.clear();
  }

  private entryFor(group: Group): GroupEntry | null {
    const entry = this.groupsByName.get(group.name);
    return entry !== undefined && entry === group ? entry : null;
  }

  /**
   * Selected groups move within the grouping. Selected tracks move within
   * their group, unless that group is itself selected.
   */
  private moveTracksAndGroups(
    tracks: readonly Track[],
    groups: readonly Group[],
    move: ItemMover
  ): GroupingMoveResult {
    const selectedGroups = new Set<GroupEntry>();
    for (const group of groups) {
      const entry = this.entryFor(group);
      if (entry) {
        selectedGroups.add(entry);
      }
    }

    const groupsBefore = [...this.groups];
    const groupIndexes = [...selectedGroups].map((entry) => groupsBefore.indexOf(entry));
    const groupResults: GroupMovedResult[] = move(this.groups, groupIndexes).flatMap((result) => {
      const group = groupsBefore[result.oldIndex];
      return group ? [{ group, ...result }] : [];
    });

    const tracksByGroup = new Map<GroupEntry, Track[]>();
    for (const track of tracks) {
      const parent = this.groupByTrackId.get(track.id);
      if (!parent || selectedGroups.has(parent)) {
        continue;
      }
      const bucket = tracksByGroup.get(parent) ?? [];
      bucket.push(track);
      tracksByGroup.set(parent, bucket);
    }

    const trackResults: GroupedTrackMovedResult[] = [];
    for (const [parent, selected] of tracksByGroup) {
      const tracksBefore = [...parent.tracks];
      const trackIndexes = selected.map((track) => tracksBefore.indexOf(track));
      for (const result of move(parent.tracks, trackIndexes)) {
        const track = tracksBefore[result.oldIndex];
        if (track) {
          trackResults.push({ group: parent, track, ...result });
        }
      }
    }

    return { groupType: this.type, groupResults, trackResults };
  }
}
