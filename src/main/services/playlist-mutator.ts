import { EMPTY_RESPONSE } from "../../shared/messages.js";
import type {
  AppSettings,
  AutoplayOptions,
  Group,
  GroupingMoveResult,
  GroupingReorderOperation,
  GroupType,
  MoveResult,
  RemovalResult,
  ReorderOperation,
  SortCriteria,
  SortScope,
  Track
} from "../../shared/types.js";
import type { EventBus } from "./event-bus.js";
import type { PlaybackDelegate } from "./playback/backend.js";
import { cursorAfterMove, resolveCursor } from "./playing-cursor.js";
import type { PlaylistChangeListener } from "./playlist-change-listener.js";
import type { PlaylistIO } from "./playlist-io.js";
import type { PlaylistStore } from "./playlist/playlist-store.js";
import type { TrackAddOrchestrator } from "./track-add-orchestrator.js";

interface PlaylistMutatorOptions {
  store: PlaylistStore;
  orchestrator: TrackAddOrchestrator;
  playback: PlaybackDelegate;
  bus: EventBus;
  playlistIO: PlaylistIO;
  getSettings(): AppSettings;
  getRememberedTracks(): readonly string[];
  changeListeners?: readonly PlaylistChangeListener[];
}

/**
 * Write-side facade over the playlist. Every structural change is followed
 * by a cursor recompute that is handed to the change listeners and published
 * on the bus.
 */
export class PlaylistMutator {
  private readonly store: PlaylistStore;
  private readonly orchestrator: TrackAddOrchestrator;
  private readonly playback: PlaybackDelegate;
  private readonly bus: EventBus;
  private readonly playlistIO: PlaylistIO;
  private readonly getSettings: () => AppSettings;
  private readonly getRememberedTracks: () => readonly string[];
  private readonly changeListeners: readonly PlaylistChangeListener[];

  public constructor(options: PlaylistMutatorOptions) {
    this.store = options.store;
    this.orchestrator = options.orchestrator;
    this.playback = options.playback;
    this.bus = options.bus;
    this.playlistIO = options.playlistIO;
    this.getSettings = options.getSettings;
    this.getRememberedTracks = options.getRememberedTracks;
    this.changeListeners = options.changeListeners ?? [];
  }

  public registerHandlers(): () => void {
    const unsubscribers = [
      this.bus.subscribeNotification("appLoaded", (notification) => {
        this.handleAppLoaded(notification.filesToOpen);
      }),
      this.bus.subscribeNotification("appReopened", (notification) => {
        // A repeated reopen for the same files should not restart playback.
        this.addFilesAsync(notification.filesToOpen, {
          autoplay: !notification.isDuplicateNotification,
          interruptPlayback: true
        });
      }),
      this.bus.handleRequest("removeTrack", (request) => {
        this.removeTracks([request.index]);
        return EMPTY_RESPONSE;
      })
    ];

    return () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    };
  }

  /** Adds with the autoplay behaviour configured in settings. */
  public addFiles(paths: readonly string[]): string {
    const settings = this.getSettings();
    return this.addFilesAsync(paths, {
      autoplay: settings.autoplayAfterAddingTracks,
      interruptPlayback: settings.autoplayAfterAddingOption === "always"
    });
  }

  public addFilesAsync(paths: readonly string[], autoplay: AutoplayOptions): string {
    return this.orchestrator.submitBatch(paths, autoplay);
  }

  public removeTracks(indexes: Iterable<number>): RemovalResult {
    const playing = this.playback.getPlayingTrack();
    const result = this.store.removeTracks(indexes);
    if (result.removedTracks.length === 0) {
      return result;
    }

    const newCursor = resolveCursor(playing, this.store);
    if (playing && newCursor == null) {
      this.bus.publishRequest({ type: "stopPlayback" });
    }

    for (const listener of this.changeListeners) {
      listener.tracksRemoved?.(result, newCursor);
    }
    this.bus.publish({ type: "tracksRemoved", payload: { result, newCursor } });

    return result;
  }

  /** Removes the given tracks plus every track of the given groups. */
  public removeTracksAndGroups(tracks: readonly Track[], groups: readonly Group[]): RemovalResult {
    const indexes = new Set<number>();
    const collect = (track: Track): void => {
      const index = this.store.indexOfTrack(track);
      if (index !== -1) {
        indexes.add(index);
      }
    };

    tracks.forEach(collect);
    for (const group of groups) {
      group.tracks.forEach(collect);
    }

    return this.removeTracks(indexes);
  }

  public moveTracksUp(indexes: Iterable<number>): MoveResult {
    const playing = this.playback.getPlayingTrack();
    const result = this.store.moveTracksUp(indexes);
    this.notifyReordered(cursorAfterMove(playing, result, this.store));
    return result;
  }

  public moveTracksDown(indexes: Iterable<number>): MoveResult {
    const playing = this.playback.getPlayingTrack();
    const result = this.store.moveTracksDown(indexes);
    this.notifyReordered(cursorAfterMove(playing, result, this.store));
    return result;
  }

  /** Throws InvalidReorderError, with the playlist unchanged, for an inconsistent request. */
  public reorderTracks(operations: readonly ReorderOperation[]): void {
    const playing = this.playback.getPlayingTrack();
    this.store.reorderTracks(operations);
    this.notifyReordered(resolveCursor(playing, this.store));
  }

  // The flat order, and so the playing cursor, is unaffected by grouped moves.
  public moveTracksAndGroupsUp(tracks: readonly Track[], groups: readonly Group[], groupType: GroupType): GroupingMoveResult {
    return this.store.moveTracksAndGroupsUp(tracks, groups, groupType);
  }

  public moveTracksAndGroupsDown(tracks: readonly Track[], groups: readonly Group[], groupType: GroupType): GroupingMoveResult {
    return this.store.moveTracksAndGroupsDown(tracks, groups, groupType);
  }

  public reorderGrouping(groupType: GroupType, operations: readonly GroupingReorderOperation[]): void {
    this.store.reorderGrouping(groupType, operations);
  }

  public sort(criteria: SortCriteria, scope: SortScope = { type: "flat" }): void {
    const playing = this.playback.getPlayingTrack();
    this.store.sort(criteria, scope);

    const newCursor = resolveCursor(playing, this.store);
    if (scope.type === "flat") {
      for (const listener of this.changeListeners) {
        listener.playlistReordered?.(newCursor);
      }
    }
    this.bus.publish({ type: "playlistSorted", payload: { criteria, scope, newCursor } });
  }

  public clear(): void {
    const playing = this.playback.getPlayingTrack();
    this.store.clear();

    if (playing) {
      this.bus.publishRequest({ type: "stopPlayback" });
    }

    for (const listener of this.changeListeners) {
      listener.playlistCleared?.();
    }
    this.bus.publish({ type: "playlistCleared" });
  }

  /** Replaces the playlist with the contents of a playlist file. */
  public loadPlaylistFile(playlistPath: string): string {
    this.clear();
    return this.addFiles([playlistPath]);
  }

  public async savePlaylist(playlistPath: string): Promise<void> {
    await this.playlistIO.save(playlistPath, this.store.getTracks());
  }

  private handleAppLoaded(filesToOpen: readonly string[]): void {
    if (filesToOpen.length > 0) {
      // Launch arguments win over the remembered playlist and always autoplay.
      this.addFilesAsync(filesToOpen, { autoplay: true, interruptPlayback: true });
      return;
    }

    const settings = this.getSettings();
    const remembered = this.getRememberedTracks();
    if (settings.playlistOnStartup === "rememberFromLastAppLaunch" && remembered.length > 0) {
      this.addFilesAsync(remembered, { autoplay: settings.autoplayOnStartup, interruptPlayback: true });
    }
  }

  private notifyReordered(newCursor: number | null): void {
    for (const listener of this.changeListeners) {
      listener.playlistReordered?.(newCursor);
    }
    this.bus.publish({ type: "playlistReordered", payload: { newCursor } });
  }
}
