import { randomUUID } from "node:crypto";
import { describeError, PlaylistParseError } from "../../shared/errors.js";
import type { AutoplayOptions } from "../../shared/types.js";
import { AddOperationProgress } from "./add-operation-progress.js";
import type { EventBus } from "./event-bus.js";
import type { FileExpander } from "./file-expander.js";
import { MetadataLoadQueue, type MetadataLoadPriority } from "./metadata-load-queue.js";
import type { PlaylistChangeListener } from "./playlist-change-listener.js";
import type { PlaylistStore } from "./playlist/playlist-store.js";
import { createTrack } from "./playlist/track.js";
import type { TrackLoader } from "./track-loader.js";

interface TrackAddOrchestratorOptions {
  store: PlaylistStore;
  expander: FileExpander;
  loader: TrackLoader;
  bus: EventBus;
  metadataConcurrency: number;
  changeListeners?: readonly PlaylistChangeListener[];
}

interface BatchContext {
  batchId: string;
  autoplay: AutoplayOptions;
  progress: AddOperationProgress;
  visitedDirectories: Set<string>;
  visitedPlaylists: Set<string>;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

/**
 * Runs add batches in the background: expands every input depth-first,
 * inserts tracks into the store, and reports progress on the bus.
 *
 * Per batch: batchStarted, then one trackAdded per inserted track, then
 * batchDone, then tracksNotAdded when anything failed. Batches submitted
 * concurrently are not serialized against each other.
 */
export class TrackAddOrchestrator {
  private readonly store: PlaylistStore;
  private readonly expander: FileExpander;
  private readonly loader: TrackLoader;
  private readonly bus: EventBus;
  private readonly changeListeners: readonly PlaylistChangeListener[];
  private readonly metadataQueue: MetadataLoadQueue;
  private readonly inFlight = new Set<Promise<void>>();

  public constructor(options: TrackAddOrchestratorOptions) {
    this.store = options.store;
    this.expander = options.expander;
    this.loader = options.loader;
    this.bus = options.bus;
    this.changeListeners = options.changeListeners ?? [];
    this.metadataQueue = new MetadataLoadQueue({
      concurrency: options.metadataConcurrency,
      runTask: async (task) => {
        await this.executeMetadataLoad(task.trackId, task.filePath);
      }
    });
  }

  /** Returns the batch id right away; the work starts on a later tick. */
  public submitBatch(paths: readonly string[], autoplay: AutoplayOptions): string {
    const batchId = randomUUID();
    const run = this.runBatch(batchId, [...paths], autoplay).catch((error: unknown) => {
      console.error(`Add batch ${batchId} failed:`, error);
    });

    this.inFlight.add(run);
    void run.finally(() => {
      this.inFlight.delete(run);
    });

    return batchId;
  }

  public isBusy(): boolean {
    return this.inFlight.size > 0;
  }

  public async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  public setMetadataConcurrency(concurrency: number): void {
    this.metadataQueue.setConcurrency(concurrency);
  }

  public whenMetadataIdle(): Promise<void> {
    return this.metadataQueue.whenIdle();
  }

  public shutdown(): void {
    this.metadataQueue.shutdown();
  }

  private async runBatch(batchId: string, paths: string[], autoplay: AutoplayOptions): Promise<void> {
    await yieldToEventLoop();

    const context: BatchContext = {
      batchId,
      autoplay,
      progress: new AddOperationProgress(paths.length),
      visitedDirectories: new Set(),
      visitedPlaylists: new Set()
    };

    this.bus.publish({ type: "batchStarted", payload: { batchId, totalTracks: paths.length } });

    try {
      await this.addFiles(paths, context);
    } finally {
      this.bus.publish({ type: "batchDone", payload: { batchId, progress: context.progress.snapshot() } });

      const failures = context.progress.getFailures();
      if (failures.length > 0) {
        this.bus.publish({ type: "tracksNotAdded", payload: { batchId, failures } });
      }
    }
  }

  private async addFiles(paths: readonly string[], context: BatchContext): Promise<void> {
    for (const inputPath of paths) {
      try {
        await this.addFile(inputPath, context);
      } catch (error) {
        context.progress.recordFailure({
          reason: "invalidTrack",
          path: inputPath,
          message: describeError(error)
        });
      }
    }
  }

  private async addFile(inputPath: string, context: BatchContext): Promise<void> {
    const classification = await this.expander.classify(inputPath);

    switch (classification.type) {
      case "notFound":
        context.progress.recordFailure({ reason: "fileNotFound", path: inputPath });
        return;
      case "unsupported":
        return;
      case "directory": {
        if (context.visitedDirectories.has(classification.path)) {
          return;
        }
        context.visitedDirectories.add(classification.path);

        const entries = await this.expander.listDirectory(classification.path);
        context.progress.expandPlaceholder(entries.length);
        await this.addFiles(entries, context);
        return;
      }
      case "playlist": {
        // Playlists may list themselves or each other.
        if (context.visitedPlaylists.has(classification.path)) {
          return;
        }
        context.visitedPlaylists.add(classification.path);

        let entries: string[];
        try {
          entries = await this.expander.expandPlaylistFile(classification.path);
        } catch (error) {
          if (!(error instanceof PlaylistParseError)) {
            throw error;
          }
          context.progress.recordFailure({
            reason: "invalidPlaylist",
            path: classification.path,
            message: error.message
          });
          return;
        }

        context.progress.expandPlaceholder(entries.length);
        await this.addFiles(entries, context);
        return;
      }
      case "track":
        await this.addTrack(classification.path, context);
        return;
    }
  }

  private async addTrack(filePath: string, context: BatchContext): Promise<void> {
    if (this.store.hasPath(filePath)) {
      return;
    }

    const track = createTrack(filePath);
    try {
      track.metadata = await this.loader.loadDisplayInfo(track);
    } catch (error) {
      context.progress.recordFailure({
        reason: "invalidTrack",
        path: filePath,
        message: describeError(error)
      });
      return;
    }

    // Another batch may have inserted the same path while display info loaded.
    const result = this.store.addTrack(track);
    if (!result) {
      return;
    }

    const progress = context.progress.trackAdded();
    this.bus.publish({
      type: "trackAdded",
      payload: {
        batchId: context.batchId,
        track,
        index: result.index,
        groupInfo: result.groupInfo,
        progress
      }
    });

    for (const listener of this.changeListeners) {
      listener.trackAdded?.(track);
    }

    let priority: MetadataLoadPriority = "normal";
    if (context.autoplay.autoplay && context.progress.claimAutoplay()) {
      priority = "high";
      this.bus.publish({
        type: "autoplayRequested",
        payload: {
          batchId: context.batchId,
          track,
          index: result.index,
          interruptPlayback: context.autoplay.interruptPlayback
        }
      });
    }

    void this.metadataQueue.enqueue({ trackId: track.id, filePath: track.path }, priority);
  }

  private async executeMetadataLoad(trackId: string, filePath: string): Promise<void> {
    const preflightTrack = this.store.getTrackById(trackId);
    if (!preflightTrack || preflightTrack.path !== filePath) {
      return;
    }

    const durationSec = await this.loader.loadDuration(preflightTrack);

    const liveTrack = this.store.updateDuration(trackId, durationSec);
    if (!liveTrack) {
      return;
    }

    const index = this.store.indexOfTrack(liveTrack);
    const groupInfo = this.store.groupInfoForTrack(liveTrack);
    if (index === -1 || !groupInfo) {
      return;
    }

    this.bus.publish({ type: "trackUpdated", payload: { track: liveTrack, index, groupInfo } });
  }
}
