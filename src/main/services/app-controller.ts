import type { AppSettings, PlaylistSummary } from "../../shared/types.js";
import { AutoplayConsumer } from "./autoplay-consumer.js";
import { ConfigStore } from "./config-store.js";
import { EventBus } from "./event-bus.js";
import { FileExpander } from "./file-expander.js";
import type { PlaybackDelegate } from "./playback/backend.js";
import { PlaybackSequencer } from "./playback/playback-sequencer.js";
import type { PlaylistChangeListener } from "./playlist-change-listener.js";
import { PlaylistIO } from "./playlist-io.js";
import { PlaylistMutator } from "./playlist-mutator.js";
import { PlaylistStateStore } from "./playlist-state-store.js";
import { PlaylistStore } from "./playlist/playlist-store.js";
import { TrackAddOrchestrator } from "./track-add-orchestrator.js";
import { MusicMetadataTrackLoader, type TrackLoader } from "./track-loader.js";

export interface AppControllerOptions {
  dataDir: string;
  loader?: TrackLoader;
  bus?: EventBus;
}

/**
 * Builds the engine once at startup and tears it down at shutdown. Every
 * component gets the same bus instance.
 */
export class AppController {
  public readonly bus: EventBus;
  public readonly store = new PlaylistStore();
  public readonly playback: PlaybackSequencer;
  public readonly mutator: PlaylistMutator;
  private readonly configStore: ConfigStore;
  private readonly stateStore: PlaylistStateStore;
  private readonly playlistIO = new PlaylistIO();
  private readonly loader: TrackLoader;
  private readonly autoplayConsumer: AutoplayConsumer;
  private readonly orchestrator: TrackAddOrchestrator;
  private settings: AppSettings;
  private rememberedTracks: string[] = [];
  private teardown: Array<() => void> = [];
  private shutdownPromise: Promise<void> | null = null;

  public constructor(options: AppControllerOptions) {
    this.bus = options.bus ?? new EventBus();
    this.configStore = new ConfigStore(options.dataDir);
    this.stateStore = new PlaylistStateStore(options.dataDir);
    this.loader = options.loader ?? new MusicMetadataTrackLoader();
    this.settings = this.configStore.getDefaults();

    this.playback = new PlaybackSequencer(this.store);
    const playbackDelegate: PlaybackDelegate = this.playback;
    const changeListeners: PlaylistChangeListener[] = [this.playback];

    this.orchestrator = new TrackAddOrchestrator({
      store: this.store,
      expander: new FileExpander(this.playlistIO),
      loader: this.loader,
      bus: this.bus,
      metadataConcurrency: this.settings.metadataConcurrency,
      changeListeners
    });
    this.autoplayConsumer = new AutoplayConsumer(this.bus, this.store, playbackDelegate);
    this.mutator = new PlaylistMutator({
      store: this.store,
      orchestrator: this.orchestrator,
      playback: playbackDelegate,
      bus: this.bus,
      playlistIO: this.playlistIO,
      getSettings: () => this.settings,
      getRememberedTracks: () => this.rememberedTracks,
      changeListeners
    });
  }

  public async init(): Promise<AppSettings> {
    this.settings = await this.configStore.load();
    this.orchestrator.setMetadataConcurrency(this.settings.metadataConcurrency);
    this.rememberedTracks = (await this.stateStore.load())?.tracks ?? [];

    this.teardown = [
      this.playback.registerHandlers(this.bus),
      this.mutator.registerHandlers(),
      this.autoplayConsumer.start(),
      this.bus.handleRequest("appExit", () => ({
        type: "appExit",
        okToExit: !this.orchestrator.isBusy()
      }))
    ];

    return this.settings;
  }

  /** Equivalent of the app finishing its launch with these command-line files. */
  public launch(filesToOpen: readonly string[]): void {
    this.bus.publishNotification({ type: "appLoaded", filesToOpen: [...filesToOpen] });
  }

  public getSettings(): AppSettings {
    return this.settings;
  }

  public async saveSettings(next: AppSettings): Promise<void> {
    await this.configStore.save(next);
    this.settings = await this.configStore.load();
    this.orchestrator.setMetadataConcurrency(this.settings.metadataConcurrency);
  }

  public summary(): PlaylistSummary {
    return this.store.summary();
  }

  /** Waits for add batches, metadata loads, autoplay and bus deliveries to settle. */
  public async whenIdle(): Promise<void> {
    await this.orchestrator.whenIdle();
    await this.orchestrator.whenMetadataIdle();
    await this.bus.whenIdle();
    await this.autoplayConsumer.whenIdle();
    await this.bus.whenIdle();
  }

  public async persistState(): Promise<void> {
    await this.stateStore.save({
      tracks: this.store.getTracks().map((track) => track.path)
    });
  }

  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      await this.orchestrator.whenIdle();
      this.orchestrator.shutdown();

      try {
        await this.persistState();
      } catch (error) {
        console.error("Failed to persist playlist state:", error);
      }

      await this.bus.whenIdle();
      for (const unsubscribe of this.teardown) {
        unsubscribe();
      }
      this.teardown = [];
      this.bus.shutdown();
    })();

    await this.shutdownPromise;
  }
}
