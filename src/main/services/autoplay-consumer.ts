import { describeError, PlaybackError } from "../../shared/errors.js";
import type { AsyncMessageOf } from "../../shared/messages.js";
import type { EventBus } from "./event-bus.js";
import type { PlaybackDelegate } from "./playback/backend.js";
import type { PlaylistStore } from "./playlist/playlist-store.js";

/**
 * Turns the orchestrator's autoplay decisions into play calls. Kept apart
 * from the add pipeline so inserting tracks never starts playback directly.
 */
export class AutoplayConsumer {
  private readonly bus: EventBus;
  private readonly store: PlaylistStore;
  private readonly playback: PlaybackDelegate;
  private readonly inFlight = new Set<Promise<void>>();

  public constructor(bus: EventBus, store: PlaylistStore, playback: PlaybackDelegate) {
    this.bus = bus;
    this.store = store;
    this.playback = playback;
  }

  public start(): () => void {
    return this.bus.subscribe("autoplayRequested", (message) => {
      const run = this.autoplay(message);
      this.inFlight.add(run);
      void run.finally(() => {
        this.inFlight.delete(run);
      });
    });
  }

  public async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async autoplay(message: AsyncMessageOf<"autoplayRequested">): Promise<void> {
    const { track, interruptPlayback } = message.payload;

    // The reported index can be stale by now; go by identity.
    const index = this.store.indexOfTrack(track);
    if (index === -1) {
      return;
    }

    const oldTrack = this.playback.getPlayingTrack();

    try {
      const newTrack = await this.playback.play(index, interruptPlayback);
      if (newTrack) {
        this.bus.publish({ type: "trackChanged", payload: { oldTrack, newTrack } });
      }
    } catch (error) {
      if (error instanceof PlaybackError) {
        this.bus.publish({
          type: "trackNotPlayed",
          payload: { oldTrack, track, message: error.message }
        });
        return;
      }
      console.error(`Autoplay failed for ${track.path}: ${describeError(error)}`, error);
    }
  }
}
