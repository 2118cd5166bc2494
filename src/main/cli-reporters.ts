import { formatProgress } from "../shared/format.js";
import type { TrackAddFailure } from "../shared/types.js";
import type { EventBus } from "./services/event-bus.js";
import { trackDisplayName } from "./services/playlist/track.js";

export type ReportOutput = Pick<Console, "log" | "error">;

export function describeFailure(failure: TrackAddFailure): string {
  switch (failure.reason) {
    case "fileNotFound":
      return `${failure.path}: file not found`;
    case "invalidTrack":
      return `${failure.path}: not a playable track (${failure.message})`;
    case "invalidPlaylist":
      return `${failure.path}: unreadable playlist (${failure.message})`;
  }
}

/** Prints batch progress and playback changes. Returns a detach function. */
export function attachReporters(bus: EventBus, output: ReportOutput = console): () => void {
  const unsubscribers = [
    bus.subscribe("batchStarted", ({ payload }) => {
      output.log(`Adding ${payload.totalTracks} item(s)...`);
    }),
    bus.subscribe("trackAdded", ({ payload }) => {
      output.log(`[${formatProgress(payload.progress)}] ${trackDisplayName(payload.track)}`);
    }),
    bus.subscribe("batchDone", ({ payload }) => {
      output.log(`Done: ${formatProgress(payload.progress)}`);
    }),
    bus.subscribe("tracksNotAdded", ({ payload }) => {
      for (const failure of payload.failures) {
        output.error(`Not added: ${describeFailure(failure)}`);
      }
    }),
    bus.subscribe("trackChanged", ({ payload }) => {
      if (payload.newTrack) {
        output.log(`Now playing: ${trackDisplayName(payload.newTrack.track)}`);
      }
    }),
    bus.subscribe("trackNotPlayed", ({ payload }) => {
      output.error(`Could not play ${payload.track.path}: ${payload.message}`);
    })
  ];

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
