import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeTrackLoader, makeTempDir, RecordingBus, writeFiles } from "../../test-support/fixtures.js";
import { FileExpander } from "./file-expander.js";
import { PlaylistIO } from "./playlist-io.js";
import { PlaylistStore } from "./playlist/playlist-store.js";
import { TrackAddOrchestrator } from "./track-add-orchestrator.js";

const noAutoplay = { autoplay: false, interruptPlayback: false };

describe("TrackAddOrchestrator", () => {
  let root: string;
  let bus: RecordingBus;
  let store: PlaylistStore;
  let loader: FakeTrackLoader;
  let orchestrator: TrackAddOrchestrator;

  async function settle(): Promise<void> {
    await orchestrator.whenIdle();
    await orchestrator.whenMetadataIdle();
    await bus.whenIdle();
  }

  beforeEach(async () => {
    root = await makeTempDir();
    bus = new RecordingBus();
    store = new PlaylistStore();
    loader = new FakeTrackLoader();
    orchestrator = new TrackAddOrchestrator({
      store,
      expander: new FileExpander(new PlaylistIO()),
      loader,
      bus,
      metadataConcurrency: 2
    });
  });

  afterEach(async () => {
    orchestrator.shutdown();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("expands a directory depth-first and reports progress per track", async () => {
    await writeFiles(root, ["Beta - Two.mp3", "Alpha - One.mp3", "notes.txt", "sub/Gamma - Three.flac"]);

    const batchId = orchestrator.submitBatch([root], noAutoplay);
    await settle();

    expect(bus.types(["trackUpdated"])).toEqual(["batchStarted", "trackAdded", "trackAdded", "trackAdded", "batchDone"]);
    expect(bus.ofType("batchStarted")[0]?.payload).toEqual({ batchId, totalTracks: 1 });
    expect(bus.ofType("trackAdded").map((message) => message.payload.progress)).toEqual([
      { tracksAdded: 1, totalTracks: 3 },
      { tracksAdded: 2, totalTracks: 3 },
      { tracksAdded: 3, totalTracks: 3 }
    ]);
    expect(bus.ofType("batchDone")[0]?.payload).toEqual({ batchId, progress: { tracksAdded: 3, totalTracks: 3 } });
    expect(store.getTracks().map((track) => track.metadata.title)).toEqual(["One", "Two", "Three"]);
    expect(store.getGroups("artist").map((group) => group.name)).toEqual(["Alpha", "Beta", "Gamma"]);
  });

  it("reports failures once, after the batch is done", async () => {
    const [good, unreadable] = await writeFiles(root, ["good.mp3", "unreadable.mp3"]);
    if (!good || !unreadable) {
      throw new Error("fixture");
    }
    loader.unreadable.add(unreadable);
    const broken = path.join(root, "broken.m3u");
    await fs.writeFile(broken, Buffer.from([0x61, 0x00]));
    const missing = path.join(root, "missing.mp3");

    orchestrator.submitBatch([missing, unreadable, broken, good], noAutoplay);
    await settle();

    expect(bus.types(["trackUpdated"])).toEqual(["batchStarted", "trackAdded", "batchDone", "tracksNotAdded"]);
    expect(bus.ofType("tracksNotAdded")[0]?.payload.failures).toEqual([
      { reason: "fileNotFound", path: missing },
      { reason: "invalidTrack", path: unreadable, message: "Unable to read audio file: bad header" },
      { reason: "invalidPlaylist", path: broken, message: "Playlist is not a text file." }
    ]);
    expect(bus.ofType("batchDone")[0]?.payload.progress).toEqual({ tracksAdded: 1, totalTracks: 4 });
  });

  it("adds a path once across repeats and concurrent batches", async () => {
    const [song] = await writeFiles(root, ["song.mp3"]);
    if (!song) {
      throw new Error("fixture");
    }

    orchestrator.submitBatch([song, song], noAutoplay);
    orchestrator.submitBatch([song], noAutoplay);
    await settle();

    expect(store.size()).toBe(1);
    expect(bus.ofType("trackAdded")).toHaveLength(1);
    expect(bus.ofType("batchDone")).toHaveLength(2);
  });

  it("follows playlist entries and counts them towards the total", async () => {
    await writeFiles(root, ["a.mp3", "b.mp3"]);
    const playlist = path.join(root, "mix.m3u");
    await fs.writeFile(playlist, "#EXTM3U\na.mp3\nmissing.mp3\nb.mp3\n", "utf8");

    orchestrator.submitBatch([playlist], noAutoplay);
    await settle();

    expect(store.getTracks().map((track) => track.path)).toEqual([path.join(root, "a.mp3"), path.join(root, "b.mp3")]);
    expect(bus.ofType("batchDone")[0]?.payload.progress).toEqual({ tracksAdded: 2, totalTracks: 3 });
    expect(bus.ofType("tracksNotAdded")[0]?.payload.failures).toEqual([
      { reason: "fileNotFound", path: path.join(root, "missing.mp3") }
    ]);
  });

  it("expands a playlist that lists itself only once", async () => {
    await writeFiles(root, ["a.mp3"]);
    const self = path.join(root, "self.m3u");
    await fs.writeFile(self, "a.mp3\nself.m3u\n", "utf8");

    orchestrator.submitBatch([self], noAutoplay);
    await settle();

    expect(store.getTracks().map((track) => track.path)).toEqual([path.join(root, "a.mp3")]);
    expect(bus.types(["trackUpdated"])).toEqual(["batchStarted", "trackAdded", "batchDone"]);
    expect(bus.ofType("batchDone")[0]?.payload.progress).toEqual({ tracksAdded: 1, totalTracks: 2 });
  });

  it("stops at playlists that list each other", async () => {
    await writeFiles(root, ["a.mp3", "b.mp3"]);
    const first = path.join(root, "first.m3u");
    const second = path.join(root, "second.m3u");
    await fs.writeFile(first, "a.mp3\nsecond.m3u\n", "utf8");
    await fs.writeFile(second, "b.mp3\nfirst.m3u\n", "utf8");

    orchestrator.submitBatch([first], noAutoplay);
    await settle();

    expect(store.getTracks().map((track) => track.path)).toEqual([path.join(root, "a.mp3"), path.join(root, "b.mp3")]);
    expect(bus.ofType("batchDone")).toHaveLength(1);
  });

  it("requests autoplay for the first added track only", async () => {
    const files = await writeFiles(root, ["1.mp3", "2.mp3", "3.mp3"]);

    orchestrator.submitBatch(files, { autoplay: true, interruptPlayback: true });
    await settle();

    const requests = bus.ofType("autoplayRequested");
    expect(requests).toHaveLength(1);
    expect(requests[0]?.payload.index).toBe(0);
    expect(requests[0]?.payload.track.path).toBe(files[0]);
    expect(requests[0]?.payload.interruptPlayback).toBe(true);
    expect(bus.types(["trackUpdated"]).slice(0, 3)).toEqual(["batchStarted", "trackAdded", "autoplayRequested"]);
  });

  it("loads durations in the background and publishes the updated track", async () => {
    const [song] = await writeFiles(root, ["song.mp3"]);
    if (!song) {
      throw new Error("fixture");
    }
    loader.durations.set(song, 200);

    orchestrator.submitBatch([song], noAutoplay);
    await settle();

    const updates = bus.ofType("trackUpdated");
    expect(updates).toHaveLength(1);
    expect(updates[0]?.payload.index).toBe(0);
    expect(updates[0]?.payload.track.metadata.durationSec).toBe(200);
    expect(store.totalDuration()).toBe(200);
  });

  it("is busy until every batch has finished", async () => {
    const [song] = await writeFiles(root, ["song.mp3"]);
    if (!song) {
      throw new Error("fixture");
    }

    orchestrator.submitBatch([song], noAutoplay);
    expect(orchestrator.isBusy()).toBe(true);

    await orchestrator.whenIdle();
    expect(orchestrator.isBusy()).toBe(false);
  });
});
