import { describe, expect, it } from "vitest";
import { InvalidReorderError } from "../../../shared/errors.js";
import type { SearchQuery, Track } from "../../../shared/types.js";
import { makeTrack } from "../../../test-support/fixtures.js";
import { PlaylistStore } from "./playlist-store.js";

function storeWith(tracks: readonly Track[]): PlaylistStore {
  const store = new PlaylistStore();
  for (const track of tracks) {
    store.addTrack(track);
  }
  return store;
}

function numbered(count: number): Track[] {
  return Array.from({ length: count }, (_, index) => makeTrack(`/music/t${index}.mp3`));
}

function titles(store: PlaylistStore): string[] {
  return store.getTracks().map((track) => track.metadata.title);
}

const allFields: SearchQuery["fields"] = { name: true, artist: true, title: true, album: true };

describe("PlaylistStore", () => {
  describe("addTrack", () => {
    it("appends tracks and rejects a second track with the same path", () => {
      const store = new PlaylistStore();
      const first = store.addTrack(makeTrack("/music/a.mp3"));
      const duplicate = store.addTrack(makeTrack("/music/a.mp3"));

      expect(first?.index).toBe(0);
      expect(duplicate).toBeNull();
      expect(store.size()).toBe(1);
    });

    it("creates a group on the first track that needs it", () => {
      const store = new PlaylistStore();
      store.addTrack(makeTrack("/music/a.mp3", { artist: "X" }));
      store.addTrack(makeTrack("/music/b.mp3", { artist: "Y" }));
      const third = store.addTrack(makeTrack("/music/c.mp3", { artist: " X " }));

      expect(store.getGroups("artist").map((group) => group.name)).toEqual(["X", "Y"]);
      expect(third?.groupInfo.artist.groupCreated).toBe(false);
      expect(third?.groupInfo.artist.groupedTrack.groupIndex).toBe(0);
      expect(third?.groupInfo.artist.groupedTrack.trackIndex).toBe(1);
    });

    it("files tracks without a tag under the unknown group", () => {
      const store = storeWith([makeTrack("/music/a.mp3")]);

      expect(store.getGroups("artist").map((group) => group.name)).toEqual(["<Unknown Artist>"]);
      expect(store.getGroups("album").map((group) => group.name)).toEqual(["<Unknown Album>"]);
      expect(store.getGroups("genre").map((group) => group.name)).toEqual(["<Unknown Genre>"]);
    });
  });

  describe("removeTracks", () => {
    it("removes tracks from every grouping and deletes emptied groups", () => {
      const a = makeTrack("/music/a.mp3", { artist: "X", album: "A" });
      const b = makeTrack("/music/b.mp3", { artist: "Y" });
      const c = makeTrack("/music/c.mp3", { artist: "X" });
      const store = storeWith([a, b, c]);

      const result = store.removeTracks([1]);

      expect(result.removedTracks).toEqual([{ index: 1, track: b }]);
      expect(result.groupResults.artist).toEqual([
        { groupName: "Y", groupIndex: 1, groupRemoved: true, trackIndexes: [0] }
      ]);
      expect(result.groupResults.album).toEqual([
        { groupName: "<Unknown Album>", groupIndex: 1, groupRemoved: false, trackIndexes: [0] }
      ]);
      expect(store.getGroups("artist").map((group) => group.name)).toEqual(["X"]);
      expect(store.getTracks()).toEqual([a, c]);
      expect(store.hasPath("/music/b.mp3")).toBe(false);
    });

    it("skips invalid indexes", () => {
      const store = storeWith(numbered(2));
      const result = store.removeTracks([7, -1, 1.5]);

      expect(result.removedTracks).toEqual([]);
      expect(store.size()).toBe(2);
    });
  });

  describe("moves", () => {
    it("moves a selection up, keeping a track that is already at the top", () => {
      const store = storeWith(numbered(5));
      const result = store.moveTracksUp([2, 0]);

      expect(result.results).toEqual([
        { oldIndex: 0, newIndex: 0 },
        { oldIndex: 2, newIndex: 1 }
      ]);
      expect(titles(store)).toEqual(["t0", "t2", "t1", "t3", "t4"]);
    });

    it("keeps a block pinned at the bottom in place", () => {
      const store = storeWith(numbered(5));
      const result = store.moveTracksDown([3, 4]);

      expect(result.results).toEqual([
        { oldIndex: 4, newIndex: 4 },
        { oldIndex: 3, newIndex: 3 }
      ]);
      expect(titles(store)).toEqual(["t0", "t1", "t2", "t3", "t4"]);
    });

    it("undoes a move up with a move down of the moved positions", () => {
      const store = storeWith(numbered(4));
      store.moveTracksUp([1, 2]);
      expect(titles(store)).toEqual(["t1", "t2", "t0", "t3"]);

      store.moveTracksDown([0, 1]);
      expect(titles(store)).toEqual(["t0", "t1", "t2", "t3"]);
    });
  });

  describe("reorderTracks", () => {
    it("places named tracks and fills the remaining slots in order", () => {
      const [a, b, c, d] = numbered(4);
      if (!a || !b || !c || !d) {
        throw new Error("fixture");
      }
      const store = storeWith([a, b, c, d]);

      store.reorderTracks([
        { track: d, newIndex: 0 },
        { track: a, newIndex: 2 }
      ]);

      expect(store.getTracks()).toEqual([d, b, a, c]);
    });

    it("rejects an out-of-range target without changing the order", () => {
      const tracks = numbered(3);
      const store = storeWith(tracks);
      const [first] = tracks;
      if (!first) {
        throw new Error("fixture");
      }

      expect(() => store.reorderTracks([{ track: first, newIndex: 5 }])).toThrow(InvalidReorderError);
      expect(titles(store)).toEqual(["t0", "t1", "t2"]);
    });

    it("rejects two tracks aimed at the same index", () => {
      const tracks = numbered(3);
      const store = storeWith(tracks);
      const [first, second] = tracks;
      if (!first || !second) {
        throw new Error("fixture");
      }

      expect(() =>
        store.reorderTracks([
          { track: first, newIndex: 2 },
          { track: second, newIndex: 2 }
        ])
      ).toThrow("More than one track targets index 2.");
      expect(titles(store)).toEqual(["t0", "t1", "t2"]);
    });

    it("rejects a track that is not in the playlist", () => {
      const store = storeWith(numbered(2));
      const stranger = makeTrack("/elsewhere/x.mp3");

      expect(() => store.reorderTracks([{ track: stranger, newIndex: 0 }])).toThrow(InvalidReorderError);
    });
  });

  describe("grouped moves and reorder", () => {
    function groupedStore() {
      const a = makeTrack("/music/a.mp3", { artist: "X", title: "a" });
      const b = makeTrack("/music/b.mp3", { artist: "Y", title: "b" });
      const c = makeTrack("/music/c.mp3", { artist: "X", title: "c" });
      const d = makeTrack("/music/d.mp3", { artist: "Z", title: "d" });
      const e = makeTrack("/music/e.mp3", { artist: "X", title: "e" });
      const store = storeWith([a, b, c, d, e]);
      const group = (index: number) => {
        const found = store.groupAt("artist", index);
        if (!found) {
          throw new Error("fixture");
        }
        return found;
      };
      return { store, a, b, c, d, e, x: group(0), y: group(1), z: group(2) };
    }

    function groupNames(store: PlaylistStore): string[] {
      return store.getGroups("artist").map((group) => group.name);
    }

    function groupTitles(store: PlaylistStore, index: number): string[] | undefined {
      return store.groupAt("artist", index)?.tracks.map((track) => track.metadata.title);
    }

    it("moves groups within the grouping and tracks within their group", () => {
      const { store, e, x, z } = groupedStore();

      const result = store.moveTracksAndGroupsUp([e], [z], "artist");

      expect(result.groupType).toBe("artist");
      expect(result.groupResults).toEqual([{ group: z, oldIndex: 2, newIndex: 1 }]);
      expect(result.trackResults).toEqual([{ group: x, track: e, oldIndex: 2, newIndex: 1 }]);
      expect(groupNames(store)).toEqual(["X", "Z", "Y"]);
      expect(groupTitles(store, 0)).toEqual(["a", "e", "c"]);
      expect(titles(store)).toEqual(["a", "b", "c", "d", "e"]);
    });

    it("leaves tracks alone when their group is moved with them", () => {
      const { store, b, c, y } = groupedStore();

      const result = store.moveTracksAndGroupsDown([c, b], [y], "artist");

      expect(result.groupResults.map((entry) => [entry.group.name, entry.oldIndex, entry.newIndex])).toEqual([["Y", 1, 2]]);
      expect(result.trackResults.map((entry) => [entry.track.metadata.title, entry.oldIndex, entry.newIndex])).toEqual([
        ["c", 1, 2]
      ]);
      expect(groupNames(store)).toEqual(["X", "Z", "Y"]);
      expect(groupTitles(store, 0)).toEqual(["a", "e", "c"]);
    });

    it("keeps items that are already at the edge in place", () => {
      const { store, a, x } = groupedStore();

      const result = store.moveTracksAndGroupsUp([a], [x], "artist");

      expect(result.groupResults).toEqual([{ group: x, oldIndex: 0, newIndex: 0 }]);
      expect(result.trackResults).toEqual([]);

      const trackOnly = store.moveTracksAndGroupsUp([a], [], "artist");
      expect(trackOnly.trackResults).toEqual([{ group: x, track: a, oldIndex: 0, newIndex: 0 }]);
      expect(groupNames(store)).toEqual(["X", "Y", "Z"]);
    });

    it("reorders groups and the tracks inside a group", () => {
      const { store, e, z } = groupedStore();

      store.reorderGrouping("artist", [
        { type: "group", group: z, newIndex: 0 },
        { type: "track", track: e, newIndex: 0 }
      ]);

      expect(groupNames(store)).toEqual(["Z", "X", "Y"]);
      expect(groupTitles(store, 1)).toEqual(["e", "a", "c"]);
      expect(titles(store)).toEqual(["a", "b", "c", "d", "e"]);
    });

    it("rejects a grouped reorder without applying any part of it", () => {
      const { store, a, z } = groupedStore();

      expect(() =>
        store.reorderGrouping("artist", [
          { type: "group", group: z, newIndex: 0 },
          { type: "track", track: a, newIndex: 3 }
        ])
      ).toThrow('Target index 3 is outside the group "X" (size 3).');
      expect(groupNames(store)).toEqual(["X", "Y", "Z"]);
      expect(groupTitles(store, 0)).toEqual(["a", "c", "e"]);
    });

    it("rejects a group from another grouping", () => {
      const { store } = groupedStore();
      const album = store.groupAt("album", 0);
      if (!album) {
        throw new Error("fixture");
      }

      expect(() => store.reorderGrouping("artist", [{ type: "group", group: album, newIndex: 0 }])).toThrow(
        'Group "<Unknown Album>" is not in the artist grouping.'
      );
    });
  });

  describe("sort", () => {
    it("keeps the existing order for ties", () => {
      const store = storeWith([
        makeTrack("/music/1.mp3", { artist: "B", title: "1" }),
        makeTrack("/music/2.mp3", { artist: "A", title: "2" }),
        makeTrack("/music/3.mp3", { artist: "B", title: "3" })
      ]);

      store.sort({ fields: ["artist"], order: "ascending" });
      expect(titles(store)).toEqual(["2", "1", "3"]);

      store.sort({ fields: ["artist"], order: "descending" });
      expect(titles(store)).toEqual(["1", "3", "2"]);
    });

    it("sorts inside each group without touching the flat order or the group order", () => {
      const store = storeWith([
        makeTrack("/music/1.mp3", { artist: "X", title: "a" }),
        makeTrack("/music/2.mp3", { artist: "Y", title: "b" }),
        makeTrack("/music/3.mp3", { artist: "X", title: "c" })
      ]);

      store.sort({ fields: ["title"], order: "descending" }, { type: "group", groupType: "artist" });

      expect(titles(store)).toEqual(["a", "b", "c"]);
      expect(store.getGroups("artist").map((group) => group.name)).toEqual(["X", "Y"]);
      expect(store.groupAt("artist", 0)?.tracks.map((track) => track.metadata.title)).toEqual(["c", "a"]);
    });
  });

  describe("search", () => {
    const tracks = [
      makeTrack("/music/1.mp3", { artist: "Alpha", title: "One" }),
      makeTrack("/music/2.mp3", { title: "Ballad" }),
      makeTrack("/music/3.mp3", { artist: "Zed", title: "Two", album: "Calm" })
    ];

    it("reports the first matching field per track", () => {
      const store = storeWith(tracks);
      const results = store.search({ text: "AL", type: "contains", fields: allFields, caseSensitive: false });

      expect(results.count).toBe(3);
      expect(results.results.map((result) => result.match)).toEqual([
        { field: "name", value: "Alpha - One" },
        { field: "name", value: "Ballad" },
        { field: "album", value: "Calm" }
      ]);
    });

    it("honours case sensitivity and the selected fields", () => {
      const store = storeWith(tracks);
      const results = store.search({
        text: "Two",
        type: "equals",
        fields: { name: false, artist: false, title: true, album: false },
        caseSensitive: true
      });

      expect(results.results.map((result) => result.index)).toEqual([2]);
    });

    it("locates matches inside the requested grouping", () => {
      const store = storeWith(tracks);
      const results = store.search(
        { text: "Zed", type: "beginsWith", fields: allFields, caseSensitive: true },
        "artist"
      );

      expect(results.results[0]?.location?.group.name).toBe("Zed");
      expect(results.results[0]?.location?.groupIndex).toBe(2);
    });

    it("matches nothing for empty text", () => {
      const store = storeWith(tracks);
      expect(store.search({ text: "", type: "contains", fields: allFields, caseSensitive: false })).toEqual({
        count: 0,
        results: []
      });
    });
  });

  it("sums known durations and treats unknown ones as zero", () => {
    const store = storeWith([
      makeTrack("/music/1.mp3", { durationSec: 100 }),
      makeTrack("/music/2.mp3"),
      makeTrack("/music/3.mp3", { durationSec: 20.5 })
    ]);

    expect(store.totalDuration()).toBe(120.5);
    expect(store.summary().size).toBe(3);
  });

  it("clears tracks and groups", () => {
    const store = storeWith(numbered(3));
    store.clear();

    expect(store.size()).toBe(0);
    expect(store.numberOfGroups("artist")).toBe(0);
    expect(store.hasPath("/music/t0.mp3")).toBe(false);
  });
});
