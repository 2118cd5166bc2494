import type {
  GroupInfo,
  IndexedTrack,
  ProgressCounts,
  RemovalResult,
  SortCriteria,
  SortScope,
  Track,
  TrackAddFailure,
  TrackAddResult
} from "./types.js";

export type AsyncMessage =
  | { type: "batchStarted"; payload: { batchId: string; totalTracks: number } }
  | { type: "batchDone"; payload: { batchId: string; progress: ProgressCounts } }
  | {
    type: "trackAdded";
    payload: {
      batchId: string;
      track: Track;
      index: number;
      groupInfo: TrackAddResult["groupInfo"];
      progress: ProgressCounts;
    };
  }
  | { type: "tracksNotAdded"; payload: { batchId: string; failures: TrackAddFailure[] } }
  | { type: "trackUpdated"; payload: { track: Track; index: number; groupInfo: GroupInfo } }
  | { type: "tracksRemoved"; payload: { result: RemovalResult; newCursor: number | null } }
  | { type: "playlistReordered"; payload: { newCursor: number | null } }
  | { type: "playlistSorted"; payload: { criteria: SortCriteria; scope: SortScope; newCursor: number | null } }
  | { type: "playlistCleared" }
  | { type: "autoplayRequested"; payload: { batchId: string; track: Track; index: number; interruptPlayback: boolean } }
  | { type: "trackChanged"; payload: { oldTrack: IndexedTrack | null; newTrack: IndexedTrack | null } }
  | { type: "trackNotPlayed"; payload: { oldTrack: IndexedTrack | null; track: Track; message: string } };

export type AsyncMessageType = AsyncMessage["type"];

export type AsyncMessageOf<K extends AsyncMessageType> = Extract<AsyncMessage, { type: K }>;

export type SyncRequest =
  | { type: "stopPlayback" }
  | { type: "removeTrack"; index: number }
  | { type: "appExit" };

export type SyncRequestType = SyncRequest["type"];

export type SyncRequestOf<K extends SyncRequestType> = Extract<SyncRequest, { type: K }>;

export type SyncResponse =
  | { type: "empty" }
  | { type: "appExit"; okToExit: boolean };

export const RESPONSE_TYPES = {
  stopPlayback: "empty",
  removeTrack: "empty",
  appExit: "appExit"
} as const satisfies Record<SyncRequestType, SyncResponse["type"]>;

export type SyncResponseFor<K extends SyncRequestType> = Extract<SyncResponse, { type: (typeof RESPONSE_TYPES)[K] }>;

export const EMPTY_RESPONSE = { type: "empty" } as const;

export type SyncNotification =
  | { type: "appLoaded"; filesToOpen: string[] }
  | { type: "appReopened"; filesToOpen: string[]; isDuplicateNotification: boolean };

export type SyncNotificationType = SyncNotification["type"];

export type SyncNotificationOf<K extends SyncNotificationType> = Extract<SyncNotification, { type: K }>;
