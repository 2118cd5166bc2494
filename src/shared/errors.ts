export type PlaylistEngineErrorCode =
  | "INVALID_REORDER"
  | "PLAYLIST_PARSE_FAILURE"
  | "PLAYLIST_IO_FAILURE"
  | "PLAYBACK_FAILURE"
  | "INVALID_TRACK";

export class PlaylistEngineError extends Error {
  public readonly code: PlaylistEngineErrorCode;

  public constructor(code: PlaylistEngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidReorderError extends PlaylistEngineError {
  public constructor(message: string) {
    super("INVALID_REORDER", message);
  }
}

export class PlaylistParseError extends PlaylistEngineError {
  public readonly path: string;

  public constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("PLAYLIST_PARSE_FAILURE", message, options);
    this.path = filePath;
  }
}

export class PlaylistIoError extends PlaylistEngineError {
  public readonly path: string;

  public constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("PLAYLIST_IO_FAILURE", message, options);
    this.path = filePath;
  }
}

export class PlaybackError extends PlaylistEngineError {
  public readonly index: number;

  public constructor(index: number, message: string, options?: { cause?: unknown }) {
    super("PLAYBACK_FAILURE", message, options);
    this.index = index;
  }
}

export class InvalidTrackError extends PlaylistEngineError {
  public readonly path: string;

  public constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("INVALID_TRACK", message, options);
    this.path = filePath;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
