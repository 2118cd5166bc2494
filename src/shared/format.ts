import type { ProgressCounts } from "./types.js";

export function formatDuration(totalSeconds: number | null): string {
  if (totalSeconds == null || !Number.isFinite(totalSeconds) || totalSeconds < 0) {
    return "--:--";
  }

  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const remaining = seconds % 60;

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${String(remaining).padStart(2, "0")}`;
  }

  return `${String(minutes).padStart(2, "0")}:${String(remaining).padStart(2, "0")}`;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// totalTracks can grow mid-batch, so this may go down between two calls.
export function formatProgress(progress: ProgressCounts): string {
  if (progress.totalTracks <= 0) {
    return `${progress.tracksAdded} added`;
  }

  const percent = Math.round((progress.tracksAdded * 100) / progress.totalTracks);
  return `${progress.tracksAdded}/${progress.totalTracks} (${clamp(percent, 0, 100)}%)`;
}
