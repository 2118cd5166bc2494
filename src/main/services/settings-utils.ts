import { clamp } from "../../shared/format.js";
import type { AppSettings } from "../../shared/types.js";

const AUTOPLAY_OPTIONS: readonly AppSettings["autoplayAfterAddingOption"][] = ["ifNotPlaying", "always"];
const STARTUP_OPTIONS: readonly AppSettings["playlistOnStartup"][] = ["empty", "rememberFromLastAppLaunch"];

function asFiniteNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return fallback;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }

  return fallback;
}

function asOneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function sanitizeAppSettings(candidate: Partial<Record<keyof AppSettings, unknown>>, defaults: AppSettings): AppSettings {
  const concurrency = asFiniteNumber(candidate.metadataConcurrency, defaults.metadataConcurrency);

  return {
    autoplayAfterAddingTracks: asBoolean(candidate.autoplayAfterAddingTracks, defaults.autoplayAfterAddingTracks),
    autoplayAfterAddingOption: asOneOf(
      candidate.autoplayAfterAddingOption,
      AUTOPLAY_OPTIONS,
      defaults.autoplayAfterAddingOption
    ),
    autoplayOnStartup: asBoolean(candidate.autoplayOnStartup, defaults.autoplayOnStartup),
    playlistOnStartup: asOneOf(candidate.playlistOnStartup, STARTUP_OPTIONS, defaults.playlistOnStartup),
    metadataConcurrency: clamp(Math.round(concurrency), 1, 16)
  };
}
