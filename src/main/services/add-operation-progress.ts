import type { ProgressCounts, TrackAddFailure } from "../../shared/types.js";

/**
 * Running counters for one add batch. Each top-level input starts out as a
 * single placeholder entry; expanding a directory or playlist replaces that
 * placeholder with the entries it produced.
 */
export class AddOperationProgress {
  private tracksAdded = 0;
  private totalTracks: number;
  private readonly failures: TrackAddFailure[] = [];
  private autoplayed = false;

  public constructor(initialTotal: number) {
    this.totalTracks = initialTotal;
  }

  public expandPlaceholder(entryCount: number): void {
    this.totalTracks += entryCount - 1;
  }

  public trackAdded(): ProgressCounts {
    this.tracksAdded += 1;
    return this.snapshot();
  }

  public recordFailure(failure: TrackAddFailure): void {
    this.failures.push(failure);
  }

  /** True exactly once per batch: for the first caller. */
  public claimAutoplay(): boolean {
    if (this.autoplayed) {
      return false;
    }
    this.autoplayed = true;
    return true;
  }

  public hasAutoplayed(): boolean {
    return this.autoplayed;
  }

  public getFailures(): TrackAddFailure[] {
    return [...this.failures];
  }

  public snapshot(): ProgressCounts {
    return {
      tracksAdded: this.tracksAdded,
      totalTracks: this.totalTracks
    };
  }
}
