export type MetadataLoadPriority = "high" | "normal";

export interface MetadataLoadRequest {
  trackId: string;
  filePath: string;
}

interface MetadataLoadTask {
  request: MetadataLoadRequest;
  resolve(): void;
}

interface MetadataLoadQueueOptions {
  concurrency: number;
  runTask(task: MetadataLoadRequest): Promise<void>;
  onTaskError?(task: MetadataLoadRequest, error: unknown): void;
}

function logTaskError(task: MetadataLoadRequest, error: unknown): void {
  console.warn(`Failed to load metadata for ${task.filePath}:`, error);
}

/**
 * Background duration/tag enrichment, independent of add batches. High
 * priority tasks (e.g. the track about to autoplay) jump the normal queue.
 */
export class MetadataLoadQueue {
  private readonly highQueue: MetadataLoadTask[] = [];
  private readonly normalQueue: MetadataLoadTask[] = [];
  private readonly inFlightByTrack = new Map<string, Promise<void>>();
  private concurrency: number;
  private readonly runTask: (task: MetadataLoadRequest) => Promise<void>;
  private readonly onTaskError: (task: MetadataLoadRequest, error: unknown) => void;
  private workerCount = 0;
  private shuttingDown = false;
  private idleWaiters: Array<() => void> = [];

  public constructor(options: MetadataLoadQueueOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.runTask = options.runTask;
    this.onTaskError = options.onTaskError ?? logTaskError;
  }

  public enqueue(request: MetadataLoadRequest, priority: MetadataLoadPriority = "normal"): Promise<void> {
    if (this.shuttingDown) {
      return Promise.resolve();
    }

    const existing = this.inFlightByTrack.get(request.trackId);
    if (existing) {
      if (priority === "high") {
        this.promote(request.trackId);
      }
      return existing;
    }

    const taskPromise = new Promise<void>((resolve) => {
      const task: MetadataLoadTask = {
        request: { trackId: request.trackId, filePath: request.filePath },
        resolve
      };

      if (priority === "high") {
        this.highQueue.push(task);
      } else {
        this.normalQueue.push(task);
      }

      this.drain();
    }).finally(() => {
      this.inFlightByTrack.delete(request.trackId);
    });

    this.inFlightByTrack.set(request.trackId, taskPromise);
    return taskPromise;
  }

  public setConcurrency(concurrency: number): void {
    this.concurrency = Math.max(1, Math.floor(concurrency));
    this.drain();
  }

  public pendingCount(): number {
    return this.highQueue.length + this.normalQueue.length + this.workerCount;
  }

  public whenIdle(): Promise<void> {
    if (this.pendingCount() === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  public shutdown(): void {
    this.shuttingDown = true;

    const pendingTasks = [...this.highQueue, ...this.normalQueue];
    this.highQueue.length = 0;
    this.normalQueue.length = 0;

    for (const task of pendingTasks) {
      task.resolve();
    }
    this.resolveIdleWaiters();
  }

  private drain(): void {
    if (this.shuttingDown) {
      return;
    }

    while (this.workerCount < this.concurrency) {
      const task = this.shiftNextTask();
      if (!task) {
        break;
      }

      this.workerCount += 1;
      void this.runTask(task.request).catch((error: unknown) => {
        this.onTaskError(task.request, error);
      }).finally(() => {
        this.workerCount -= 1;
        task.resolve();
        this.drain();
      });
    }

    this.resolveIdleWaiters();
  }

  private shiftNextTask(): MetadataLoadTask | null {
    return this.highQueue.shift() ?? this.normalQueue.shift() ?? null;
  }

  private promote(trackId: string): void {
    const index = this.normalQueue.findIndex((task) => task.request.trackId === trackId);
    if (index === -1) {
      return;
    }

    const [task] = this.normalQueue.splice(index, 1);
    if (task) {
      this.highQueue.push(task);
    }
  }

  private resolveIdleWaiters(): void {
    if (this.pendingCount() > 0 || this.idleWaiters.length === 0) {
      return;
    }

    const waiters = [...this.idleWaiters];
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
