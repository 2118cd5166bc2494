import { describe, expect, it, vi } from "vitest";
import { MetadataLoadQueue, type MetadataLoadRequest } from "./metadata-load-queue.js";

function request(trackId: string): MetadataLoadRequest {
  return { trackId, filePath: `/music/${trackId}.mp3` };
}

describe("MetadataLoadQueue", () => {
  it("runs high priority tasks before queued normal ones", async () => {
    const started: string[] = [];
    const queue = new MetadataLoadQueue({
      concurrency: 1,
      runTask: async (task) => {
        started.push(task.trackId);
        await Promise.resolve();
      }
    });

    void queue.enqueue(request("a"));
    void queue.enqueue(request("b"));
    void queue.enqueue(request("c"), "high");
    await queue.whenIdle();

    expect(started).toEqual(["a", "c", "b"]);
  });

  it("promotes a queued task when it is requested again with high priority", async () => {
    const started: string[] = [];
    const queue = new MetadataLoadQueue({
      concurrency: 1,
      runTask: async (task) => {
        started.push(task.trackId);
        await Promise.resolve();
      }
    });

    void queue.enqueue(request("a"));
    void queue.enqueue(request("b"));
    const queued = queue.enqueue(request("c"));
    const again = queue.enqueue(request("c"), "high");
    await queue.whenIdle();

    expect(started).toEqual(["a", "c", "b"]);
    expect(again).toBe(queued);
  });

  it("shares one promise per track while it is pending", () => {
    const queue = new MetadataLoadQueue({ concurrency: 1, runTask: async () => undefined });

    expect(queue.enqueue(request("a"))).toBe(queue.enqueue(request("a")));
  });

  it("reports failures and keeps going", async () => {
    const onTaskError = vi.fn();
    const started: string[] = [];
    const queue = new MetadataLoadQueue({
      concurrency: 2,
      runTask: async (task) => {
        started.push(task.trackId);
        if (task.trackId === "bad") {
          throw new Error("unreadable");
        }
      },
      onTaskError
    });

    await Promise.all([queue.enqueue(request("bad")), queue.enqueue(request("good"))]);

    expect(started).toEqual(["bad", "good"]);
    expect(onTaskError).toHaveBeenCalledTimes(1);
    expect(onTaskError.mock.calls[0]?.[0]).toEqual(request("bad"));
  });

  it("passes each task the request it was queued with", async () => {
    const runTask = vi.fn(async () => undefined);
    const queue = new MetadataLoadQueue({ concurrency: 1, runTask });

    await queue.enqueue(request("a"), "high");

    expect(runTask.mock.calls).toEqual([[request("a")]]);
  });

  it("drops queued work on shutdown", async () => {
    const runTask = vi.fn(async () => {
      await Promise.resolve();
    });
    const queue = new MetadataLoadQueue({ concurrency: 1, runTask });

    void queue.enqueue(request("a"));
    const queued = queue.enqueue(request("b"));
    queue.shutdown();
    await queued;

    expect(runTask).toHaveBeenCalledTimes(1);
    await expect(queue.enqueue(request("c"))).resolves.toBeUndefined();
    expect(runTask).toHaveBeenCalledTimes(1);
  });

  it("starts more workers when the concurrency is raised", () => {
    const started: string[] = [];
    const queue = new MetadataLoadQueue({
      concurrency: 1,
      runTask: async (task) => {
        started.push(task.trackId);
        await new Promise<void>(() => undefined);
      }
    });

    void queue.enqueue(request("a"));
    void queue.enqueue(request("b"));
    expect(started).toEqual(["a"]);

    queue.setConcurrency(2);
    expect(started).toEqual(["a", "b"]);
    queue.shutdown();
  });
});
