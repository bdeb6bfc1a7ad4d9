import { describe, it, expect, vi } from "vitest";
import type { DownloadJob } from "./job.js";
import { JobScheduler, busyReply, queueFullReply, queuedReply } from "./job-scheduler.js";
import type { BusyPolicy } from "./config.js";
import { FakeAdapter, selfMessage } from "./testing/fake-adapter.js";

// Executor whose runs stay pending until released, oldest first
function heldExecutor() {
  const runs: DownloadJob[] = [];
  const releases: Array<() => void> = [];
  const executor = {
    run: async (job: DownloadJob): Promise<DownloadJob> => {
      runs.push(job);
      await new Promise<void>((resolve) => releases.push(resolve));
      job.state = "done";
      return job;
    },
  };
  const release = () => {
    const next = releases.shift();
    if (!next) throw new Error("no run is waiting");
    next();
  };
  return { executor, runs, release };
}

function setup(busyPolicy: BusyPolicy, maxQueuedJobs = 10) {
  const adapter = new FakeAdapter();
  const held = heldExecutor();
  const scheduler = new JobScheduler({ executor: held.executor, adapter, busyPolicy, maxQueuedJobs });
  return { adapter, scheduler, ...held };
}

const command = (id: string, reference: string) => selfMessage(`download ${reference}`, { id });

describe("JobScheduler", () => {
  it("starts a job at once and returns without waiting for it", async () => {
    const { scheduler, runs, release } = setup("reject");

    const outcome = await scheduler.submit(command("101", "foo"), "foo");

    expect(outcome.status).toBe("started");
    expect(runs.map((j) => j.channelReference)).toEqual(["foo"]);
    expect(scheduler.isBusy()).toBe(true);
    expect(scheduler.getStatus().active?.channelReference).toBe("foo");

    release();
    await scheduler.idle();

    expect(scheduler.isBusy()).toBe(false);
    expect(scheduler.getStatus().active).toBeNull();
    expect(scheduler.getStatus().recent.map((j) => j.channelReference)).toEqual(["foo"]);
  });

  it("rejects a second command while busy under the reject policy", async () => {
    const { adapter, scheduler, runs, release } = setup("reject");
    await scheduler.submit(command("101", "foo"), "foo");

    const outcome = await scheduler.submit(command("102", "bar"), "bar");

    expect(outcome).toEqual({ status: "rejected", reason: "busy" });
    expect(adapter.sent).toEqual([{ to: "777", text: busyReply("foo", "bar"), replyToId: "102" }]);
    expect(runs).toHaveLength(1);

    release();
    await scheduler.idle();
    expect(runs).toHaveLength(1);
  });

  it("queues commands in order under the queue policy", async () => {
    const { adapter, scheduler, runs, release } = setup("queue");
    await scheduler.submit(command("101", "foo"), "foo");

    const second = await scheduler.submit(command("102", "bar"), "bar");
    const third = await scheduler.submit(command("103", "baz"), "baz");

    expect(second).toMatchObject({ status: "queued", position: 1 });
    expect(third).toMatchObject({ status: "queued", position: 2 });
    expect(adapter.sent.map((m) => m.text)).toEqual([queuedReply("bar", 1), queuedReply("baz", 2)]);
    expect(scheduler.getStatus().queued.map((j) => j.channelReference)).toEqual(["bar", "baz"]);

    release();
    await vi.waitFor(() => expect(runs).toHaveLength(2));
    release();
    await vi.waitFor(() => expect(runs).toHaveLength(3));
    release();
    await scheduler.idle();

    expect(runs.map((j) => j.channelReference)).toEqual(["foo", "bar", "baz"]);
    expect(scheduler.getStatus().recent.map((j) => j.channelReference)).toEqual(["baz", "bar", "foo"]);
  });

  it("rejects once the queue is full", async () => {
    const { adapter, scheduler, release } = setup("queue", 1);
    await scheduler.submit(command("101", "foo"), "foo");
    await scheduler.submit(command("102", "bar"), "bar");

    const outcome = await scheduler.submit(command("103", "baz"), "baz");

    expect(outcome).toEqual({ status: "rejected", reason: "queue_full" });
    expect(adapter.sent.at(-1)).toEqual({ to: "777", text: queueFullReply("baz"), replyToId: "103" });

    release();
    await vi.waitFor(() => expect(scheduler.getStatus().active?.channelReference).toBe("bar"));
    release();
    await scheduler.idle();
  });

  it("keeps going after a job throws", async () => {
    const adapter = new FakeAdapter();
    const run = vi.fn(async (job: DownloadJob) => {
      if (job.channelReference === "boom") throw new Error("unexpected");
      return job;
    });
    const scheduler = new JobScheduler({ executor: { run }, adapter, busyPolicy: "queue", maxQueuedJobs: 10 });
    const abandoned = vi.fn();
    scheduler.on("job:abandoned", abandoned);

    await scheduler.submit(command("101", "boom"), "boom");
    await scheduler.submit(command("102", "fine"), "fine");
    await scheduler.idle();

    expect(run).toHaveBeenCalledTimes(2);
    expect(abandoned).toHaveBeenCalledTimes(1);
    expect(abandoned.mock.calls[0][1]).toBe("unexpected");
    expect(scheduler.getStatus().recent.map((j) => j.channelReference)).toEqual(["fine", "boom"]);
  });

  it("accepts a new command right after the previous job ends", async () => {
    const adapter = new FakeAdapter();
    const run = vi.fn(async (job: DownloadJob) => job);
    const scheduler = new JobScheduler({ executor: { run }, adapter, busyPolicy: "reject", maxQueuedJobs: 10 });

    await scheduler.submit(command("101", "foo"), "foo");
    await scheduler.idle();
    const outcome = await scheduler.submit(command("102", "bar"), "bar");
    await scheduler.idle();

    expect(outcome.status).toBe("started");
    expect(run).toHaveBeenCalledTimes(2);
    expect(adapter.sent).toEqual([]);
  });

  it("bounds the list of recent jobs", async () => {
    const adapter = new FakeAdapter();
    const scheduler = new JobScheduler({
      executor: { run: async (job: DownloadJob) => job },
      adapter,
      busyPolicy: "reject",
      maxQueuedJobs: 10,
      maxRecentJobs: 2,
    });

    for (const reference of ["a", "b", "c"]) {
      await scheduler.submit(command("101", reference), reference);
      await scheduler.idle();
    }

    expect(scheduler.getStatus().recent.map((j) => j.channelReference)).toEqual(["c", "b"]);
  });

  it("drops queued jobs on stop and refuses new ones", async () => {
    const { scheduler, runs, release } = setup("queue");
    const abandoned = vi.fn();
    scheduler.on("job:abandoned", abandoned);
    await scheduler.submit(command("101", "foo"), "foo");
    await scheduler.submit(command("102", "bar"), "bar");

    const stopping = scheduler.stop();
    release();
    await stopping;

    expect(runs.map((j) => j.channelReference)).toEqual(["foo"]);
    expect(abandoned).toHaveBeenCalledTimes(1);
    expect(abandoned.mock.calls[0][1]).toBe("shutdown");
    expect(await scheduler.submit(command("103", "baz"), "baz")).toEqual({ status: "rejected", reason: "stopped" });
  });
});
