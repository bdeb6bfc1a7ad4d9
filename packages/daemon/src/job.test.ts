import { describe, it, expect } from "vitest";
import { createJob, isTerminal, transition } from "./job.js";
import { selfMessage } from "./testing/fake-adapter.js";

describe("DownloadJob", () => {
  it("starts in created with empty counters", () => {
    const job = createJob(selfMessage("download foo"), "foo", 1234);

    expect(job.state).toBe("created");
    expect(job.channelReference).toBe("foo");
    expect(job.startedAt).toBe(1234);
    expect(job.itemsProcessed).toBe(0);
    expect(job.failures).toEqual([]);
    expect(job.finishedAt).toBeUndefined();
  });

  it("gives every job its own id", () => {
    const trigger = selfMessage("download foo");
    expect(createJob(trigger, "foo").id).not.toBe(createJob(trigger, "foo").id);
  });

  it("walks the full successful path", () => {
    const job = createJob(selfMessage("download foo"), "foo");
    for (const state of ["acknowledged", "resolving", "enumerating", "downloading", "drained", "reporting", "done"] as const) {
      transition(job, state);
    }
    expect(job.state).toBe("done");
    expect(job.finishedAt).toBeTypeOf("number");
  });

  it("ends at resolution_failed", () => {
    const job = createJob(selfMessage("download foo"), "foo");
    transition(job, "acknowledged");
    transition(job, "resolving");
    transition(job, "resolution_failed");

    expect(isTerminal(job.state)).toBe(true);
    expect(() => transition(job, "enumerating")).toThrow(/resolution_failed -> enumerating/);
  });

  it("rejects skipping the acknowledgment", () => {
    const job = createJob(selfMessage("download foo"), "foo");
    expect(() => transition(job, "resolving")).toThrow(/created -> resolving/);
    expect(job.state).toBe("created");
  });

  it("clears progress markers on reaching a terminal state", () => {
    const job = createJob(selfMessage("download foo"), "foo");
    transition(job, "acknowledged");
    transition(job, "resolving");
    transition(job, "enumerating");
    transition(job, "downloading");
    job.currentMessageId = 5;
    job.nextItemAt = 99;
    transition(job, "drained");
    transition(job, "reporting");
    transition(job, "done");

    expect(job.currentMessageId).toBeUndefined();
    expect(job.nextItemAt).toBeUndefined();
  });

  it("only done and resolution_failed are terminal", () => {
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("resolution_failed")).toBe(true);
    expect(isTerminal("downloading")).toBe(false);
    expect(isTerminal("reporting")).toBe(false);
  });
});
