/**
 * JobScheduler - the single download slot.
 *
 * At most one job runs at a time, on a background worker promise, so the
 * message handler that submits a job returns immediately. A command that
 * arrives while the slot is taken is rejected or queued, per `busyPolicy`,
 * and the sender is told which.
 */

import {
  TypedEventEmitter,
  errorMessage,
  type ChannelAdapter,
  type ChannelMessage,
} from "@vidharvest/adapter-core";
import type { BusyPolicy } from "./config.js";
import type { DownloadExecutor } from "./download-executor.js";
import { createJob, type DownloadJob } from "./job.js";
import { replyTo } from "./reply.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type SchedulerEvents = {
  "job:started": [job: DownloadJob];
  "job:finished": [job: DownloadJob];
  "job:abandoned": [job: DownloadJob, reason: string];
};

export type JobSchedulerOptions = {
  executor: Pick<DownloadExecutor, "run">;
  adapter: ChannelAdapter;
  busyPolicy: BusyPolicy;
  maxQueuedJobs: number;
  /** Finished jobs kept for status queries (default 20) */
  maxRecentJobs?: number;
};

export type SubmitOutcome =
  | { status: "started"; job: DownloadJob }
  | { status: "queued"; job: DownloadJob; position: number }
  | { status: "rejected"; reason: "busy" | "queue_full" | "stopped" };

export type SchedulerStatus = {
  busyPolicy: BusyPolicy;
  active: DownloadJob | null;
  queued: DownloadJob[];
  recent: DownloadJob[];
};

// ─── Replies ─────────────────────────────────────────────────────────────────

export function busyReply(activeReference: string, reference: string): string {
  return `A download job is already running (${activeReference}); ignoring download ${reference}.`;
}

export function queuedReply(reference: string, position: number): string {
  return `Queued download of ${reference} (position ${position}).`;
}

export function queueFullReply(reference: string): string {
  return `Download queue is full; ignoring download ${reference}.`;
}

// ─── JobScheduler ────────────────────────────────────────────────────────────

export class JobScheduler extends TypedEventEmitter<SchedulerEvents> {
  private executor: Pick<DownloadExecutor, "run">;
  private adapter: ChannelAdapter;
  private busyPolicy: BusyPolicy;
  private maxQueuedJobs: number;
  private maxRecentJobs: number;

  private active: DownloadJob | null = null;
  private queue: DownloadJob[] = [];
  private recent: DownloadJob[] = [];
  private worker: Promise<void> | null = null;
  private stopped = false;

  constructor(options: JobSchedulerOptions) {
    super();
    this.executor = options.executor;
    this.adapter = options.adapter;
    this.busyPolicy = options.busyPolicy;
    this.maxQueuedJobs = options.maxQueuedJobs;
    this.maxRecentJobs = options.maxRecentJobs ?? 20;
  }

  async submit(trigger: ChannelMessage, reference: string): Promise<SubmitOutcome> {
    if (this.stopped) {
      console.log(`[scheduler] Shutting down; ignoring download ${reference}`);
      return { status: "rejected", reason: "stopped" };
    }

    if (!this.isBusy()) {
      const job = createJob(trigger, reference);
      this.queue.push(job);
      this.ensureWorker();
      return { status: "started", job };
    }

    if (this.busyPolicy === "reject") {
      const activeReference = this.active?.channelReference ?? this.queue[0]?.channelReference ?? "unknown";
      console.log(`[scheduler] Busy with ${activeReference}; rejecting download ${reference}`);
      await replyTo(this.adapter, trigger, busyReply(activeReference, reference));
      return { status: "rejected", reason: "busy" };
    }

    if (this.queue.length >= this.maxQueuedJobs) {
      console.log(`[scheduler] Queue full (${this.queue.length}); rejecting download ${reference}`);
      await replyTo(this.adapter, trigger, queueFullReply(reference));
      return { status: "rejected", reason: "queue_full" };
    }

    const job = createJob(trigger, reference);
    this.queue.push(job);
    const position = this.queue.length;
    console.log(`[scheduler] Queued download ${reference} at position ${position}`);
    await replyTo(this.adapter, trigger, queuedReply(reference, position));
    return { status: "queued", job, position };
  }

  isBusy(): boolean {
    return this.active !== null || this.queue.length > 0;
  }

  getStatus(): SchedulerStatus {
    return {
      busyPolicy: this.busyPolicy,
      active: this.active,
      queued: [...this.queue],
      recent: [...this.recent],
    };
  }

  /** Resolves once no job is running or waiting. */
  async idle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  /**
   * Drop queued jobs and wait for the running one to end. The caller aborts
   * the executor's signal so a job sitting in a pause ends promptly.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const job of this.queue) {
      this.emit("job:abandoned", job, "shutdown");
    }
    this.queue = [];
    await this.idle();
  }

  private ensureWorker(): void {
    if (this.worker || this.stopped) return;
    this.worker = this.drain().finally(() => {
      this.worker = null;
      // a job may have been queued between the last shift and this callback
      if (this.queue.length > 0) this.ensureWorker();
    });
  }

  private async drain(): Promise<void> {
    let job = this.queue.shift();
    while (job && !this.stopped) {
      this.active = job;
      this.emit("job:started", job);
      console.log(`[scheduler] Job ${job.id} started for ${job.channelReference}`);

      try {
        await this.executor.run(job);
        this.emit("job:finished", job);
        console.log(`[scheduler] Job ${job.id} ended in state ${job.state}`);
      } catch (err) {
        const reason = errorMessage(err);
        this.emit("job:abandoned", job, reason);
        console.error(`[scheduler] Job ${job.id} for ${job.channelReference} abandoned: ${reason}`);
      } finally {
        this.active = null;
        this.remember(job);
      }

      job = this.queue.shift();
    }
  }

  private remember(job: DownloadJob): void {
    this.recent.unshift(job);
    if (this.recent.length > this.maxRecentJobs) {
      this.recent.length = this.maxRecentJobs;
    }
  }
}
