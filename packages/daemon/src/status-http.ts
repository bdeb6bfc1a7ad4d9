import { Hono } from "hono";
import type { DownloadJob } from "./job.js";
import type { JobScheduler } from "./job-scheduler.js";

export type JobView = {
  id: string;
  channelReference: string;
  state: DownloadJob["state"];
  startedAt: number;
  finishedAt: number | null;
  itemsProcessed: number;
  failures: DownloadJob["failures"];
  currentMessageId: number | null;
  nextItemAt: number | null;
  historyError: string | null;
};

// The trigger message carries the raw platform object; keep it off the wire.
export function toJobView(job: DownloadJob): JobView {
  return {
    id: job.id,
    channelReference: job.channelReference,
    state: job.state,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt ?? null,
    itemsProcessed: job.itemsProcessed,
    failures: job.failures,
    currentMessageId: job.currentMessageId ?? null,
    nextItemAt: job.nextItemAt ?? null,
    historyError: job.historyError ?? null,
  };
}

export function createStatusApp(deps: { scheduler: Pick<JobScheduler, "getStatus"> }) {
  const { scheduler } = deps;
  const app = new Hono();

  // Health check
  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      uptime: process.uptime(),
      timestamp: Date.now(),
    });
  });

  // Current, queued and recently finished jobs
  app.get("/api/jobs", (c) => {
    const status = scheduler.getStatus();
    return c.json({
      busyPolicy: status.busyPolicy,
      active: status.active ? toJobView(status.active) : null,
      queued: status.queued.map(toJobView),
      recent: status.recent.map(toJobView),
    });
  });

  return app;
}
