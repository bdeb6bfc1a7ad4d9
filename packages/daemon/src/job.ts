/**
 * DownloadJob - in-memory record of one `download <channel>` command.
 *
 * Lifecycle:
 *   created -> acknowledged -> resolving -> resolution_failed (terminal)
 *                                        -> enumerating -> downloading -> drained -> reporting -> done (terminal)
 *
 * Per-item failures are recorded on the job and never change its terminal
 * state. Nothing here is persisted; a restart forgets every job.
 */

import { randomUUID } from "node:crypto";
import type { ChannelMessage } from "@vidharvest/adapter-core";

export type JobState =
  | "created"
  | "acknowledged"
  | "resolving"
  | "resolution_failed"
  | "enumerating"
  | "downloading"
  | "drained"
  | "reporting"
  | "done";

export type ItemFailure = {
  messageId: number;
  error: string;
};

export type DownloadJob = {
  id: string;
  trigger: ChannelMessage;
  channelReference: string;
  state: JobState;
  startedAt: number;
  finishedAt?: number;
  /** Successful transfers */
  itemsProcessed: number;
  failures: ItemFailure[];
  /** Message currently being transferred */
  currentMessageId?: number;
  /** When the current pause ends (unix ms) */
  nextItemAt?: number;
  /** Set when fetching history broke off before the end */
  historyError?: string;
};

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  created: ["acknowledged"],
  acknowledged: ["resolving"],
  resolving: ["resolution_failed", "enumerating"],
  resolution_failed: [],
  enumerating: ["downloading"],
  downloading: ["drained"],
  drained: ["reporting"],
  reporting: ["done"],
  done: [],
};

export function createJob(trigger: ChannelMessage, channelReference: string, now: number = Date.now()): DownloadJob {
  return {
    id: randomUUID(),
    trigger,
    channelReference,
    state: "created",
    startedAt: now,
    itemsProcessed: 0,
    failures: [],
  };
}

export function isTerminal(state: JobState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function transition(job: DownloadJob, next: JobState): void {
  if (!TRANSITIONS[job.state].includes(next)) {
    throw new Error(`Illegal job transition ${job.state} -> ${next} (job ${job.id})`);
  }
  job.state = next;
  if (isTerminal(next)) {
    job.finishedAt = Date.now();
    job.currentMessageId = undefined;
    job.nextItemAt = undefined;
  }
}
