/**
 * DownloadExecutor - runs one DownloadJob end to end.
 *
 * Transfers are strictly sequential. A failed transfer is recorded on the
 * job and the walk continues with the next video. Between transfers the
 * executor waits a random whole number of minutes; the wait is a timer, so
 * the process keeps receiving messages meanwhile.
 */

import { errorMessage, type ChannelAdapter, type ChannelHandle } from "@vidharvest/adapter-core";
import { transition, type DownloadJob } from "./job.js";
import { pickDelayMs, sleep as defaultSleep, type PacingOptions, type Sleep } from "./pacing.js";
import { replyTo } from "./reply.js";
import { reportCompletion } from "./status-reporter.js";
import { enumerateVideos } from "./video-enumerator.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type DownloadExecutorOptions = {
  adapter: ChannelAdapter;
  videoDir: string;
  pacing: PacingOptions;
  sleep?: Sleep;
  random?: () => number;
  /** Aborting interrupts the current pause; the job is then abandoned */
  signal?: AbortSignal;
};

// ─── Replies ─────────────────────────────────────────────────────────────────

export function startedReply(reference: string): string {
  return `Starting download of videos from channel ${reference}...`;
}

export function resolutionFailedReply(reference: string): string {
  return `Could not resolve channel ${reference}; it may be private or may not exist.`;
}

// ─── DownloadExecutor ────────────────────────────────────────────────────────

export class DownloadExecutor {
  private adapter: ChannelAdapter;
  private videoDir: string;
  private pacing: PacingOptions;
  private sleep: Sleep;
  private random: () => number;
  private signal?: AbortSignal;

  constructor(options: DownloadExecutorOptions) {
    this.adapter = options.adapter;
    this.videoDir = options.videoDir;
    this.pacing = options.pacing;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.signal = options.signal;
  }

  async run(job: DownloadJob): Promise<DownloadJob> {
    const reference = job.channelReference;

    await replyTo(this.adapter, job.trigger, startedReply(reference));
    transition(job, "acknowledged");

    transition(job, "resolving");
    let channel: ChannelHandle;
    try {
      channel = await this.adapter.resolveChannel(reference);
    } catch (err) {
      console.warn(`[downloader] Resolving ${reference} failed: ${errorMessage(err)}`);
      await replyTo(this.adapter, job.trigger, resolutionFailedReply(reference));
      transition(job, "resolution_failed");
      return job;
    }

    transition(job, "enumerating");
    console.log(`[downloader] Walking history of ${channel.title ?? reference} (${channel.id})`);
    transition(job, "downloading");

    try {
      let attempt = 0;
      for await (const item of enumerateVideos(this.adapter, channel)) {
        attempt++;
        job.currentMessageId = item.messageId;
        console.log(`[downloader] [${attempt}] Downloading msg_id=${item.messageId} from ${reference}`);

        try {
          const result = await this.adapter.downloadMedia(item.message, this.videoDir);
          job.itemsProcessed++;
          console.log(`[downloader] Saved msg_id=${item.messageId} -> ${result.path}`);
        } catch (err) {
          const error = errorMessage(err);
          job.failures.push({ messageId: item.messageId, error });
          console.error(`[downloader] Download failed for msg_id=${item.messageId}: ${error}`);
        }
        job.currentMessageId = undefined;

        await this.pause(job);
      }
    } catch (err) {
      if (this.signal?.aborted) throw err;
      job.historyError = errorMessage(err);
      console.error(`[downloader] Reading history of ${reference} failed: ${job.historyError}`);
    }

    transition(job, "drained");
    console.log(
      `[downloader] ${reference}: ${job.itemsProcessed} saved, ${job.failures.length} failed`,
    );

    transition(job, "reporting");
    await reportCompletion(this.adapter, job.trigger);
    transition(job, "done");
    return job;
  }

  private async pause(job: DownloadJob): Promise<void> {
    const ms = pickDelayMs(this.pacing, this.random);
    job.nextItemAt = Date.now() + ms;
    console.log(`[downloader] Waiting ${ms / 60_000} minute(s) before the next video`);
    await this.sleep(ms, this.signal);
    job.nextItemAt = undefined;
  }
}
