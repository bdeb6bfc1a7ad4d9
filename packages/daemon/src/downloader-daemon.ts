#!/usr/bin/env node

import { serve } from "@hono/node-server";
import { TelegramUserAdapter } from "@vidharvest/adapter-telegram";
import { errorMessage, type ChannelAccountSnapshot, type ChannelMessage } from "@vidharvest/adapter-core";
import { ensureDir, getConfigPath, loadConfig } from "./config.js";
import { CommandRouter } from "./command-router.js";
import { DownloadExecutor } from "./download-executor.js";
import { JobScheduler } from "./job-scheduler.js";
import { createStatusApp } from "./status-http.js";

// --- Daemon Entry Point ---

async function main() {
  const configPath = getConfigPath();
  const config = loadConfig(configPath);
  const { download, http } = config;

  console.log(`[daemon] Starting video downloader...`);
  console.log(`[daemon] Config: ${configPath}`);
  console.log(`[daemon] Video dir: ${download.videoDir}`);
  console.log(
    `[daemon] Pause between videos: ${download.minDelayMinutes}-${download.maxDelayMinutes} min, busy policy: ${download.busyPolicy}`,
  );

  ensureDir(download.videoDir);

  const shutdownController = new AbortController();

  const adapter = new TelegramUserAdapter({
    apiId: config.telegram.apiId,
    apiHash: config.telegram.apiHash,
    phoneNumber: config.telegram.phoneNumber,
    sessionFile: config.telegram.sessionFile,
    connectionRetries: config.telegram.connectionRetries,
  });

  console.log(`[daemon] Channel: ${adapter.meta.label} (${adapter.meta.description})`);

  const executor = new DownloadExecutor({
    adapter,
    videoDir: download.videoDir,
    pacing: {
      minDelayMinutes: download.minDelayMinutes,
      maxDelayMinutes: download.maxDelayMinutes,
    },
    signal: shutdownController.signal,
  });

  const scheduler = new JobScheduler({
    executor,
    adapter,
    busyPolicy: download.busyPolicy,
    maxQueuedJobs: download.maxQueuedJobs,
  });

  scheduler.on("job:finished", (job) => {
    if (job.failures.length > 0) {
      const ids = job.failures.map((f) => f.messageId).join(", ");
      console.warn(`[daemon] ${job.channelReference}: failed message ids: ${ids}`);
    }
  });

  const router = new CommandRouter(scheduler);

  // Wire up adapter events
  adapter.on("message", (msg: ChannelMessage) => {
    router.handleMessage(msg).catch((err) => {
      console.error(`[daemon] Handling message ${msg.id} failed: ${errorMessage(err)}`);
    });
  });

  adapter.on("error", (error: Error, context?: string) => {
    console.error(`[daemon] Adapter error${context ? ` (${context})` : ""}: ${error.message}`);
  });

  adapter.on("disconnected", (snapshot: ChannelAccountSnapshot, reason?: string) => {
    console.log(`[daemon] ${snapshot.channel}/${snapshot.accountId} disconnected: ${reason ?? "unknown"}`);
  });

  await adapter.start(shutdownController.signal);

  // Optional status endpoint
  const httpServer = http.enabled
    ? serve({ fetch: createStatusApp({ scheduler }).fetch, port: http.port, hostname: http.host }, () => {
        console.log(`[daemon] Status HTTP listening on http://${http.host}:${http.port}`);
      })
    : null;

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[daemon] Received ${signal}, shutting down...`);
    shutdownController.abort();
    await scheduler.stop();
    httpServer?.close();
    await adapter.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error(`[daemon] Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  console.log(`[daemon] Ready. Send "download <channel link>" to yourself (Saved Messages). Ctrl+C to exit.`);
}

// Run
main().catch((err) => {
  console.error("[daemon] Fatal error:", err);
  process.exit(1);
});
