import type { ChannelMessage } from "@vidharvest/adapter-core";
import { parseDownloadCommand } from "./command.js";
import type { JobScheduler, SubmitOutcome } from "./job-scheduler.js";

export class CommandRouter {
  private scheduler: Pick<JobScheduler, "submit">;

  constructor(scheduler: Pick<JobScheduler, "submit">) {
    this.scheduler = scheduler;
  }

  /**
   * Entry point for every inbound message. Only the account's own messages
   * are considered; the returned promise settles once the command has been
   * accepted or refused, not when the download finishes.
   */
  async handleMessage(msg: ChannelMessage): Promise<SubmitOutcome | null> {
    if (!msg.from.isSelf) return null;

    const command = parseDownloadCommand(msg.text);
    if (!command) return null;

    console.log(`[router] download command for ${command.channelReference} (message ${msg.id})`);
    return this.scheduler.submit(msg, command.channelReference);
  }
}
