import type {
  ChannelAccountSnapshot,
  ChannelHandle,
  ChannelMeta,
  DownloadResult,
  EditRequest,
  HistoryMessage,
  OutboundMessage,
  SendResult,
} from "./types.js";
import { TypedEventEmitter } from "./events.js";

export abstract class ChannelAdapter extends TypedEventEmitter {
  abstract readonly id: string;
  abstract readonly meta: ChannelMeta;

  protected _status: ChannelAccountSnapshot;

  constructor() {
    super();
    this._status = {
      accountId: "default",
      channel: "unknown",
      running: false,
      connected: false,
    };
  }

  abstract start(signal: AbortSignal): Promise<void>;
  abstract stop(): Promise<void>;
  abstract send(msg: OutboundMessage): Promise<SendResult>;
  abstract edit(req: EditRequest): Promise<SendResult>;

  /**
   * Turn a user-supplied channel identifier into an addressable handle.
   * Rejects with ChannelResolutionError for unknown or inaccessible channels.
   */
  abstract resolveChannel(reference: string): Promise<ChannelHandle>;

  /** Full history of a channel, oldest message first. */
  abstract iterHistory(channel: ChannelHandle): AsyncIterable<HistoryMessage>;

  /** Write the message's attachment into `directory` under the adapter's default file name. */
  abstract downloadMedia(message: HistoryMessage, directory: string): Promise<DownloadResult>;

  getStatus(): ChannelAccountSnapshot {
    return { ...this._status };
  }

  protected updateStatus(patch: Partial<ChannelAccountSnapshot>): void {
    this._status = { ...this._status, ...patch };
    this.emit("status", this._status);
  }
}
