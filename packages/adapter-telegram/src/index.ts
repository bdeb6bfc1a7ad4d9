import { Api, TelegramClient } from "telegram";
import { NewMessage, type NewMessageEvent } from "telegram/events/index.js";
import type { StringSession } from "telegram/sessions/index.js";
import {
  ChannelAdapter,
  ChannelResolutionError,
  errorMessage,
  type ChannelHandle,
  type ChannelMessage,
  type ChannelMeta,
  type DownloadResult,
  type EditRequest,
  type HistoryMessage,
  type OutboundMessage,
  type SendResult,
} from "@vidharvest/adapter-core";
import { downloadTarget, toMediaAttachment } from "./media.js";
import { loadSession, promptLine, saveSession } from "./session.js";

export type TelegramUserOptions = {
  apiId: number;
  apiHash: string;
  phoneNumber: string;
  sessionFile: string;
  connectionRetries?: number;
  accountId?: string;
  /** Reads the login code and 2FA password. Defaults to the terminal. */
  prompt?: (question: string) => Promise<string>;
};

/**
 * Telegram user account (MTProto) adapter.
 *
 * Unlike a bot, a user session can read full channel history and sees the
 * messages the account sends to itself, which is where commands come from.
 */
export class TelegramUserAdapter extends ChannelAdapter {
  readonly id = "telegram";
  readonly meta: ChannelMeta = {
    id: "telegram",
    label: "Telegram",
    description: "Telegram user account via GramJS",
    icon: "telegram",
  };

  private client: TelegramClient | null = null;
  private readonly session: StringSession;
  private readonly options: TelegramUserOptions;
  private selfId: string | null = null;
  // chatId -> peer, learned from inbound messages so replies can be addressed
  private peers = new Map<string, Api.TypePeer>();

  constructor(options: TelegramUserOptions) {
    super();
    this.options = options;
    this.session = loadSession(options.sessionFile);
  }

  async start(signal: AbortSignal): Promise<void> {
    const accountId = this.options.accountId ?? "default";
    const prompt = this.options.prompt ?? promptLine;

    const client = new TelegramClient(this.session, this.options.apiId, this.options.apiHash, {
      connectionRetries: this.options.connectionRetries ?? 5,
    });
    this.client = client;

    this._status = {
      ...this._status,
      channel: "telegram",
      accountId,
      running: true,
      lastStartAt: Date.now(),
    };

    await client.start({
      phoneNumber: async () => this.options.phoneNumber,
      phoneCode: async () => prompt(`Login code sent to ${this.options.phoneNumber}: `),
      password: async (hint?: string) => prompt(hint ? `2FA password (hint: ${hint}): ` : "2FA password: "),
      onError: async (err: Error) => {
        console.error(`[telegram] Login error: ${err.message}`);
        // true stops the login loop
        return signal.aborted;
      },
    });
    saveSession(this.options.sessionFile, this.session);

    const me = await client.getMe();
    if (!(me instanceof Api.User)) {
      throw new Error("Logged-in account did not resolve to a user");
    }
    this.selfId = me.id.toString();

    client.addEventHandler(
      (event: NewMessageEvent) => this.handleNewMessage(event, accountId),
      new NewMessage({ fromUsers: ["me"] }),
    );

    signal.addEventListener("abort", () => {
      this.stop().catch((err) => {
        console.error(`[telegram] Stop after abort failed: ${errorMessage(err)}`);
      });
    });

    this.updateStatus({
      connected: true,
      lastConnectedAt: Date.now(),
      name: me.username ?? me.firstName ?? undefined,
    });
    this.emit("connected", this.getStatus());
    console.log(`[telegram] Logged in as ${me.username ?? this.selfId}, listening for own messages`);
  }

  async stop(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.destroy();
    this.updateStatus({ running: false, connected: false, lastStopAt: Date.now() });
    this.emit("disconnected", this.getStatus(), "stopped");
  }

  private handleNewMessage(event: NewMessageEvent, accountId: string): void {
    const message = event.message;
    const chatId = message.chatId?.toString() ?? this.selfId ?? "unknown";
    const senderId = message.senderId?.toString();

    this.peers.set(chatId, message.peerId);

    const msg: ChannelMessage = {
      id: String(message.id),
      channel: "telegram",
      accountId,
      chatId,
      from: {
        id: senderId ?? "unknown",
        isSelf: senderId !== undefined && senderId === this.selfId,
      },
      chatType: message.isPrivate ? "dm" : message.isGroup ? "group" : "channel",
      text: message.message,
      media: toMediaAttachment(message),
      timestamp: message.date * 1000,
      raw: message,
    };

    this.emit("message", msg);
  }

  async send(msg: OutboundMessage): Promise<SendResult> {
    const client = this.client;
    if (!client) {
      return { success: false, error: "Client not started", timestamp: Date.now() };
    }
    const peer = this.peers.get(msg.to);
    if (!peer) {
      return { success: false, error: `Unknown chat ${msg.to}`, timestamp: Date.now() };
    }

    try {
      const result = await client.sendMessage(peer, {
        message: msg.text,
        replyTo: msg.replyToId ? Number(msg.replyToId) : undefined,
      });
      return {
        success: true,
        messageId: String(result.id),
        timestamp: result.date * 1000,
      };
    } catch (err) {
      return { success: false, error: errorMessage(err), timestamp: Date.now() };
    }
  }

  async edit(req: EditRequest): Promise<SendResult> {
    const client = this.client;
    if (!client) {
      return { success: false, error: "Client not started", timestamp: Date.now() };
    }
    const peer = this.peers.get(req.chatId);
    if (!peer) {
      return { success: false, error: `Unknown chat ${req.chatId}`, timestamp: Date.now() };
    }

    try {
      const result = await client.editMessage(peer, {
        message: Number(req.messageId),
        text: req.text,
      });
      return { success: true, messageId: String(result.id), timestamp: Date.now() };
    } catch (err) {
      // MESSAGE_EDIT_TIME_EXPIRED lands here for old commands
      return { success: false, error: errorMessage(err), timestamp: Date.now() };
    }
  }

  async resolveChannel(reference: string): Promise<ChannelHandle> {
    const client = this.requireClient();
    if (!reference) throw new ChannelResolutionError(reference, "empty reference");

    try {
      const entity = await client.getEntity(reference);
      const title = entity instanceof Api.Channel || entity instanceof Api.Chat ? entity.title : undefined;
      return { id: entity.id.toString(), reference, title, raw: entity };
    } catch (err) {
      throw new ChannelResolutionError(reference, err);
    }
  }

  async *iterHistory(channel: ChannelHandle): AsyncIterable<HistoryMessage> {
    const client = this.requireClient();
    const entity =
      channel.raw instanceof Api.Channel || channel.raw instanceof Api.Chat || channel.raw instanceof Api.User
        ? channel.raw
        : channel.reference;

    for await (const message of client.iterMessages(entity, { reverse: true })) {
      if (!(message instanceof Api.Message)) continue;
      yield {
        id: message.id,
        date: message.date * 1000,
        media: toMediaAttachment(message),
        raw: message,
      };
    }
  }

  async downloadMedia(message: HistoryMessage, directory: string): Promise<DownloadResult> {
    const client = this.requireClient();
    if (!(message.raw instanceof Api.Message)) {
      throw new Error(`Message ${message.id} was not fetched by the Telegram adapter`);
    }

    const target = downloadTarget(directory, message.id, message.media);
    const result = await client.downloadMedia(message.raw, { outputFile: target });
    if (result === undefined) {
      throw new Error(`Message ${message.id} has no downloadable media`);
    }
    return { path: typeof result === "string" ? result : target };
  }

  private requireClient(): TelegramClient {
    if (!this.client) throw new Error("Telegram client not started");
    return this.client;
  }
}

export default TelegramUserAdapter;
