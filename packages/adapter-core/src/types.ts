// Channel identifier
export type ChannelId = "telegram" | (string & {});

// Channel metadata
export type ChannelMeta = {
  id: ChannelId;
  label: string;
  description: string;
  icon?: string;
};

// Inbound message from external platform
export type ChannelMessage = {
  id: string;
  channel: ChannelId;
  accountId: string;
  /** Chat the message was posted in; replies and edits target it */
  chatId: string;
  from: {
    id: string;
    name?: string;
    username?: string;
    /** True only when the sender is the logged-in account itself */
    isSelf: boolean;
  };
  chatType: "dm" | "group" | "channel";
  text?: string;
  media?: MediaAttachment;
  timestamp: number;
  raw?: unknown;
};

// ─── Attachments ────────────────────────────────────────────────────────────

export type DocumentAttribute =
  | { type: "video"; durationSeconds?: number; width?: number; height?: number; roundMessage: boolean }
  | { type: "filename"; fileName: string }
  | { type: "audio" }
  | { type: "animated" }
  | { type: "other"; name: string };

export type MediaAttachment =
  | { kind: "video"; mimeType?: string; fileName?: string }
  | { kind: "document"; mimeType?: string; fileName?: string; attributes: DocumentAttribute[] }
  | { kind: "photo" }
  | { kind: "other"; type: string };

// One message of a channel's history
export type HistoryMessage = {
  id: number;
  /** Unix ms */
  date: number;
  media?: MediaAttachment;
  raw?: unknown;
};

// Resolved, addressable channel. Opaque outside the adapter that produced it.
export type ChannelHandle = {
  id: string;
  reference: string;
  title?: string;
  raw?: unknown;
};

// ─── Outbound ───────────────────────────────────────────────────────────────

export type OutboundMessage = {
  to: string;
  text: string;
  replyToId?: string;
};

export type EditRequest = {
  chatId: string;
  messageId: string;
  text: string;
};

// Result of sending or editing a message
export type SendResult = {
  success: boolean;
  messageId?: string;
  error?: string;
  timestamp: number;
};

export type DownloadResult = {
  path: string;
};

// Channel account status snapshot
export type ChannelAccountSnapshot = {
  accountId: string;
  channel: ChannelId;
  name?: string;
  connected?: boolean;
  running?: boolean;
  lastConnectedAt?: number | null;
  lastDisconnectedAt?: number | null;
  lastError?: string | null;
  lastStartAt?: number | null;
  lastStopAt?: number | null;
};
