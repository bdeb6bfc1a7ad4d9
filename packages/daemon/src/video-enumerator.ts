import type { ChannelAdapter, ChannelHandle, HistoryMessage, MediaAttachment } from "@vidharvest/adapter-core";

export type MediaItem = {
  messageId: number;
  message: HistoryMessage;
};

/**
 * A video is either a native video attachment or a generic document that
 * carries a video descriptor among its attributes.
 */
export function isVideoAttachment(media: MediaAttachment | undefined): boolean {
  if (!media) return false;
  switch (media.kind) {
    case "video":
      return true;
    case "document":
      return media.attributes.some((attr) => attr.type === "video");
    default:
      return false;
  }
}

/**
 * Lazily walk a channel's history oldest-to-newest, yielding only videos.
 * There is no resume cursor; calling again starts from the first message.
 */
export async function* enumerateVideos(
  adapter: ChannelAdapter,
  channel: ChannelHandle,
): AsyncGenerator<MediaItem> {
  for await (const message of adapter.iterHistory(channel)) {
    if (!isVideoAttachment(message.media)) continue;
    yield { messageId: message.id, message };
  }
}
