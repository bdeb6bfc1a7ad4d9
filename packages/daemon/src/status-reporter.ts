import { errorMessage, type ChannelAdapter, type ChannelMessage } from "@vidharvest/adapter-core";

export const COMPLETION_MARKER = "finished";

/**
 * Rewrite the command message to the completion marker. Best effort: an
 * edit can fail for old messages (the platform's edit window), and that is
 * only logged. Never throws, never retries.
 */
export async function reportCompletion(adapter: ChannelAdapter, trigger: ChannelMessage): Promise<boolean> {
  try {
    const result = await adapter.edit({
      chatId: trigger.chatId,
      messageId: trigger.id,
      text: COMPLETION_MARKER,
    });
    if (!result.success) {
      console.warn(`[status] Could not mark message ${trigger.id} as ${COMPLETION_MARKER}: ${result.error ?? "unknown error"}`);
      return false;
    }
    return true;
  } catch (err) {
    console.warn(`[status] Could not mark message ${trigger.id} as ${COMPLETION_MARKER}: ${errorMessage(err)}`);
    return false;
  }
}
