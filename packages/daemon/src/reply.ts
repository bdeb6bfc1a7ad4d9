import { errorMessage, type ChannelAdapter, type ChannelMessage } from "@vidharvest/adapter-core";

/** Quote-reply to a command message. Failures are logged, not thrown. */
export async function replyTo(adapter: ChannelAdapter, trigger: ChannelMessage, text: string): Promise<boolean> {
  try {
    const result = await adapter.send({
      to: trigger.chatId,
      text,
      replyToId: trigger.id,
    });
    if (!result.success) {
      console.warn(`[reply] Reply to message ${trigger.id} failed: ${result.error ?? "unknown error"}`);
    }
    return result.success;
  } catch (err) {
    console.warn(`[reply] Reply to message ${trigger.id} failed: ${errorMessage(err)}`);
    return false;
  }
}
