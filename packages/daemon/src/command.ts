import { normalizeChannelReference } from "./channel-ref.js";

const DOWNLOAD_KEYWORD = "download ";

export type DownloadCommand = {
  rawText: string;
  channelReference: string;
};

/**
 * Recognize `download <channel>`. The keyword is matched case-insensitively on
 * the trimmed text; the argument keeps its original case. Returns null for
 * any other text and for a keyword with nothing after it.
 */
export function parseDownloadCommand(text: string | undefined): DownloadCommand | null {
  if (!text) return null;

  const trimmed = text.trim();
  if (!trimmed.toLowerCase().startsWith(DOWNLOAD_KEYWORD)) return null;

  const argument = trimmed.slice(trimmed.indexOf(" ") + 1).trim();
  if (!argument) return null;

  const channelReference = normalizeChannelReference(argument);
  if (!channelReference) return null;

  return { rawText: text, channelReference };
}
