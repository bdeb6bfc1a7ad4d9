/**
 * Mapping from MTProto media objects to platform-neutral attachments,
 * plus the file a downloaded video is written to.
 */

import { existsSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { Api } from "telegram";
import type { DocumentAttribute, MediaAttachment } from "@vidharvest/adapter-core";

const DEFAULT_VIDEO_EXTENSION = ".mp4";

const VIDEO_EXTENSIONS: Record<string, string> = {
  "video/mp4": ".mp4",
  "video/quicktime": ".mov",
  "video/webm": ".webm",
  "video/x-matroska": ".mkv",
  "video/x-msvideo": ".avi",
  "video/mpeg": ".mpeg",
  "video/3gpp": ".3gp",
};

// ─── Attachments ────────────────────────────────────────────────────────────

export function toDocumentAttribute(attr: Api.TypeDocumentAttribute): DocumentAttribute {
  if (attr instanceof Api.DocumentAttributeVideo) {
    return {
      type: "video",
      durationSeconds: attr.duration,
      width: attr.w,
      height: attr.h,
      roundMessage: attr.roundMessage ?? false,
    };
  }
  if (attr instanceof Api.DocumentAttributeFilename) {
    return { type: "filename", fileName: attr.fileName };
  }
  if (attr instanceof Api.DocumentAttributeAudio) return { type: "audio" };
  if (attr instanceof Api.DocumentAttributeAnimated) return { type: "animated" };
  return { type: "other", name: attr.className };
}

export function toMediaAttachment(message: Api.Message): MediaAttachment | undefined {
  const media = message.media;
  if (!media) return undefined;

  if (media instanceof Api.MessageMediaPhoto) return { kind: "photo" };

  if (media instanceof Api.MessageMediaDocument && media.document instanceof Api.Document) {
    const doc = media.document;
    const attributes = doc.attributes.map(toDocumentAttribute);
    const fileName = declaredFileName(attributes);

    // `video` is the client's own classification of the document
    if (message.video) {
      return { kind: "video", mimeType: doc.mimeType, fileName };
    }
    return { kind: "document", mimeType: doc.mimeType, fileName, attributes };
  }

  return { kind: "other", type: media.className };
}

function declaredFileName(attributes: DocumentAttribute[]): string | undefined {
  for (const attr of attributes) {
    if (attr.type === "filename") return attr.fileName;
  }
  return undefined;
}

// ─── File naming ────────────────────────────────────────────────────────────

/** Strip directory parts and characters most filesystems reject. Returns "" when nothing usable is left. */
export function sanitizeFileName(name: string): string {
  const base = basename(name.replace(/\\/g, "/"))
    .replace(/[\u0000-\u001f<>:"|?*]/g, "_")
    .trim();
  if (base === "." || base === "..") return "";
  return base;
}

export function extensionForMime(mimeType: string | undefined): string {
  if (!mimeType) return DEFAULT_VIDEO_EXTENSION;
  return VIDEO_EXTENSIONS[mimeType.toLowerCase()] ?? DEFAULT_VIDEO_EXTENSION;
}

/**
 * Name of the file a video is saved under: the sender's original file name
 * when the document carries one, otherwise `video_<messageId><ext>`.
 */
export function videoFileName(messageId: number, media: MediaAttachment | undefined): string {
  if (media?.kind === "video" || media?.kind === "document") {
    const declared = media.fileName ? sanitizeFileName(media.fileName) : "";
    if (declared) return declared;
    return `video_${messageId}${extensionForMime(media.mimeType)}`;
  }
  return `video_${messageId}${DEFAULT_VIDEO_EXTENSION}`;
}

/**
 * First path in `directory` that is not taken yet: `name.ext`, then
 * `name (1).ext`, `name (2).ext`, ... Existing files are never replaced.
 */
export function freeFilePath(directory: string, fileName: string): string {
  const ext = extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  let candidate = join(directory, fileName);
  for (let n = 1; existsSync(candidate); n++) {
    candidate = join(directory, `${stem} (${n})${ext}`);
  }
  return candidate;
}

export function downloadTarget(directory: string, messageId: number, media: MediaAttachment | undefined): string {
  return freeFilePath(directory, videoFileName(messageId, media));
}
