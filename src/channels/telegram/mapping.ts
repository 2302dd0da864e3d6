import { extname } from "node:path";
import type { InboundMessage, MediaRef } from "../types.js";

interface FileInfo {
  file_id: string;
  file_size?: number;
  file_name?: string;
  mime_type?: string;
}

/** The slice of a Telegram channel post the relay reads. */
export interface ChannelPost {
  message_id: number;
  date: number;
  chat: { id: number };
  text?: string;
  caption?: string;
  photo?: FileInfo[];
  video?: FileInfo;
  animation?: FileInfo;
  document?: FileInfo;
  audio?: FileInfo;
  voice?: FileInfo;
  sticker?: FileInfo;
}

export function toInboundMessage(post: ChannelPost): InboundMessage {
  const message: InboundMessage = {
    id: String(post.message_id),
    sourceChannel: post.chat.id,
    text: post.text ?? post.caption ?? "",
    timestamp: post.date * 1000, // Telegram uses Unix seconds
    raw: post,
  };
  const media = extractMedia(post);
  if (media) {
    message.media = media;
  }
  return message;
}

export function extractMedia(post: ChannelPost): MediaRef | undefined {
  // Photos arrive as several sizes, largest last
  const photo = post.photo?.at(-1);
  if (photo) {
    return { kind: "photo", fileId: photo.file_id, mimeType: "image/jpeg", size: photo.file_size };
  }
  // Animations also carry a document field; check them first
  if (post.animation) return fromFile("animation", post.animation);
  if (post.video) return fromFile("video", post.video);
  if (post.audio) return fromFile("audio", post.audio);
  if (post.voice) return fromFile("voice", post.voice);
  // Static stickers download as .webp and go out as photos
  if (post.sticker) return fromFile("sticker", post.sticker);
  if (post.document) return fromFile("document", post.document);
  return undefined;
}

function fromFile(kind: MediaRef["kind"], file: FileInfo): MediaRef {
  return {
    kind,
    fileId: file.file_id,
    fileName: file.file_name,
    mimeType: file.mime_type,
    size: file.file_size,
  };
}

const IMAGE_EXTS = new Set([".jpg", ".jpeg", ".png", ".webp"]);
const VIDEO_EXTS = new Set([".mp4", ".mov", ".avi", ".mkv", ".webm", ".gif"]);
const AUDIO_EXTS = new Set([".mp3", ".ogg", ".oga", ".wav", ".m4a", ".aac", ".flac"]);

export type SendKind = "photo" | "video" | "audio" | "document";

export function detectSendKind(filePath: string): SendKind {
  const ext = extname(filePath).toLowerCase();
  if (IMAGE_EXTS.has(ext)) return "photo";
  if (VIDEO_EXTS.has(ext)) return "video";
  if (AUDIO_EXTS.has(ext)) return "audio";
  return "document";
}
