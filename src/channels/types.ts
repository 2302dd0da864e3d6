export type MediaKind = "photo" | "video" | "animation" | "document" | "audio" | "voice" | "sticker";

/** Platform handle for an attachment; nothing is downloaded until asked. */
export interface MediaRef {
  kind: MediaKind;
  fileId: string;
  fileName?: string;
  mimeType?: string;
  /** Size in bytes as reported by the platform, when known */
  size?: number;
}

export interface InboundMessage {
  id: string;
  sourceChannel: number;
  /** Text or caption; empty when the post carries neither */
  text: string;
  media?: MediaRef;
  timestamp: number;
  /** Original platform-specific message object */
  raw: unknown;
}

export type InboundHandler = (message: InboundMessage) => Promise<void>;

export interface RelayChannel {
  readonly type: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Resolves when the event source stops delivering; rejects if it failed. */
  closed(): Promise<void>;

  /** Bind a handler to one source channel id. */
  subscribe(channelId: number, handler: InboundHandler): void;

  /**
   * Download media next to `destination` and return the written path
   * (the platform may add a file extension).
   */
  downloadMedia(media: MediaRef, destination: string, signal?: AbortSignal): Promise<string>;
  sendMessage(channelId: number, text: string): Promise<string>;
  sendFile(channelId: number, filePath: string, caption: string): Promise<string>;
}
