import { rm, writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { Bot, InputFile } from "grammy";
import type { InboundHandler, MediaRef, RelayChannel } from "../types.js";
import { SubscriptionRegistry } from "../subscriptions.js";
import { detectSendKind, toInboundMessage } from "./mapping.js";
import { ChannelError } from "../../utils/errors.js";
import { createChildLogger } from "../../utils/logger.js";

const log = createChildLogger("telegram-adapter");

export interface TelegramAdapterOptions {
  botToken: string;
}

/**
 * Telegram relay channel using grammY with long polling.
 * The bot must be an administrator of every source channel to receive
 * channel posts, and of the log channel to post there.
 */
export class TelegramAdapter implements RelayChannel {
  readonly type = "telegram";

  private readonly bot: Bot;
  private readonly subscriptions = new SubscriptionRegistry();
  /** Settles with the polling error, or undefined on a clean stop */
  private polling: Promise<unknown> | null = null;

  constructor(private readonly options: TelegramAdapterOptions) {
    this.bot = new Bot(options.botToken);
  }

  subscribe(channelId: number, handler: InboundHandler): void {
    this.subscriptions.subscribe(channelId, handler);
  }

  async connect(): Promise<void> {
    this.bot.on("channel_post", async (ctx) => {
      await this.subscriptions.dispatch(toInboundMessage(ctx.channelPost));
    });

    this.bot.catch((err) => {
      log.error({ err: err.error, updateId: err.ctx.update.update_id }, "Telegram bot error");
    });

    try {
      await this.bot.init();
    } catch (err) {
      throw new ChannelError("Failed to initialize Telegram bot", err);
    }
    log.info({ username: this.bot.botInfo.username }, "Telegram bot initialized");

    // Long polling runs until stop(); updates are handled one at a time
    this.polling = this.bot
      .start({
        allowed_updates: ["channel_post"],
        onStart: () => log.info("Telegram long polling started"),
      })
      .then(
        () => undefined,
        (err: unknown) => err,
      );
  }

  async disconnect(): Promise<void> {
    if (this.bot.isRunning()) {
      await this.bot.stop();
    }
    log.info("Telegram bot stopped");
  }

  async closed(): Promise<void> {
    const failure = await this.polling;
    if (failure !== undefined && failure !== null) {
      throw new ChannelError("Telegram polling stopped with an error", failure);
    }
  }

  async downloadMedia(media: MediaRef, destination: string, signal?: AbortSignal): Promise<string> {
    const file = await this.bot.api.getFile(media.fileId, signal);
    if (!file.file_path) {
      throw new ChannelError(`Telegram returned no file path for ${media.kind} ${media.fileId}`);
    }

    const url = `https://api.telegram.org/file/bot${this.options.botToken}/${file.file_path}`;
    const res = await fetch(url, { signal });
    if (!res.ok) {
      throw new ChannelError(`Media download failed with HTTP ${res.status}`);
    }

    const filePath = destination + extname(file.file_path);
    try {
      await writeFile(filePath, Buffer.from(await res.arrayBuffer()), { signal });
    } catch (err) {
      await rm(filePath, { force: true });
      throw err;
    }
    log.debug({ filePath, kind: media.kind }, "Saved media");
    return filePath;
  }

  async sendMessage(channelId: number, text: string): Promise<string> {
    const result = await this.bot.api.sendMessage(channelId, text);
    return String(result.message_id);
  }

  async sendFile(channelId: number, filePath: string, caption: string): Promise<string> {
    const file = new InputFile(filePath);
    const options = caption ? { caption } : {};

    let result: { message_id: number };
    switch (detectSendKind(filePath)) {
      case "photo":
        result = await this.bot.api.sendPhoto(channelId, file, options);
        break;
      case "video":
        result = await this.bot.api.sendVideo(channelId, file, options);
        break;
      case "audio":
        result = await this.bot.api.sendAudio(channelId, file, options);
        break;
      default:
        result = await this.bot.api.sendDocument(channelId, file, options);
        break;
    }
    return String(result.message_id);
  }
}
