import type { Config } from "../config.js";
import type { InboundMessage, RelayChannel } from "../channels/types.js";
import type { MicroblogClient } from "../microblog/types.js";
import type { DeliveryResult, Destination, RouteOutcome } from "./types.js";
import { assertMediaSize, stageMedia } from "../media/staging.js";
import { isTooLong, postLength, processText } from "../text/processor.js";
import { errorMessage, toMegabytes } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";

const log = createChildLogger("router");

/** Largest file X accepts through the media upload endpoint. */
export const MAX_MICROBLOG_MEDIA_BYTES = 50 * 1024 * 1024;

export interface MessageRouterDeps {
  config: Config;
  source: RelayChannel;
  microblog: MicroblogClient;
}

/**
 * Relays one inbound post: always to the log channel, and to X when the
 * processed text fits. The two deliveries are independent and neither
 * can throw out of route().
 */
export class MessageRouter {
  constructor(private readonly deps: MessageRouterDeps) {}

  async route(message: InboundMessage): Promise<RouteOutcome> {
    const { processing } = this.deps.config;
    log.info({ channelId: message.sourceChannel, messageId: message.id }, "New message");

    const processedText = processText(message.text, processing);

    // Polls, locations and the like carry neither; both APIs reject empty posts.
    if (!message.media && processedText === "") {
      const skipped: DeliveryResult = { status: "skipped", reason: "no text or media to relay" };
      return this.finish(message, processedText, skipped, skipped);
    }

    const tooLong = isTooLong(processedText, processing);
    if (tooLong) {
      log.warn(
        { length: postLength(processedText), max: processing.maxPostLength },
        "Message too long for X, skipping post",
      );
    }

    const logResult = await this.attempt(() => this.deliverToLog(message, processedText));
    const microblogResult: DeliveryResult = tooLong
      ? {
          status: "skipped",
          reason: `text is ${postLength(processedText)} characters, limit ${processing.maxPostLength}`,
        }
      : await this.attempt(() => this.deliverToMicroblog(message, processedText));

    return this.finish(message, processedText, logResult, microblogResult);
  }

  private finish(
    message: InboundMessage,
    processedText: string,
    logResult: DeliveryResult,
    microblogResult: DeliveryResult,
  ): RouteOutcome {
    const outcome: RouteOutcome = {
      messageId: message.id,
      sourceChannel: message.sourceChannel,
      processedText,
      log: logResult,
      microblog: microblogResult,
    };
    this.report("log", outcome.log, message);
    this.report("microblog", outcome.microblog, message);
    return outcome;
  }

  private async deliverToLog(message: InboundMessage, text: string): Promise<string> {
    const { source, config } = this.deps;

    if (!message.media) {
      return this.bounded(source.sendMessage(config.logChannel, text), "log channel send");
    }

    return stageMedia(
      source,
      message.media,
      { dir: config.mediaDir, fileName: `log_media_${message.id}`, timeoutMs: config.requestTimeoutMs },
      (filePath) => this.bounded(source.sendFile(config.logChannel, filePath, text), "log channel upload"),
    );
  }

  private async deliverToMicroblog(message: InboundMessage, text: string): Promise<string> {
    const { source, microblog, config } = this.deps;

    if (!message.media) {
      const post = await this.bounded(microblog.createPost(text), "X post");
      return post.id;
    }

    return stageMedia(
      source,
      message.media,
      { dir: config.mediaDir, fileName: `microblog_media_${message.id}`, timeoutMs: config.requestTimeoutMs },
      async (filePath) => {
        const size = await assertMediaSize(filePath, MAX_MICROBLOG_MEDIA_BYTES);
        log.debug({ sizeMb: toMegabytes(size) }, "Uploading media to X");
        const mediaId = await this.bounded(microblog.uploadMedia(filePath), "X media upload");
        const post = await this.bounded(microblog.createPost(text, [mediaId]), "X post");
        return post.id;
      },
    );
  }

  private async attempt(deliver: () => Promise<string>): Promise<DeliveryResult> {
    try {
      return { status: "delivered", ref: await deliver() };
    } catch (err) {
      return { status: "failed", reason: errorMessage(err), error: err };
    }
  }

  private bounded<T>(operation: Promise<T>, label: string): Promise<T> {
    return withTimeout(operation, this.deps.config.requestTimeoutMs, label);
  }

  private report(destination: Destination, result: DeliveryResult, message: InboundMessage): void {
    const context = { destination, channelId: message.sourceChannel, messageId: message.id };
    switch (result.status) {
      case "delivered":
        log.info({ ...context, ref: result.ref }, "Delivered");
        break;
      case "skipped":
        log.info({ ...context, reason: result.reason }, "Skipped");
        break;
      case "failed":
        log.error({ ...context, err: result.error }, "Delivery failed");
        break;
    }
  }
}
