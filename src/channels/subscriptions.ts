import type { InboundHandler, InboundMessage } from "./types.js";
import { ChannelError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("subscriptions");

/**
 * Dispatch table from source channel id to its handler.
 * Each id is bound once; messages from other chats are dropped.
 */
export class SubscriptionRegistry {
  private readonly handlers = new Map<number, InboundHandler>();

  subscribe(channelId: number, handler: InboundHandler): void {
    if (this.handlers.has(channelId)) {
      throw new ChannelError(`Channel ${channelId} already has a handler`);
    }
    this.handlers.set(channelId, handler);
  }

  has(channelId: number): boolean {
    return this.handlers.has(channelId);
  }

  channelIds(): number[] {
    return [...this.handlers.keys()];
  }

  async dispatch(message: InboundMessage): Promise<void> {
    const handler = this.handlers.get(message.sourceChannel);
    if (!handler) {
      log.debug({ channelId: message.sourceChannel }, "No subscription for channel, ignoring");
      return;
    }
    try {
      await handler(message);
    } catch (err) {
      log.error(
        { err, channelId: message.sourceChannel, messageId: message.id },
        "Error handling message",
      );
    }
  }
}
