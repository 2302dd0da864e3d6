import type { Config } from "./config.js";
import type { RelayChannel } from "./channels/types.js";
import type { MicroblogClient } from "./microblog/types.js";
import { TelegramAdapter } from "./channels/telegram/adapter.js";
import { TwitterClient } from "./microblog/twitter.js";
import { MessageRouter } from "./router/router.js";
import { startHealthServer, type HealthServer } from "./health.js";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger("server");

export interface RelayServerDeps {
  channel?: RelayChannel;
  microblog?: MicroblogClient;
}

export class RelayServer {
  private readonly channel: RelayChannel;
  private readonly router: MessageRouter;
  private health: HealthServer | null = null;
  private running = false;

  constructor(
    private readonly config: Config,
    deps: RelayServerDeps = {},
  ) {
    this.channel = deps.channel ?? new TelegramAdapter({ botToken: config.telegramBotToken });
    const microblog = deps.microblog ?? new TwitterClient(config.twitter);
    this.router = new MessageRouter({ config, source: this.channel, microblog });

    // One handler per source channel, keyed by its id
    for (const channelId of config.sourceChannels) {
      this.channel.subscribe(channelId, async (message) => {
        await this.router.route(message);
      });
      log.info({ channelId }, "Added handler for channel");
    }
  }

  async start(): Promise<void> {
    if (this.running) return;

    log.info("Starting channel relay...");
    this.health = await startHealthServer(this.config.healthPort);
    await this.channel.connect();
    this.running = true;

    log.info(
      {
        sourceChannels: this.config.sourceChannels.length,
        logChannel: this.config.logChannel,
        maxPostLength: this.config.processing.maxPostLength,
        skipLongPosts: this.config.processing.skipLongPosts,
      },
      "Channel relay is running",
    );
  }

  async stop(): Promise<void> {
    if (this.health) {
      await this.health.close();
      this.health = null;
    }
    if (!this.running) return;
    await this.channel.disconnect();
    this.running = false;
    log.info("Server stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Resolves once the channel stops delivering events. */
  async waitUntilDisconnected(): Promise<void> {
    await this.channel.closed();
  }
}
