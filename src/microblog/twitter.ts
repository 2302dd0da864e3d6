import { TwitterApi } from "twitter-api-v2";
import type { MicroblogClient, PublishedPost } from "./types.js";
import type { TwitterCredentials } from "../config.js";
import { MicroblogError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("twitter");

/** X accepts at most four media items per post. */
export const MAX_MEDIA_PER_POST = 4;

type MediaIds =
  | [string]
  | [string, string]
  | [string, string, string]
  | [string, string, string, string];

/**
 * X client: media goes through the v1.1 upload endpoint, posts through v2.
 * Both need OAuth 1.0a user context.
 */
export class TwitterClient implements MicroblogClient {
  private readonly client: TwitterApi;

  constructor(credentials: TwitterCredentials) {
    this.client = new TwitterApi({
      appKey: credentials.appKey,
      appSecret: credentials.appSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessSecret,
    });
  }

  async uploadMedia(filePath: string): Promise<string> {
    try {
      return await this.client.v1.uploadMedia(filePath);
    } catch (err) {
      throw new MicroblogError(`X media upload failed: ${errorMessage(err)}`, err);
    }
  }

  async createPost(text: string, mediaIds: readonly string[] = []): Promise<PublishedPost> {
    if (mediaIds.length > MAX_MEDIA_PER_POST) {
      log.warn({ count: mediaIds.length }, "Too many media items, attaching the first four");
    }
    const media = toMediaIds(mediaIds);

    try {
      const result = await this.client.v2.tweet(
        media ? { text, media: { media_ids: media } } : { text },
      );
      log.info({ postId: result.data.id }, "Post published");
      return { id: result.data.id };
    } catch (err) {
      throw new MicroblogError(`X post failed: ${errorMessage(err)}`, err);
    }
  }
}

function toMediaIds(ids: readonly string[]): MediaIds | undefined {
  const [a, b, c, d] = ids;
  if (a === undefined) return undefined;
  if (b === undefined) return [a];
  if (c === undefined) return [a, b];
  if (d === undefined) return [a, b, c];
  return [a, b, c, d];
}
