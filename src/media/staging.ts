import { mkdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import type { MediaRef, RelayChannel } from "../channels/types.js";
import { MediaTooLargeError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";

const log = createChildLogger("media");

export interface StageOptions {
  dir: string;
  fileName: string;
  timeoutMs: number;
}

/**
 * Download media to a transient file, hand its path to `work`, and delete
 * the file afterwards whether `work` (or the download) succeeded or not.
 *
 * A download that loses to the timeout is aborted through its signal; if
 * it still lands a file, that file is removed once the download settles.
 */
export async function stageMedia<T>(
  source: Pick<RelayChannel, "downloadMedia">,
  media: MediaRef,
  options: StageOptions,
  work: (filePath: string) => Promise<T>,
): Promise<T> {
  await mkdir(options.dir, { recursive: true });
  const destination = join(options.dir, options.fileName);

  const controller = new AbortController();
  const download = source.downloadMedia(media, destination, controller.signal);

  let staged: string | undefined;
  try {
    staged = await withTimeout(download, options.timeoutMs, "media download");
    log.debug({ filePath: staged, kind: media.kind }, "Media staged");
    return await work(staged);
  } finally {
    if (staged === undefined) {
      controller.abort();
      await discard(destination);
      void discardWhenSettled(download);
    } else {
      await discard(staged);
    }
  }
}

/** Throws MediaTooLargeError when the file exceeds `maxBytes`. */
export async function assertMediaSize(filePath: string, maxBytes: number): Promise<number> {
  const { size } = await stat(filePath);
  if (size > maxBytes) {
    throw new MediaTooLargeError(size, maxBytes);
  }
  return size;
}

async function discard(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    log.warn({ err, filePath }, "Failed to remove staged media");
  }
}

async function discardWhenSettled(download: Promise<string>): Promise<void> {
  try {
    await discard(await download);
  } catch (err) {
    log.debug({ err }, "Abandoned media download failed");
  }
}
