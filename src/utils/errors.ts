export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "RelayError";
  }
}

export class ConfigError extends RelayError {
  constructor(
    message: string,
    public readonly variables: readonly string[] = [],
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

export class ChannelError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, "CHANNEL_ERROR", cause);
    this.name = "ChannelError";
  }
}

export class MicroblogError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, "MICROBLOG_ERROR", cause);
    this.name = "MicroblogError";
  }
}

export class MediaTooLargeError extends RelayError {
  constructor(
    public readonly sizeBytes: number,
    public readonly limitBytes: number,
  ) {
    super(`Media file too large (${toMegabytes(sizeBytes)}MB, limit ${toMegabytes(limitBytes)}MB)`, "MEDIA_TOO_LARGE");
    this.name = "MediaTooLargeError";
  }
}

export class TimeoutError extends RelayError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

export function toMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

/** Message of any thrown value, for log lines and delivery results. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
