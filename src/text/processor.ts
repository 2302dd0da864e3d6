import type { ProcessingOptions } from "../config.js";

const URL_PATTERN = /http\S+|www\S+|https\S+/g;
// Word characters in any script, combining marks included.
const HASHTAG_PATTERN = /#[\p{L}\p{N}\p{M}_]+/gu;
const MENTION_PATTERN = /@[\p{L}\p{N}\p{M}_]+/gu;
const WHITESPACE_PATTERN = /\s+/g;

// Emoticons, pictographs, transport, regional indicators, dingbats,
// circled M, enclosed alphanumeric and ideographic supplements.
const EMOJI_PATTERN =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2702}-\u{27B0}\u{24C2}\u{1F170}-\u{1F251}]+/gu;

/**
 * Rewrite a post's text for relaying. Steps run in a fixed order, each
 * only when its toggle is on; prefix and suffix go on after every removal.
 * No truncation happens here.
 */
export function processText(
  text: string | null | undefined,
  options: ProcessingOptions,
): string {
  if (!text) return "";

  let result = text;

  if (options.removeUrls) {
    result = result.replace(URL_PATTERN, "");
  }
  if (options.removeHashtags) {
    result = result.replace(HASHTAG_PATTERN, "");
  }
  if (options.removeMentions) {
    result = result.replace(MENTION_PATTERN, "");
  }
  if (options.removeEmojis) {
    result = result.replace(EMOJI_PATTERN, "");
  }
  if (options.trimExtraSpaces) {
    result = result.replace(WHITESPACE_PATTERN, " ").trim();
  }
  if (options.prefix) {
    result = `${options.prefix}${result}`;
  }
  if (options.suffix) {
    result = `${result}${options.suffix}`;
  }

  return result.trim();
}

/** Length in code points, so an emoji counts once. */
export function postLength(text: string): number {
  return [...text].length;
}

export function isTooLong(text: string, options: ProcessingOptions): boolean {
  return options.skipLongPosts && postLength(text) > options.maxPostLength;
}
