import type { APIEmbed, RESTPostAPIWebhookWithTokenJSONBody } from "discord-api-types/v10";
import type { TweetV2, UserV2 } from "../data/types";
import { errorMessage, logger } from "../utils/logger";
import { fail, ok, type Result } from "../utils/result";
import { truncate } from "../utils/text";

export const TWEET_COLOR = 5814783;
export const ERROR_COLOR = 16711680;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

// Discord rejects embeds whose description exceeds this.
const MAX_DESCRIPTION = 4096;

const ERROR_AUTHOR_NAME = "Twitter Bot";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface SendOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export const profileUrl = (username: string) => `https://twitter.com/${username}`;

export const tweetUrl = (username: string, tweetId: string) => `${profileUrl(username)}/status/${tweetId}`;

const countOrNA = (value?: number) => (value === undefined ? "N/A" : String(value));

export function buildTweetEmbed(tweet: TweetV2, author: UserV2, mediaUrls: readonly string[], now: Date): APIEmbed {
  const url = tweetUrl(author.username, tweet.id);
  let description = `${tweet.text}\n\n🔗 [View on Twitter](${url})`;
  const [image, ...extra] = mediaUrls;
  if (extra.length > 0) {
    description += `\n\n**Additional Media:**\n${extra.join("\n")}`;
  }

  const metrics = tweet.public_metrics;
  const embed: APIEmbed = {
    title: `New Tweet from @${author.username}`,
    description: truncate(description, MAX_DESCRIPTION),
    url,
    color: TWEET_COLOR,
    author: { name: author.name, url: profileUrl(author.username) },
    footer: {
      text: `Likes: ${countOrNA(metrics?.like_count)} | Retweets: ${countOrNA(metrics?.retweet_count)} | Twitter Bot`,
    },
    timestamp: now.toISOString(),
  };
  if (image) embed.image = { url: image };
  return embed;
}

export function buildErrorEmbed(message: string, now: Date): APIEmbed {
  return {
    title: "❌ Bot Error Notification ❌",
    description: truncate(message, MAX_DESCRIPTION),
    color: ERROR_COLOR,
    author: { name: ERROR_AUTHOR_NAME },
    footer: { text: "Twitter-Discord Bot Error" },
    timestamp: now.toISOString(),
  };
}

/** Posts one embed to a webhook. Single attempt; every failure comes back as an error outcome. */
export async function sendEmbed(webhookUrl: string, embed: APIEmbed, options: SendOptions = {}): Promise<Result<void>> {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const payload: RESTPostAPIWebhookWithTokenJSONBody = { embeds: [embed] };

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(webhookUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      return fail(new Error(`HTTP ${res.status}${body ? `: ${truncate(body, 200)}` : ""}`));
    }
    return ok(undefined);
  } catch (err) {
    if (controller.signal.aborted) return fail(new Error(`Timed out after ${timeoutMs}ms`));
    return fail(new Error(errorMessage(err)));
  } finally {
    clearTimeout(timer);
  }
}

export interface NotifierOptions extends SendOptions {
  errorWebhookUrl?: string;
  now?: () => Date;
}

export class Notifier {
  private readonly errorWebhookUrl?: string;
  private readonly now: () => Date;
  private readonly sendOptions: SendOptions;

  constructor(options: NotifierOptions = {}) {
    this.errorWebhookUrl = options.errorWebhookUrl;
    this.now = options.now ?? (() => new Date());
    this.sendOptions = { fetchImpl: options.fetchImpl, timeoutMs: options.timeoutMs };
  }

  async sendTweet(webhookUrl: string, tweet: TweetV2, author: UserV2, mediaUrls: readonly string[]): Promise<Result<void>> {
    const sent = await sendEmbed(webhookUrl, buildTweetEmbed(tweet, author, mediaUrls, this.now()), this.sendOptions);
    if (sent.ok) {
      logger.info({ tweetId: tweet.id, username: author.username }, "Sent tweet to Discord");
    } else {
      logger.error({ tweetId: tweet.id, error: sent.error.message }, "Discord webhook delivery failed");
    }
    return sent;
  }

  /** Logs only when no error webhook is configured. */
  async sendErrorNotification(message: string): Promise<Result<void>> {
    if (!this.errorWebhookUrl) {
      logger.error({ error: message }, "Error notification webhook not configured");
      return fail(new Error("Error notification webhook not configured"));
    }
    logger.error({ error: message }, "Sending error notification");
    const sent = await sendEmbed(this.errorWebhookUrl, buildErrorEmbed(message, this.now()), this.sendOptions);
    if (sent.ok) {
      logger.info("Sent error notification to Discord");
    } else {
      logger.error({ error: sent.error.message }, "Error notification delivery failed");
    }
    return sent;
  }
}
