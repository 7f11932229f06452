import type { AppConfig, ChannelConfig, SearchPage, TweetV2, UserV2 } from "../data/types";
import type { SeenStore } from "../data/seenStore";
import { errorMessage, logger } from "../utils/logger";
import type { Result } from "../utils/result";
import { checkAuthor, collectMediaUrls, indexBy, isSameUtcDay, resolveFilters } from "./filters";

/** Tweets forwarded per query pair per run. Fixed; independent of the fetch cap. */
export const MAX_DISPATCH_PER_QUERY = 5;

export type SearchFn = (query: string, limit: number) => Promise<Result<SearchPage>>;

export interface TweetSender {
  sendTweet(webhookUrl: string, tweet: TweetV2, author: UserV2, mediaUrls: readonly string[]): Promise<Result<void>>;
  sendErrorNotification(message: string): Promise<Result<void>>;
}

export interface RelayDeps {
  search: SearchFn;
  seen: SeenStore;
  notifier: TweetSender;
  now?: () => Date;
}

export type PairOutcome =
  | { channel: string; status: "sent"; fetched: number; dispatched: number }
  | { channel: string; status: "skipped"; reason: "empty_query" | "no_results" }
  | { channel: string; status: "failed"; error: string };

export interface RelaySummary {
  pairs: PairOutcome[];
  dispatched: number;
  failed: Array<{ channel: string; error: string }>;
}

async function dispatchPage(
  channel: ChannelConfig,
  page: SearchPage,
  config: AppConfig,
  deps: RelayDeps,
  now: Date
): Promise<number> {
  const filters = resolveFilters(config.globalFilters, channel.filters);
  const users = indexBy(page.users, (u) => u.id);
  const media = indexBy(page.media, (m) => m.media_key);

  let dispatched = 0;
  for (const tweet of page.tweets) {
    if (dispatched >= MAX_DISPATCH_PER_QUERY) break;
    if (!isSameUtcDay(tweet.created_at, now)) continue;
    if (deps.seen.has(tweet.id)) continue;

    const author = tweet.author_id ? users.get(tweet.author_id) : undefined;
    if (!author) continue;
    const rejection = checkAuthor(author, filters);
    if (rejection) {
      logger.debug({ channel: channel.name, tweetId: tweet.id, username: author.username, rejection }, "Author filtered out");
      continue;
    }

    // Marked seen whatever the delivery outcome: a failed send is never retried.
    await deps.notifier.sendTweet(channel.webhookUrl, tweet, author, collectMediaUrls(tweet, media));
    deps.seen.record(tweet.id);
    dispatched += 1;
  }
  return dispatched;
}

export async function processChannel(channel: ChannelConfig, config: AppConfig, deps: RelayDeps): Promise<PairOutcome> {
  if (!channel.query.trim()) {
    logger.warn({ channel: channel.name }, "Empty search query, skipping channel");
    return { channel: channel.name, status: "skipped", reason: "empty_query" };
  }

  const page = await deps.search(channel.query, config.searchLimit);
  if (!page.ok) {
    return { channel: channel.name, status: "failed", error: page.error.message };
  }
  if (page.value.tweets.length === 0) {
    logger.info({ channel: channel.name }, "No matching tweets");
    return { channel: channel.name, status: "skipped", reason: "no_results" };
  }

  const now = (deps.now ?? (() => new Date()))();
  const dispatched = await dispatchPage(channel, page.value, config, deps, now);
  logger.info({ channel: channel.name, fetched: page.value.tweets.length, dispatched }, "Channel processed");
  return { channel: channel.name, status: "sent", fetched: page.value.tweets.length, dispatched };
}

/**
 * One pass over every configured channel, in order. A failure in one channel is logged
 * and reported at the end; the remaining channels still run.
 */
export async function runRelay(config: AppConfig, deps: RelayDeps): Promise<RelaySummary> {
  const pairs: PairOutcome[] = [];
  for (const channel of config.channels) {
    let outcome: PairOutcome;
    try {
      outcome = await processChannel(channel, config, deps);
    } catch (err) {
      outcome = { channel: channel.name, status: "failed", error: errorMessage(err) };
    }
    if (outcome.status === "failed") {
      logger.error({ channel: channel.name, error: outcome.error }, "Channel failed");
    }
    pairs.push(outcome);
  }

  const summary: RelaySummary = {
    pairs,
    dispatched: pairs.reduce((n, p) => n + (p.status === "sent" ? p.dispatched : 0), 0),
    failed: pairs.flatMap((p) => (p.status === "failed" ? [{ channel: p.channel, error: p.error }] : [])),
  };
  logger.info(
    { channels: pairs.length, dispatched: summary.dispatched, failed: summary.failed.length },
    "Relay run finished"
  );

  if (summary.failed.length > 0) {
    const lines = summary.failed.map((f) => `• ${f.channel}: ${f.error}`);
    await deps.notifier.sendErrorNotification(
      `${summary.failed.length} of ${pairs.length} channel(s) failed:\n${lines.join("\n")}`
    );
  }
  return summary;
}
