import { TwitterApi, type Tweetv2SearchParams } from "twitter-api-v2";
import { HttpsProxyAgent } from "https-proxy-agent";
import type { MediaObjectV2, SearchPage, TweetV2, UserV2 } from "../data/types";
import { errorMessage, logger } from "../utils/logger";
import { fail, ok, type Result } from "../utils/result";

// Bounds of max_results on GET /2/tweets/search/recent.
const MIN_RESULTS = 10;
const MAX_RESULTS = 100;

/** The slice of the v2 client the relay uses. */
export interface RecentSearchClient {
  v2: {
    search(
      query: string,
      options?: Partial<Tweetv2SearchParams>
    ): Promise<{ tweets: TweetV2[]; includes: { users: UserV2[]; media: MediaObjectV2[] } }>;
  };
}

export const proxyAgentFor = (proxyUrl?: string): HttpsProxyAgent<string> | undefined =>
  proxyUrl ? new HttpsProxyAgent(proxyUrl) : undefined;

/** Bearer-token client; requests go through `proxyUrl` when one is configured. */
export function createXClient(bearerToken: string, proxyUrl?: string) {
  const httpAgent = proxyAgentFor(proxyUrl);
  logger.info({ proxy: Boolean(proxyUrl) }, "Initializing X client with bearer token");
  const client = new TwitterApi(bearerToken, httpAgent ? { httpAgent } : undefined);
  return client.readOnly;
}

export const clampSearchLimit = (limit: number) => Math.min(Math.max(Math.floor(limit), MIN_RESULTS), MAX_RESULTS);

export function buildSearchParams(limit: number): Partial<Tweetv2SearchParams> {
  return {
    expansions: ["author_id", "attachments.media_keys"],
    "tweet.fields": ["id", "text", "author_id", "created_at", "public_metrics", "attachments"],
    "user.fields": ["name", "username", "public_metrics", "verified"],
    "media.fields": ["url", "preview_image_url", "type"],
    max_results: clampSearchLimit(limit),
  };
}

interface ApiErrorShape {
  data?: { detail?: string; title?: string };
}

const hasApiData = (err: unknown): err is ApiErrorShape =>
  typeof err === "object" && err !== null && "data" in err;

const describeApiError = (err: unknown): string => {
  if (hasApiData(err)) {
    const detail = err.data?.detail ?? err.data?.title;
    if (detail) return detail;
  }
  return errorMessage(err);
};

/**
 * One recent-search call with author and media expansions. Only the first page is read.
 * The API will not return fewer than 10 results, so the page is cut back to `limit`.
 */
export async function searchRecentTweets(
  client: RecentSearchClient,
  query: string,
  limit: number
): Promise<Result<SearchPage>> {
  try {
    const res = await client.v2.search(query, buildSearchParams(limit));
    const tweets = res.tweets.slice(0, Math.max(0, Math.floor(limit)));
    return ok({ tweets, users: res.includes.users, media: res.includes.media });
  } catch (err) {
    return fail(new Error(describeApiError(err)));
  }
}
