import type { FilterOverrides, FilterSettings, MediaObjectV2, TweetV2, UserV2 } from "../data/types";

export type AuthorRejection = "not_whitelisted" | "blacklisted" | "too_few_followers" | "not_verified";

const DEFAULT_FILTERS: Required<FilterOverrides> = {
  minFollowers: 0,
  onlyVerified: false,
  whitelistUsernames: [],
  blacklistUsernames: [],
};

const toUsernameSet = (usernames: readonly string[]): ReadonlySet<string> =>
  new Set(usernames.map((u) => u.replace(/^@/, "").trim().toLowerCase()).filter(Boolean));

/** Channel values win key by key; keys the channel leaves unset fall back to the global ones. */
export function resolveFilters(global: FilterOverrides, channel: FilterOverrides): FilterSettings {
  const merged: Required<FilterOverrides> = {
    minFollowers: channel.minFollowers ?? global.minFollowers ?? DEFAULT_FILTERS.minFollowers,
    onlyVerified: channel.onlyVerified ?? global.onlyVerified ?? DEFAULT_FILTERS.onlyVerified,
    whitelistUsernames:
      channel.whitelistUsernames ?? global.whitelistUsernames ?? DEFAULT_FILTERS.whitelistUsernames,
    blacklistUsernames:
      channel.blacklistUsernames ?? global.blacklistUsernames ?? DEFAULT_FILTERS.blacklistUsernames,
  };
  return {
    minFollowers: merged.minFollowers,
    onlyVerified: merged.onlyVerified,
    whitelist: toUsernameSet(merged.whitelistUsernames),
    blacklist: toUsernameSet(merged.blacklistUsernames),
  };
}

/**
 * Returns why an author is excluded, or undefined when they pass.
 * Checks run whitelist, blacklist, followers, verified; a handle on both lists is rejected
 * as blacklisted.
 */
export function checkAuthor(author: UserV2, filters: FilterSettings): AuthorRejection | undefined {
  const username = author.username.toLowerCase();
  if (filters.whitelist.size > 0 && !filters.whitelist.has(username)) return "not_whitelisted";
  if (filters.blacklist.has(username)) return "blacklisted";
  if (filters.minFollowers > 0 && (author.public_metrics?.followers_count ?? 0) < filters.minFollowers) {
    return "too_few_followers";
  }
  if (filters.onlyVerified && !author.verified) return "not_verified";
  return undefined;
}

export const utcDateKey = (date: Date): string => date.toISOString().slice(0, 10);

export function isSameUtcDay(createdAt: string | undefined, now: Date): boolean {
  if (!createdAt) return false;
  const created = new Date(createdAt);
  if (Number.isNaN(created.getTime())) return false;
  return utcDateKey(created) === utcDateKey(now);
}

export function indexBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) index.set(key(item), item);
  return index;
}

const pickMediaUrl = (media: MediaObjectV2): string | undefined => {
  if (media.type === "photo" || media.type === "animated_gif") return media.url || undefined;
  if (media.type === "video") return media.preview_image_url || undefined;
  return undefined;
};

/** Media URLs in attachment order; videos contribute their preview image. */
export function collectMediaUrls(tweet: TweetV2, mediaByKey: ReadonlyMap<string, MediaObjectV2>): string[] {
  const urls: string[] = [];
  for (const key of tweet.attachments?.media_keys ?? []) {
    const media = mediaByKey.get(key);
    if (!media) continue;
    const url = pickMediaUrl(media);
    if (url) urls.push(url);
  }
  return urls;
}
