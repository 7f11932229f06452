import type { MediaObjectV2, TweetV2, UserV2 } from "twitter-api-v2";

export type QueryLogic = "AND" | "OR";

export interface FilterSettings {
  minFollowers: number;
  onlyVerified: boolean;
  whitelist: ReadonlySet<string>; // lower-cased, empty = anyone
  blacklist: ReadonlySet<string>; // lower-cased
}

export interface FilterOverrides {
  minFollowers?: number;
  onlyVerified?: boolean;
  whitelistUsernames?: string[];
  blacklistUsernames?: string[];
}

export interface ChannelConfig {
  name: string; // key under keyword_channels
  query: string;
  webhookUrl: string;
  filters: FilterOverrides;
}

export interface AppConfig {
  notificationsWebhookUrl?: string;
  bearerToken?: string; // fallback when the env var is unset
  globalFilters: FilterOverrides;
  searchLimit: number;
  channels: ChannelConfig[];
  proxy?: string; // http://127.0.0.1:7890
  schedule: string; // cron expression, used by `start`
  requestTimeoutMs: number;
}

export interface RuntimeOptions {
  configPath: string;
  seenFile: string;
  env: NodeJS.ProcessEnv;
}

export interface SearchPage {
  tweets: TweetV2[];
  users: UserV2[];
  media: MediaObjectV2[];
}

export type { MediaObjectV2, TweetV2, UserV2 };
