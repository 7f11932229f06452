import fs from "fs";
import path from "path";
import { z } from "zod";
import dotenv from "dotenv";
import type { AppConfig, ChannelConfig, FilterOverrides, RuntimeOptions } from "../data/types";
import { buildQuery } from "../services/query";
import { logger } from "../utils/logger";

dotenv.config();

export const BEARER_TOKEN_ENV_VAR = "TWITTER_BEARER_TOKEN";
export const DEFAULT_CONFIG_FILE = "config.json";
export const DEFAULT_SEEN_FILE = "sent_tweets.txt";

const DEFAULTS = {
  searchLimit: 50,
  schedule: "*/15 * * * *",
  requestTimeoutMs: 10000,
} as const;

const FilterSchema = z.object({
  min_followers: z.number().int().min(0).optional(),
  only_verified: z.boolean().optional(),
  whitelist_usernames: z.array(z.string()).optional(),
  blacklist_usernames: z.array(z.string()).optional(),
});

const ChannelSchema = z.object({
  discord_webhook_url: z.string().url(),
  user_filters: FilterSchema.default({}),
  keywords: z.array(z.string()).optional(),
  logic: z.string().optional(),
});

const ConfigSchema = z.object({
  notifications_webhook_url: z.string().url().optional(),
  twitter_bearer_token: z.string().optional(),
  global_filters: FilterSchema.default({}),
  search_limit_per_keyword: z.number().int().min(1).default(DEFAULTS.searchLimit),
  keyword_channels: z.record(ChannelSchema).default({}),
  proxy: z.string().optional(),
  schedule: z.string().default(DEFAULTS.schedule),
  request_timeout_ms: z.number().int().min(1000).max(60000).default(DEFAULTS.requestTimeoutMs),
});

export type RawConfig = z.input<typeof ConfigSchema>;

export type ConfigErrorKind = "missing" | "malformed" | "invalid";

export class ConfigError extends Error {
  constructor(
    readonly kind: ConfigErrorKind,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const toOverrides = (raw: z.infer<typeof FilterSchema>): FilterOverrides => ({
  minFollowers: raw.min_followers,
  onlyVerified: raw.only_verified,
  whitelistUsernames: raw.whitelist_usernames,
  blacklistUsernames: raw.blacklist_usernames,
});

const toChannel = (name: string, raw: z.infer<typeof ChannelSchema>): ChannelConfig => ({
  name,
  // The mapping key is the query itself unless keywords are given.
  query: raw.keywords ? buildQuery(raw.keywords, raw.logic ?? "OR") : name,
  webhookUrl: raw.discord_webhook_url,
  filters: toOverrides(raw.user_filters),
});

/** Validates a parsed config document. Env proxy variables fill `proxy` when the file omits it. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error({ errors: parsed.error.format() }, "Configuration validation failed");
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError("invalid", `Invalid configuration: ${issues.join("; ")}`);
  }

  const data = parsed.data;
  return {
    notificationsWebhookUrl: data.notifications_webhook_url,
    bearerToken: data.twitter_bearer_token,
    globalFilters: toOverrides(data.global_filters),
    searchLimit: data.search_limit_per_keyword,
    channels: Object.entries(data.keyword_channels).map(([name, channel]) => toChannel(name, channel)),
    proxy: data.proxy ?? env.HTTPS_PROXY ?? env.HTTP_PROXY,
    schedule: data.schedule,
    requestTimeoutMs: data.request_timeout_ms,
  };
}

export function loadConfig(options: Pick<RuntimeOptions, "configPath" | "env">): AppConfig {
  const configPath = path.resolve(options.configPath);
  if (!fs.existsSync(configPath)) {
    throw new ConfigError("missing", `Configuration file '${configPath}' not found. Please create it.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError("malformed", `Error decoding JSON from '${configPath}': ${reason}`);
  }
  return parseConfig(raw, options.env);
}

/** The environment variable wins over the config file. Blank values count as unset. */
export function resolveBearerToken(env: NodeJS.ProcessEnv, config: Pick<AppConfig, "bearerToken">): string | undefined {
  const fromEnv = env[BEARER_TOKEN_ENV_VAR]?.trim();
  if (fromEnv) return fromEnv;
  const fromConfig = config.bearerToken?.trim();
  return fromConfig || undefined;
}
