import { BEARER_TOKEN_ENV_VAR, ConfigError, loadConfig, resolveBearerToken } from "../config";
import { createXClient, searchRecentTweets, type RecentSearchClient } from "../clients/xClient";
import { SeenStore } from "../data/seenStore";
import type { AppConfig, RuntimeOptions } from "../data/types";
import { errorMessage, logger } from "../utils/logger";
import { fail, ok, type Result } from "../utils/result";
import { Notifier, type FetchLike } from "./notifier";
import type { RelayDeps } from "./relay";

export type StartupStage = "config" | "credentials" | "client";

export class StartupError extends Error {
  constructor(
    readonly stage: StartupStage,
    message: string
  ) {
    super(message);
    this.name = "StartupError";
  }
}

export interface RelayContext {
  config: AppConfig;
  deps: RelayDeps;
}

export interface StartupHooks {
  createClient?: (bearerToken: string, proxyUrl?: string) => RecentSearchClient;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

/**
 * Loads config, credentials and the X client. Failures after the config is known are
 * also reported to the error webhook; the caller decides how to exit.
 */
export async function prepareRelay(options: RuntimeOptions, hooks: StartupHooks = {}): Promise<Result<RelayContext, StartupError>> {
  let config: AppConfig;
  try {
    config = loadConfig(options);
  } catch (err) {
    const message = err instanceof ConfigError ? err.message : `Unexpected error while loading config: ${errorMessage(err)}`;
    logger.error({ configPath: options.configPath }, message);
    return fail(new StartupError("config", message));
  }

  const notifier = new Notifier({
    errorWebhookUrl: config.notificationsWebhookUrl,
    fetchImpl: hooks.fetchImpl,
    timeoutMs: config.requestTimeoutMs,
    now: hooks.now,
  });

  const bearerToken = resolveBearerToken(options.env, config);
  if (!bearerToken) {
    const message = `Twitter Bearer Token not found. Please set the '${BEARER_TOKEN_ENV_VAR}' environment variable.`;
    await notifier.sendErrorNotification(message);
    return fail(new StartupError("credentials", message));
  }

  let client: RecentSearchClient;
  try {
    const createClient = hooks.createClient ?? createXClient;
    client = createClient(bearerToken, config.proxy);
  } catch (err) {
    const message = `Error initializing X client: ${errorMessage(err)}`;
    await notifier.sendErrorNotification(message);
    return fail(new StartupError("client", message));
  }

  const seen = new SeenStore(options.seenFile);
  seen.load();

  return ok({
    config,
    deps: {
      search: (query: string, limit: number) => searchRecentTweets(client, query, limit),
      seen,
      notifier,
      now: hooks.now,
    },
  });
}
