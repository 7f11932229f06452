import test from "node:test";
import assert from "node:assert/strict";
import type { TweetV2, UserV2 } from "../data/types";
import {
  ERROR_COLOR,
  Notifier,
  TWEET_COLOR,
  buildErrorEmbed,
  buildTweetEmbed,
  sendEmbed,
  type FetchLike,
} from "./notifier";

const NOW = new Date("2026-03-10T12:00:00.000Z");

const metrics = {
  retweet_count: 3,
  reply_count: 1,
  like_count: 12,
  quote_count: 0,
  impression_count: 400,
  bookmark_count: 2,
};

const author: UserV2 = { id: "u1", name: "Alice", username: "alice_dev" };

const tweet = (overrides: Partial<TweetV2> = {}): TweetV2 => ({
  id: "1900000000000000001",
  text: "Shipping a new release today",
  edit_history_tweet_ids: ["1900000000000000001"],
  public_metrics: metrics,
  ...overrides,
});

interface CapturedCall {
  url: string;
  init: RequestInit;
}

const fakeFetch = (respond: () => Promise<Response>) => {
  const calls: CapturedCall[] = [];
  const impl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return respond();
  };
  return { calls, impl };
};

test("buildTweetEmbed should link the tweet and summarise engagement", () => {
  const embed = buildTweetEmbed(tweet(), author, [], NOW);
  const url = "https://twitter.com/alice_dev/status/1900000000000000001";

  assert.equal(embed.title, "New Tweet from @alice_dev");
  assert.equal(embed.url, url);
  assert.equal(embed.description, `Shipping a new release today\n\n🔗 [View on Twitter](${url})`);
  assert.equal(embed.color, TWEET_COLOR);
  assert.deepEqual(embed.author, { name: "Alice", url: "https://twitter.com/alice_dev" });
  assert.deepEqual(embed.footer, { text: "Likes: 12 | Retweets: 3 | Twitter Bot" });
  assert.equal(embed.timestamp, "2026-03-10T12:00:00.000Z");
  assert.equal(embed.image, undefined);
});

test("buildTweetEmbed should print N/A when metrics are absent", () => {
  const embed = buildTweetEmbed(tweet({ public_metrics: undefined }), author, [], NOW);
  assert.deepEqual(embed.footer, { text: "Likes: N/A | Retweets: N/A | Twitter Bot" });
});

test("buildTweetEmbed should attach the first media url and list the rest", () => {
  const embed = buildTweetEmbed(
    tweet({ text: "pics" }),
    author,
    ["https://pbs.example/1.jpg", "https://pbs.example/2.jpg", "https://pbs.example/3.jpg"],
    NOW
  );
  assert.deepEqual(embed.image, { url: "https://pbs.example/1.jpg" });
  assert.equal(
    embed.description,
    "pics\n\n🔗 [View on Twitter](https://twitter.com/alice_dev/status/1900000000000000001)" +
      "\n\n**Additional Media:**\nhttps://pbs.example/2.jpg\nhttps://pbs.example/3.jpg"
  );
});

test("buildTweetEmbed should cap the description at 4096 characters", () => {
  const embed = buildTweetEmbed(tweet({ text: "x".repeat(5000) }), author, [], NOW);
  assert.equal(embed.description?.length, 4096);
  assert.ok(embed.description?.endsWith("…"));
});

test("buildErrorEmbed should carry only the error text", () => {
  const embed = buildErrorEmbed("token missing", NOW);
  assert.deepEqual(embed, {
    title: "❌ Bot Error Notification ❌",
    description: "token missing",
    color: ERROR_COLOR,
    author: { name: "Twitter Bot" },
    footer: { text: "Twitter-Discord Bot Error" },
    timestamp: "2026-03-10T12:00:00.000Z",
  });
});

test("sendEmbed should post a single embed as JSON", async () => {
  const { calls, impl } = fakeFetch(async () => new Response(null, { status: 204 }));
  const embed = buildErrorEmbed("boom", NOW);

  const result = await sendEmbed("https://discord.example/webhook", embed, { fetchImpl: impl });

  assert.deepEqual(result, { ok: true, value: undefined });
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "https://discord.example/webhook");
  assert.equal(calls[0]?.init.method, "POST");
  assert.deepEqual(calls[0]?.init.headers, { "content-type": "application/json" });
  assert.deepEqual(JSON.parse(String(calls[0]?.init.body)), { embeds: [embed] });
});

test("sendEmbed should report a non-success status without throwing", async () => {
  const { impl } = fakeFetch(async () => new Response("rate limited", { status: 429 }));
  const result = await sendEmbed("https://discord.example/webhook", buildErrorEmbed("x", NOW), { fetchImpl: impl });

  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.message, "HTTP 429: rate limited");
});

test("sendEmbed should report connection errors", async () => {
  const { calls, impl } = fakeFetch(async () => {
    throw new TypeError("fetch failed");
  });
  const result = await sendEmbed("https://discord.example/webhook", buildErrorEmbed("x", NOW), { fetchImpl: impl });

  assert.equal(calls.length, 1);
  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.message, "fetch failed");
});

test("sendEmbed should abort a request that exceeds the timeout", async () => {
  const impl: FetchLike = (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });
  const result = await sendEmbed("https://discord.example/webhook", buildErrorEmbed("x", NOW), {
    fetchImpl: impl,
    timeoutMs: 20,
  });

  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.message, "Timed out after 20ms");
});

test("Notifier.sendErrorNotification should not call out without a webhook", async () => {
  const { calls, impl } = fakeFetch(async () => new Response(null, { status: 204 }));
  const notifier = new Notifier({ fetchImpl: impl, now: () => NOW });

  const result = await notifier.sendErrorNotification("boom");

  assert.equal(result.ok, false);
  assert.equal(calls.length, 0);
});

test("Notifier.sendErrorNotification should post an error embed to the error webhook", async () => {
  const { calls, impl } = fakeFetch(async () => new Response(null, { status: 204 }));
  const notifier = new Notifier({ errorWebhookUrl: "https://discord.example/errors", fetchImpl: impl, now: () => NOW });

  const result = await notifier.sendErrorNotification("boom");

  assert.equal(result.ok, true);
  assert.equal(calls[0]?.url, "https://discord.example/errors");
  assert.deepEqual(JSON.parse(String(calls[0]?.init.body)), { embeds: [buildErrorEmbed("boom", NOW)] });
});

test("Notifier.sendTweet should post the tweet embed to the channel webhook", async () => {
  const { calls, impl } = fakeFetch(async () => new Response(null, { status: 204 }));
  const notifier = new Notifier({ fetchImpl: impl, now: () => NOW });

  const result = await notifier.sendTweet("https://discord.example/channel", tweet(), author, ["https://pbs.example/1.jpg"]);

  assert.equal(result.ok, true);
  assert.equal(calls[0]?.url, "https://discord.example/channel");
  assert.deepEqual(JSON.parse(String(calls[0]?.init.body)), {
    embeds: [buildTweetEmbed(tweet(), author, ["https://pbs.example/1.jpg"], NOW)],
  });
});
