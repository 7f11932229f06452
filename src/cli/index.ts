#!/usr/bin/env node
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { DEFAULT_CONFIG_FILE, DEFAULT_SEEN_FILE } from "../config";
import type { RuntimeOptions } from "../data/types";
import { buildQuery } from "../services/query";
import { runRelay } from "../services/relay";
import { assertValidCron, startScheduler } from "../services/scheduler";
import { prepareRelay } from "../services/startup";
import { errorMessage, logger } from "../utils/logger";

async function bootstrap() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("tweet-relay")
    .option("config", { type: "string", default: DEFAULT_CONFIG_FILE, describe: "Path to the JSON config file" })
    .option("seen-file", { type: "string", default: DEFAULT_SEEN_FILE, describe: "Append-only record of sent tweet ids" })
    .command(["run", "$0"], "Search every configured query once and forward new tweets")
    .command("start", "Run now, then keep running on the configured cron schedule")
    .command("query <keywords..>", "Print the search query built from keywords", (y: Argv) =>
      y
        .positional("keywords", { type: "string", array: true, demandOption: true })
        .option("logic", { type: "string", default: "OR", describe: "AND or OR" })
    )
    .strict()
    .help()
    .parse();

  const cmd = String(argv._[0] ?? "run");

  if (cmd === "query") {
    const keywords = Array.isArray(argv.keywords) ? argv.keywords.map(String) : [];
    console.log(buildQuery(keywords, String(argv.logic ?? "OR")));
    return;
  }

  const options: RuntimeOptions = {
    configPath: argv.config,
    seenFile: argv["seen-file"],
    env: process.env,
  };

  const prepared = await prepareRelay(options);
  if (!prepared.ok) {
    logger.error({ stage: prepared.error.stage }, "Startup failed");
    process.exit(1);
  }
  const { config, deps } = prepared.value;

  if (cmd === "start") {
    const task = async () => {
      await runRelay(config, deps);
    };
    try {
      assertValidCron(config.schedule);
    } catch (e) {
      logger.error({ error: errorMessage(e) }, "Could not start scheduler");
      process.exit(1);
    }
    await task();
    startScheduler(config.schedule, task);
    return;
  }

  await runRelay(config, deps);
}

bootstrap().catch((e: unknown) => {
  logger.error({ error: errorMessage(e) }, "Relay failed");
  process.exit(1);
});
