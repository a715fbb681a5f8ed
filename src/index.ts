import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createTelegramClient, sendStartupAnnouncement } from "./delivery";
import { destinationFor, sleep } from "./monitor";
import { createParser, loadFeedList } from "./pipeline";
import { createFeedMonitor } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed relay starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      checkIntervalSeconds: config.monitor.checkIntervalSeconds,
      includeDescription: config.format.includeDescription,
      muted: config.telegram.muted,
      feedListReload: config.monitor.feedListReload,
    },
    "config loaded",
  );

  const client = createTelegramClient({
    botToken: config.telegram.botToken,
    timeoutMs: config.network.deliveryTimeoutMs,
  });

  await sendStartupAnnouncement(
    client,
    destinationFor(config),
    { muted: config.telegram.muted },
    logger,
  );

  const feedsFile = resolve(config.paths.feedsFile);
  const monitor = createFeedMonitor({
    config,
    client,
    logger,
    sleep,
    parser: createParser(config.network.fetchTimeoutMs),
    loadFeeds: () => loadFeedList(feedsFile, logger),
  });

  registerShutdownHandlers({ monitors: [monitor], logger });

  await monitor.done;
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
