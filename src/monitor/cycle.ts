// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { deliverMessage, formatMessage } from "../delivery";
import type { DeliveryClient, Destination } from "../delivery";
import {
  ensureFeedRecord,
  hasDelivered,
  loadHistory,
  persistHistory,
  recordDelivery,
} from "../history";
import type { HistoryStore } from "../history";
import { pollFeed } from "../pipeline";
import type { FeedParser, NormalizedEntry } from "../pipeline";

export type CycleDeps = {
  readonly config: AppConfig;
  readonly parser: FeedParser;
  readonly client: DeliveryClient;
  readonly logger: Logger;
  readonly sleep: (ms: number) => Promise<void>;
};

export type CycleSummary = {
  readonly feedsChecked: number;
  readonly feedsFailed: number;
  readonly delivered: number;
  readonly deliveryFailures: number;
  readonly persistFailures: number;
};

type FeedOutcome = {
  failed: boolean;
  delivered: number;
  deliveryFailures: number;
  persistFailures: number;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function destinationFor(config: AppConfig): Destination {
  return {
    chatId: config.telegram.chatId,
    threadId: config.telegram.topicId ?? null,
  };
}

/**
 * Entries of a newest-first feed that are not in the feed's history,
 * returned oldest first.
 */
export function selectNewEntries(
  store: Readonly<HistoryStore>,
  feedUrl: string,
  entries: ReadonlyArray<NormalizedEntry>,
): Array<NormalizedEntry> {
  return entries
    .filter((entry) => !hasDelivered(store, feedUrl, entry.id))
    .reverse();
}

async function persistSafely(
  store: HistoryStore,
  deps: CycleDeps,
): Promise<boolean> {
  try {
    await persistHistory(deps.config.paths.historyFile, store);
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    deps.logger.error(
      { path: deps.config.paths.historyFile, error: message },
      "history persist failed, delivered entries may be resent",
    );
    return false;
  }
}

async function processFeed(
  feedUrl: string,
  store: HistoryStore,
  deps: CycleDeps,
): Promise<FeedOutcome> {
  const { config, logger } = deps;
  const outcome: FeedOutcome = {
    failed: false,
    delivered: 0,
    deliveryFailures: 0,
    persistFailures: 0,
  };

  logger.info({ feedUrl }, "checking feed");
  const poll = await pollFeed(feedUrl, deps.parser, logger);
  if (poll.error !== null) {
    outcome.failed = true;
    return outcome;
  }

  ensureFeedRecord(store, feedUrl);

  if (poll.entries.length === 0) {
    logger.warn({ feedUrl }, "no entries found in feed");
    return outcome;
  }

  const identifiable = poll.entries.filter((entry) => entry.id !== "");
  if (identifiable.length < poll.entries.length) {
    logger.warn(
      { feedUrl, skipped: poll.entries.length - identifiable.length },
      "skipping entries with neither id nor link",
    );
  }

  const pending = selectNewEntries(store, feedUrl, identifiable);
  if (pending.length > 0) {
    logger.info({ feedUrl, newCount: pending.length }, "new entries found");
  }

  const destination = destinationFor(config);
  const sendOptions = { muted: config.telegram.muted };

  for (const entry of pending) {
    // a feed can list the same id twice
    if (hasDelivered(store, feedUrl, entry.id)) continue;

    logger.info(
      { feedUrl, entryId: entry.id, title: entry.title },
      "delivering entry",
    );
    const message = formatMessage(entry, poll.feedTitle, config.format);
    const result = await deliverMessage(
      deps.client,
      destination,
      message,
      sendOptions,
      logger,
    );

    if (!result.success) {
      outcome.deliveryFailures++;
      logger.error(
        { feedUrl, entryId: entry.id, error: result.error },
        "delivery failed, entry left for the next cycle",
      );
      continue;
    }

    recordDelivery(store, feedUrl, entry.id, config.history.maxItems);
    outcome.delivered++;
    if (!(await persistSafely(store, deps))) {
      outcome.persistFailures++;
    }

    await deps.sleep(config.monitor.deliveryDelayMs);
  }

  return outcome;
}

/**
 * Runs one poll cycle over a snapshot of the feed list.
 *
 * Feeds are handled one at a time. History is reloaded from disk at the start
 * and written after every successful delivery; a failed delivery is not
 * recorded, so the next cycle retries it. A failing feed never stops the
 * remaining ones.
 */
export async function runPollCycle(
  feedUrls: ReadonlyArray<string>,
  deps: CycleDeps,
): Promise<CycleSummary> {
  const { config, logger } = deps;
  const store = await loadHistory(config.paths.historyFile, logger);

  let feedsFailed = 0;
  let delivered = 0;
  let deliveryFailures = 0;
  let persistFailures = 0;

  if (feedUrls.length === 0) {
    logger.warn("no feeds to check, add feeds to the feed list");
  }

  for (const feedUrl of feedUrls) {
    try {
      const outcome = await processFeed(feedUrl, store, deps);
      if (outcome.failed) feedsFailed++;
      delivered += outcome.delivered;
      deliveryFailures += outcome.deliveryFailures;
      persistFailures += outcome.persistFailures;
    } catch (err) {
      feedsFailed++;
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ feedUrl, error: message }, "error checking feed");
    }
  }

  if (!(await persistSafely(store, deps))) {
    persistFailures++;
  }

  const summary: CycleSummary = {
    feedsChecked: feedUrls.length,
    feedsFailed,
    delivered,
    deliveryFailures,
    persistFailures,
  };
  logger.info(summary, "poll cycle complete");
  return summary;
}
