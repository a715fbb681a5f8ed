import type { CycleDeps } from "./monitor/cycle";
import { runPollCycle } from "./monitor/cycle";

export type FeedMonitor = {
  readonly stop: () => void;
  /** Settles once the loop has exited after `stop()`. */
  readonly done: Promise<void>;
};

export type MonitorDeps = CycleDeps & {
  readonly loadFeeds: () => Promise<ReadonlyArray<string>>;
};

/**
 * Starts the polling loop: run a cycle, sleep for the check interval, repeat.
 *
 * The first cycle starts immediately. The feed list is read before every
 * cycle, or only before the first one when `monitor.feedListReload` is
 * `"startup"`. `stop()` cancels the pending sleep; a cycle already running
 * is allowed to finish, and `done` settles after it.
 *
 * @param deps - Cycle dependencies plus the feed list loader
 * @returns A FeedMonitor with a stop() method to halt polling
 */
export function createFeedMonitor(deps: MonitorDeps): FeedMonitor {
  const { config, logger } = deps;
  const intervalMs = config.monitor.checkIntervalSeconds * 1000;

  let stopped = false;
  let timer: NodeJS.Timeout | null = null;
  let wake: (() => void) | null = null;
  let startupFeeds: ReadonlyArray<string> | null = null;

  const resolveFeeds = async (): Promise<ReadonlyArray<string>> => {
    if (config.monitor.feedListReload === "cycle") {
      return deps.loadFeeds();
    }
    startupFeeds ??= await deps.loadFeeds();
    return startupFeeds;
  };

  const waitForNextCycle = (): Promise<void> =>
    new Promise<void>((resolve) => {
      wake = resolve;
      timer = setTimeout(resolve, intervalMs);
    });

  const run = async (): Promise<void> => {
    while (!stopped) {
      logger.info("poll cycle starting");
      try {
        const feedUrls = await resolveFeeds();
        await runPollCycle(feedUrls, deps);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "poll cycle failed unexpectedly");
      }

      if (stopped) break;
      logger.info(
        { nextCheckInSeconds: config.monitor.checkIntervalSeconds },
        "next check scheduled",
      );
      await waitForNextCycle();
    }
    logger.info("feed monitor stopped");
  };

  const done = run();

  return {
    stop: () => {
      stopped = true;
      if (timer) clearTimeout(timer);
      wake?.();
    },
    done,
  };
}
