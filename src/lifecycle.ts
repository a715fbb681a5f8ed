// pattern: Imperative Shell
import type { Logger } from "pino";
import type { FeedMonitor } from "./scheduler";

export type ShutdownDeps = {
  readonly monitors: ReadonlyArray<FeedMonitor>;
  readonly logger: Logger;
  /** Defaults to `process.exit`. */
  readonly exit?: (code: number) => void;
};

/**
 * On the first SIGTERM or SIGINT, stops every feed monitor and waits for
 * the poll cycle each one may be in the middle of, so the history file is
 * not cut off mid-write. Later signals are ignored.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const { logger } = deps;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let stopping = false;

  const stopMonitors = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;

    logger.info({ signal }, "stopping feed monitors");

    const pending: Array<Promise<void>> = [];
    for (const monitor of deps.monitors) {
      try {
        monitor.stop();
        pending.push(monitor.done);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "feed monitor failed to stop");
      }
    }

    const settled = await Promise.allSettled(pending);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        const reason: unknown = outcome.reason;
        logger.error(
          { error: reason instanceof Error ? reason.message : String(reason) },
          "feed monitor ended with an error",
        );
      }
    }

    logger.info({ signal }, "feed monitors stopped, exiting");
    exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    stopMonitors(signal).catch((err: unknown) => {
      logger.fatal(
        { error: err instanceof Error ? err.message : String(err) },
        "shutdown failed",
      );
      exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}
