// pattern: Imperative Shell
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";

export const FEED_LIST_HEADER = "# Add your RSS feeds here, one per line\n";

/**
 * Extracts feed URLs from the feed list text. Blank lines and lines starting
 * with `#` are ignored.
 */
export function parseFeedList(text: string): Array<string> {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Reads the feed list. A missing file is created with a comment header and
 * yields no feeds; any other read error is logged and yields no feeds.
 */
export async function loadFeedList(
  path: string,
  logger: Logger,
): Promise<Array<string>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.warn({ path }, "feed list not found, creating an empty one");
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, FEED_LIST_HEADER, "utf-8");
      } catch (createErr) {
        const message =
          createErr instanceof Error ? createErr.message : String(createErr);
        logger.error({ path, error: message }, "could not create feed list");
      }
      return [];
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ path, error: message }, "error loading feed list");
    return [];
  }

  const feeds = parseFeedList(text);
  logger.info({ path, feedCount: feeds.length }, "feed list loaded");
  return feeds;
}
