import Parser from "rss-parser";
import type { Logger } from "pino";
import { z } from "zod";
import { normalizeEntry } from "./normalizer";
import type { MediaAttachment, PollResult, RawFeedEntry } from "./types";

type CustomItem = {
  id?: string;
  mediaContent?: unknown;
  mediaThumbnail?: unknown;
  enclosures?: unknown;
  contentEncoded?: string;
};

export type ParsedItem = Parser.Item & CustomItem;

export type ParsedFeed = {
  readonly title?: string;
  readonly items: ReadonlyArray<ParsedItem>;
};

/**
 * The slice of rss-parser the poller relies on.
 */
export type FeedParser = {
  parseURL(feedUrl: string): Promise<ParsedFeed>;
};

const xmlMediaNodeSchema = z.object({
  $: z.object({
    url: z.string().optional(),
    type: z.string().optional(),
    medium: z.string().optional(),
  }),
});

export type RssParser = Parser<Record<string, unknown>, CustomItem>;

/**
 * Creates an rss-parser instance that keeps the media namespaces and
 * `content:encoded` around, and gives up on a feed after `timeoutMs`.
 */
export function createParser(timeoutMs: number): RssParser {
  return new Parser<Record<string, unknown>, CustomItem>({
    timeout: timeoutMs,
    headers: {
      "User-Agent": "feed-relay/0.1 (RSS to Telegram)",
      Accept:
        "application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8",
    },
    customFields: {
      item: [
        ["media:content", "mediaContent", { keepArray: true }],
        ["media:thumbnail", "mediaThumbnail", { keepArray: true }],
        ["enclosure", "enclosures", { keepArray: true }],
        ["content:encoded", "contentEncoded"],
      ],
    },
  });
}

function readAttachments(nodes: unknown): Array<MediaAttachment> {
  if (!Array.isArray(nodes)) return [];
  return nodes.flatMap((node: unknown) => {
    const parsed = xmlMediaNodeSchema.safeParse(node);
    return parsed.success ? [parsed.data.$] : [];
  });
}

/**
 * Maps one parsed item onto the raw entry shape. rss-parser puts an RSS
 * `<description>` and an Atom `<content>` both in `content`; an Atom entry's
 * `<summary>` wins as its description.
 */
export function toRawEntry(item: ParsedItem): RawFeedEntry {
  const enclosures = readAttachments(item.enclosures);
  if (enclosures.length === 0 && item.enclosure) {
    enclosures.push({ url: item.enclosure.url, type: item.enclosure.type });
  }

  const contentBlocks = [item.contentEncoded, item.content].filter(
    (block): block is string => typeof block === "string" && block.length > 0,
  );

  return {
    id: item.guid ?? item.id ?? null,
    link: item.link ?? null,
    title: item.title ?? null,
    description: item.summary ?? item.content ?? null,
    summary: item.summary ?? null,
    mediaContent: readAttachments(item.mediaContent),
    enclosures,
    mediaThumbnail: readAttachments(item.mediaThumbnail),
    contentBlocks,
  };
}

/**
 * Fetches and parses one feed. Never throws: network, HTTP, XML and timeout
 * failures come back in `error` with no entries.
 */
export async function pollFeed(
  feedUrl: string,
  parser: FeedParser,
  logger: Logger,
): Promise<PollResult> {
  try {
    const feed = await parser.parseURL(feedUrl);
    const entries = feed.items.map((item) => normalizeEntry(toRawEntry(item)));
    const feedTitle = feed.title?.trim() || feedUrl;

    logger.info(
      { feedUrl, entryCount: entries.length },
      "feed polled successfully",
    );
    return { feedUrl, feedTitle, entries, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedUrl, error: message }, "feed poll failed");
    return { feedUrl, feedTitle: feedUrl, entries: [], error: message };
  }
}
