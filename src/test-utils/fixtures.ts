import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { Mock } from "vitest";
import type { AppConfig } from "../config";
import type { DeliveryClient } from "../delivery/telegram";
import type { FeedParser, ParsedFeed, ParsedItem } from "../pipeline/poller";

/**
 * Creates a complete AppConfig with test-friendly values: no delivery delay,
 * history and feed list inside `dataDir`.
 */
export function createTestConfig(
  dataDir: string,
  overrides: Partial<AppConfig> = {},
): AppConfig {
  return {
    telegram: {
      botToken: "test-token",
      chatId: "-100123",
      muted: false,
    },
    monitor: {
      checkIntervalSeconds: 3600,
      deliveryDelayMs: 0,
      feedListReload: "cycle",
    },
    history: { maxItems: 200 },
    format: { includeDescription: false, maxDescriptionLength: 800 },
    paths: {
      feedsFile: join(dataDir, "feeds.txt"),
      historyFile: join(dataDir, "sent_items.json"),
    },
    network: { fetchTimeoutMs: 1000, deliveryTimeoutMs: 1000 },
    ...overrides,
  };
}

export function createTempDir(): { readonly path: string; readonly cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), "feed-relay-test-"));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export type FakeClient = {
  readonly client: DeliveryClient;
  readonly sendText: Mock<DeliveryClient["sendText"]>;
  readonly sendImage: Mock<DeliveryClient["sendImage"]>;
};

/**
 * A delivery client whose sends succeed unless told otherwise.
 */
export function createFakeClient(): FakeClient {
  let nextId = 1;
  const sendText = vi.fn<DeliveryClient["sendText"]>(async () => ({
    success: true,
    messageId: nextId++,
  }));
  const sendImage = vi.fn<DeliveryClient["sendImage"]>(async () => ({
    success: true,
    messageId: nextId++,
  }));
  return { client: { sendText, sendImage }, sendText, sendImage };
}

export type FakeParser = {
  readonly parser: FeedParser;
  readonly parseURL: Mock<FeedParser["parseURL"]>;
};

/**
 * A parser serving canned feeds by URL. Feeds mapped to an Error reject with
 * it; unknown URLs reject with a 404-style error.
 */
export function createFakeParser(
  feeds: Record<string, ParsedFeed | Error>,
): FakeParser {
  const parseURL = vi.fn<FeedParser["parseURL"]>(async (feedUrl: string) => {
    const feed = feeds[feedUrl];
    if (feed === undefined) throw new Error("Status code 404");
    if (feed instanceof Error) throw feed;
    return feed;
  });
  return { parser: { parseURL }, parseURL };
}

export function item(guid: string, overrides: Partial<ParsedItem> = {}): ParsedItem {
  return {
    guid,
    title: `Article ${guid}`,
    link: `https://example.com/articles/${guid}`,
    ...overrides,
  };
}
