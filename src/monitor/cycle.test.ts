import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import pino from "pino";
import { runPollCycle, selectNewEntries } from "./cycle";
import type { CycleDeps } from "./cycle";
import type { AppConfig } from "../config";
import {
  createFakeClient,
  createFakeParser,
  createTempDir,
  createTestConfig,
  item,
} from "../test-utils/fixtures";
import type { FakeClient } from "../test-utils/fixtures";
import type { FeedParser, ParsedFeed } from "../pipeline/poller";

const FEED = "https://example.com/rss";
const OTHER_FEED = "https://example.org/atom.xml";

function readHistory(config: AppConfig): unknown {
  return JSON.parse(readFileSync(config.paths.historyFile, "utf-8"));
}

function sentTexts(fake: FakeClient): Array<string> {
  return fake.sendText.mock.calls.map((call) => call[1]);
}

describe("selectNewEntries", () => {
  it("should drop delivered ids and reverse to oldest first", () => {
    const entries = ["e3", "e2", "e1"].map((id) => ({
      id,
      title: id,
      link: "",
      description: null,
      imageUrl: null,
    }));

    const selected = selectNewEntries({ [FEED]: ["e2"] }, FEED, entries);

    expect(selected.map((e) => e.id)).toEqual(["e1", "e3"]);
  });
});

describe("runPollCycle", () => {
  const logger = pino({ level: "silent" });
  let dir: { path: string; cleanup: () => void };
  let config: AppConfig;
  let fake: FakeClient;
  let sleep: Mock<CycleDeps["sleep"]>;

  function deps(parser: FeedParser, overrides: Partial<AppConfig> = {}): CycleDeps {
    return {
      config: { ...config, ...overrides },
      parser,
      client: fake.client,
      logger,
      sleep,
    };
  }

  const threeEntryFeed: ParsedFeed = {
    title: "Example News",
    items: [item("e3"), item("e2"), item("e1")],
  };

  beforeEach(() => {
    dir = createTempDir();
    config = createTestConfig(dir.path);
    fake = createFakeClient();
    sleep = vi.fn<CycleDeps["sleep"]>(async () => undefined);
  });

  afterEach(() => {
    dir.cleanup();
  });

  it("should deliver new entries oldest first and persist each id", async () => {
    const { parser } = createFakeParser({ [FEED]: threeEntryFeed });

    const summary = await runPollCycle([FEED], deps(parser));

    expect(sentTexts(fake)).toEqual([
      '• <a href="https://example.com/articles/e1">Article e1</a>\n<i>Example News</i>',
      '• <a href="https://example.com/articles/e2">Article e2</a>\n<i>Example News</i>',
      '• <a href="https://example.com/articles/e3">Article e3</a>\n<i>Example News</i>',
    ]);
    expect(readHistory(config)).toEqual({ [FEED]: ["e1", "e2", "e3"] });
    expect(summary).toEqual({
      feedsChecked: 1,
      feedsFailed: 0,
      delivered: 3,
      deliveryFailures: 0,
      persistFailures: 0,
    });
  });

  it("should deliver nothing on a second cycle over the same content", async () => {
    const { parser } = createFakeParser({ [FEED]: threeEntryFeed });

    await runPollCycle([FEED], deps(parser));
    fake.sendText.mockClear();
    const second = await runPollCycle([FEED], deps(parser));

    expect(fake.sendText).not.toHaveBeenCalled();
    expect(second.delivered).toBe(0);
    expect(readHistory(config)).toEqual({ [FEED]: ["e1", "e2", "e3"] });
  });

  it("should never redeliver an id already in history", async () => {
    writeFileSync(config.paths.historyFile, JSON.stringify({ [FEED]: ["e2"] }));
    const { parser } = createFakeParser({ [FEED]: threeEntryFeed });

    await runPollCycle([FEED], deps(parser));

    expect(sentTexts(fake).map((text) => text.match(/Article (e\d)/)?.[1])).toEqual([
      "e1",
      "e3",
    ]);
    expect(readHistory(config)).toEqual({ [FEED]: ["e2", "e1", "e3"] });
  });

  it("should persist after each delivery, before the next send", async () => {
    const { parser } = createFakeParser({ [FEED]: threeEntryFeed });
    const historyAtSend: Array<unknown> = [];
    fake.sendText.mockImplementation(async () => {
      try {
        historyAtSend.push(readHistory(config));
      } catch {
        historyAtSend.push(null);
      }
      return { success: true, messageId: historyAtSend.length };
    });

    await runPollCycle([FEED], deps(parser));

    expect(historyAtSend).toEqual([
      null,
      { [FEED]: ["e1"] },
      { [FEED]: ["e1", "e2"] },
    ]);
  });

  it("should pause after every successful delivery", async () => {
    const { parser } = createFakeParser({ [FEED]: threeEntryFeed });

    await runPollCycle([FEED], deps(parser, {
      monitor: { ...config.monitor, deliveryDelayMs: 2000 },
    }));

    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("should leave a failed delivery unrecorded for the next cycle", async () => {
    const { parser } = createFakeParser({ [FEED]: threeEntryFeed });
    fake.sendText.mockImplementation(async (_destination, text) =>
      text.includes("Article e2")
        ? { success: false, error: "telegram error 500: internal" }
        : { success: true, messageId: 1 },
    );

    const first = await runPollCycle([FEED], deps(parser));

    expect(first.delivered).toBe(2);
    expect(first.deliveryFailures).toBe(1);
    expect(readHistory(config)).toEqual({ [FEED]: ["e1", "e3"] });
    expect(sleep).toHaveBeenCalledTimes(2);

    fake.sendText.mockReset();
    fake.sendText.mockResolvedValue({ success: true, messageId: 2 });
    const second = await runPollCycle([FEED], deps(parser));

    expect(second.delivered).toBe(1);
    expect(sentTexts(fake)).toHaveLength(1);
    expect(sentTexts(fake)[0]).toContain("Article e2");
    expect(readHistory(config)).toEqual({ [FEED]: ["e1", "e3", "e2"] });
  });

  it("should record an entry whose image failed but whose text fallback succeeded", async () => {
    const { parser } = createFakeParser({
      [FEED]: {
        title: "Photos",
        items: [
          item("p1", {
            enclosure: { url: "https://unreachable.example.com/p1.jpg", type: "image/jpeg" },
          }),
        ],
      },
    });
    fake.sendImage.mockResolvedValue({ success: false, error: "failed to get HTTP URL content" });

    await runPollCycle([FEED], deps(parser));

    const caption = fake.sendImage.mock.calls[0]?.[2];
    expect(caption).toBe(
      '• <a href="https://example.com/articles/p1">Article p1</a>\n<i>Photos</i>',
    );
    expect(sentTexts(fake)).toEqual([caption]);
    expect(readHistory(config)).toEqual({ [FEED]: ["p1"] });
  });

  it("should keep delivering from a healthy feed when another fails", async () => {
    const { parser } = createFakeParser({
      [FEED]: new Error("getaddrinfo ENOTFOUND example.com"),
      [OTHER_FEED]: { title: "Other", items: [item("o1")] },
    });

    const summary = await runPollCycle([FEED, OTHER_FEED], deps(parser));

    expect(summary.feedsFailed).toBe(1);
    expect(summary.delivered).toBe(1);
    expect(readHistory(config)).toEqual({ [OTHER_FEED]: ["o1"] });
  });

  it("should survive an unexpected error inside one feed", async () => {
    const { parser } = createFakeParser({
      [FEED]: threeEntryFeed,
      [OTHER_FEED]: { title: "Other", items: [item("o1")] },
    });
    fake.sendText.mockImplementationOnce(async () => {
      throw new Error("client bug");
    });

    const summary = await runPollCycle([FEED, OTHER_FEED], deps(parser));

    expect(summary.feedsFailed).toBe(1);
    expect(readHistory(config)).toEqual({ [FEED]: [], [OTHER_FEED]: ["o1"] });
  });

  it("should keep history scoped per feed", async () => {
    const { parser } = createFakeParser({
      [FEED]: { title: "A", items: [item("shared")] },
      [OTHER_FEED]: { title: "B", items: [item("shared")] },
    });

    const summary = await runPollCycle([FEED, OTHER_FEED], deps(parser));

    expect(summary.delivered).toBe(2);
    expect(readHistory(config)).toEqual({
      [FEED]: ["shared"],
      [OTHER_FEED]: ["shared"],
    });
  });

  it("should keep only the most recent ids up to the history cap", async () => {
    const ids = ["n6", "n5", "n4", "n3", "n2", "n1"];
    const { parser } = createFakeParser({
      [FEED]: { title: "Busy", items: ids.map((id) => item(id)) },
    });

    await runPollCycle([FEED], deps(parser, { history: { maxItems: 4 } }));

    expect(fake.sendText).toHaveBeenCalledTimes(6);
    expect(readHistory(config)).toEqual({ [FEED]: ["n3", "n4", "n5", "n6"] });
  });

  it("should skip entries with neither id nor link", async () => {
    const { parser } = createFakeParser({
      [FEED]: {
        title: "Sparse",
        items: [{ title: "Nothing to key on" }, item("k1")],
      },
    });

    const summary = await runPollCycle([FEED], deps(parser));

    expect(summary.delivered).toBe(1);
    expect(readHistory(config)).toEqual({ [FEED]: ["k1"] });
  });

  it("should send a duplicated id only once", async () => {
    const { parser } = createFakeParser({
      [FEED]: { title: "Dupes", items: [item("d1"), item("d1")] },
    });

    await runPollCycle([FEED], deps(parser));

    expect(fake.sendText).toHaveBeenCalledTimes(1);
  });

  it("should create an empty record for a polled feed with no entries", async () => {
    const { parser } = createFakeParser({ [FEED]: { title: "Quiet", items: [] } });

    await runPollCycle([FEED], deps(parser));

    expect(readHistory(config)).toEqual({ [FEED]: [] });
  });

  it("should treat a corrupt history file as empty", async () => {
    writeFileSync(config.paths.historyFile, "<<<garbage");
    const { parser } = createFakeParser({ [FEED]: { title: "A", items: [item("c1")] } });

    const summary = await runPollCycle([FEED], deps(parser));

    expect(summary.delivered).toBe(1);
    expect(readHistory(config)).toEqual({ [FEED]: ["c1"] });
  });

  it("should count persist failures separately and keep going", async () => {
    mkdirSync(config.paths.historyFile);
    writeFileSync(`${config.paths.historyFile}/occupied`, "");
    const { parser } = createFakeParser({
      [FEED]: { title: "A", items: [item("x2"), item("x1")] },
    });

    const summary = await runPollCycle([FEED], deps(parser));

    expect(summary.delivered).toBe(2);
    expect(summary.deliveryFailures).toBe(0);
    expect(summary.persistFailures).toBe(3);
  });

  it("should pass destination and mute settings to the client", async () => {
    const { parser } = createFakeParser({ [FEED]: { title: "A", items: [item("m1")] } });

    await runPollCycle(
      [FEED],
      deps(parser, {
        telegram: { botToken: "test-token", chatId: "-100777", topicId: 3, muted: true },
      }),
    );

    expect(fake.sendText).toHaveBeenCalledWith(
      { chatId: "-100777", threadId: 3 },
      expect.any(String),
      { muted: true },
    );
  });

  it("should include descriptions when enabled", async () => {
    const { parser } = createFakeParser({
      [FEED]: {
        title: "A",
        items: [item("d1", { content: "<p>Details &amp; more</p>" })],
      },
    });

    await runPollCycle(
      [FEED],
      deps(parser, { format: { includeDescription: true, maxDescriptionLength: 800 } }),
    );

    expect(sentTexts(fake)[0]).toBe(
      '• <a href="https://example.com/articles/d1">Article d1</a>\n<i>A</i>\n\nDetails &amp; more',
    );
  });

  it("should persist an empty store when there are no feeds", async () => {
    const { parser, parseURL } = createFakeParser({});

    const summary = await runPollCycle([], deps(parser));

    expect(parseURL).not.toHaveBeenCalled();
    expect(summary.feedsChecked).toBe(0);
    expect(readHistory(config)).toEqual({});
  });
});
