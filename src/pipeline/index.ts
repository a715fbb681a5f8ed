export { createParser, pollFeed } from "./poller";
export { loadFeedList } from "./feed-list";
export type { FeedParser } from "./poller";
export type { NormalizedEntry } from "./types";
