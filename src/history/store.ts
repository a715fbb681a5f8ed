// pattern: Imperative Shell
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { Logger } from "pino";
import { z } from "zod";

/**
 * Delivered entry ids per feed URL, oldest first.
 */
export type HistoryStore = Record<string, Array<string>>;

export class HistoryPersistError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`failed to persist history to ${path}: ${message}`);
    this.name = "HistoryPersistError";
  }
}

const historyFileSchema = z.record(z.string(), z.array(z.string()));

function unique(ids: ReadonlyArray<string>): Array<string> {
  return [...new Set(ids)];
}

/**
 * Loads the history file. A missing, unreadable or malformed file yields an
 * empty store; this accepts a possible redelivery over refusing to run.
 */
export async function loadHistory(
  path: string,
  logger: Logger,
): Promise<HistoryStore> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ path, error: message }, "history unreadable, starting empty");
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ path, error: message }, "history is not valid JSON, starting empty");
    return {};
  }

  const result = historyFileSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn({ path }, "history has an unexpected shape, starting empty");
    return {};
  }

  const store: HistoryStore = {};
  for (const [feedUrl, ids] of Object.entries(result.data)) {
    store[feedUrl] = unique(ids);
  }
  return store;
}

export function ensureFeedRecord(
  store: HistoryStore,
  feedUrl: string,
): Array<string> {
  const existing = store[feedUrl];
  if (existing) return existing;
  const created: Array<string> = [];
  store[feedUrl] = created;
  return created;
}

export function hasDelivered(
  store: Readonly<HistoryStore>,
  feedUrl: string,
  entryId: string,
): boolean {
  return store[feedUrl]?.includes(entryId) ?? false;
}

/**
 * Appends `entryId` to the feed's record unless it is already there, then
 * evicts the oldest ids until at most `maxItems` remain.
 */
export function recordDelivery(
  store: HistoryStore,
  feedUrl: string,
  entryId: string,
  maxItems: number,
): void {
  const record = ensureFeedRecord(store, feedUrl);
  if (!record.includes(entryId)) {
    record.push(entryId);
  }
  if (record.length > maxItems) {
    record.splice(0, record.length - maxItems);
  }
}

/**
 * Replaces the history file with the full store. The JSON is written to a
 * sibling temp file and renamed into place, so readers see either the old
 * or the new content.
 *
 * @throws HistoryPersistError
 */
export async function persistHistory(
  path: string,
  store: Readonly<HistoryStore>,
): Promise<void> {
  const tempPath = join(
    dirname(path),
    `.${basename(path)}.${process.pid}.${Date.now()}.tmp`,
  );
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(store, null, 4)}\n`, "utf-8");
    await rename(tempPath, path);
  } catch (err) {
    await Promise.allSettled([rm(tempPath, { force: true })]);
    throw new HistoryPersistError(path, err);
  }
}
