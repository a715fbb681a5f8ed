// pattern: functional-core
import * as cheerio from "cheerio";
import type { MediaAttachment, NormalizedEntry, RawFeedEntry } from "./types";

export const UNTITLED = "No title";

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function isImageType(media: MediaAttachment): boolean {
  return (media.type ?? "").toLowerCase().startsWith("image/");
}

function firstImageSource(markup: string | null | undefined): string | null {
  if (!markup || !/<img/i.test(markup)) return null;
  const $ = cheerio.load(markup, null, false);
  const sources = $("img")
    .map((_, el) => $(el).attr("src") ?? "")
    .get();
  return sources.map((src) => nonEmpty(src)).find((src) => src !== null) ?? null;
}

/**
 * Converts HTML markup to a single line of plain text: tags removed,
 * entities decoded, whitespace runs collapsed.
 */
export function htmlToText(markup: string): string {
  const $ = cheerio.load(markup, null, false);
  return $.root().text().split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Picks the most representative image for an entry. Structured media fields
 * win over images scraped out of markup.
 */
export function extractImageUrl(raw: RawFeedEntry): string | null {
  for (const media of raw.mediaContent ?? []) {
    const url = nonEmpty(media.url);
    if (url && (isImageType(media) || media.medium === "image")) return url;
  }

  for (const enclosure of raw.enclosures ?? []) {
    const url = nonEmpty(enclosure.url);
    if (url && isImageType(enclosure)) return url;
  }

  for (const thumbnail of raw.mediaThumbnail ?? []) {
    const url = nonEmpty(thumbnail.url);
    if (url) return url;
  }

  const fromDescription = firstImageSource(
    nonEmpty(raw.description) ?? raw.summary,
  );
  if (fromDescription) return fromDescription;

  for (const block of raw.contentBlocks ?? []) {
    const fromContent = firstImageSource(block);
    if (fromContent) return fromContent;
  }

  return null;
}

/**
 * Produces the entry record the rest of the pipeline works with. The id falls
 * back to the link, then to an empty string for entries that carry neither.
 */
export function normalizeEntry(raw: RawFeedEntry): NormalizedEntry {
  const link = nonEmpty(raw.link) ?? "";
  return {
    id: nonEmpty(raw.id) ?? link,
    title: nonEmpty(raw.title) ?? UNTITLED,
    link,
    description: nonEmpty(raw.description) ?? nonEmpty(raw.summary),
    imageUrl: extractImageUrl(raw),
  };
}
