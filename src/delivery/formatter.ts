// pattern: functional-core
import { htmlToText } from "../pipeline/normalizer";
import type { NormalizedEntry } from "../pipeline/types";

/** Telegram's ceiling for a text message. */
export const MESSAGE_LIMIT = 4096;
/** Telegram's ceiling for a photo caption. */
export const CAPTION_LIMIT = 1024;

const ELLIPSIS = "...";

export type FormatOptions = {
  readonly includeDescription: boolean;
  readonly maxDescriptionLength: number;
};

export type DeliveryMessage = {
  readonly text: string;
  readonly imageUrl: string | null;
};

/**
 * Escapes the characters Telegram's HTML parse mode treats as markup.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** First `end` UTF-16 units of `text`, never splitting a surrogate pair. */
function sliceWhole(text: string, end: number): string {
  const cut = text.slice(0, Math.max(0, end));
  return isHighSurrogate(cut.charCodeAt(cut.length - 1)) ? cut.slice(0, -1) : cut;
}

/**
 * Cuts `text` to at most `maxLength` characters, the last three being an
 * ellipsis when anything was cut.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= ELLIPSIS.length) return sliceWhole(text, maxLength);
  return sliceWhole(text, maxLength - ELLIPSIS.length) + ELLIPSIS;
}

function render(
  link: string,
  title: string,
  feedTitle: string,
  description: string,
): string {
  const heading = link
    ? `• <a href="${escapeHtml(link)}">${escapeHtml(title)}</a>`
    : `• ${escapeHtml(title)}`;
  let text = `${heading}\n<i>${escapeHtml(feedTitle)}</i>`;
  if (description) {
    text += `\n\n${escapeHtml(description)}`;
  }
  return text;
}

/**
 * Largest budget in [0, max] for which `fits` holds, or 0. Assumes the
 * rendered length grows with the budget.
 */
function largestFitting(max: number, fits: (budget: number) => boolean): number {
  let low = 0;
  let high = max;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (fits(mid)) low = mid;
    else high = mid - 1;
  }
  return low;
}

/**
 * Builds the notification for one entry.
 *
 * Untrusted text is escaped after truncation. When the result would exceed
 * the ceiling (caption ceiling if the entry has an image) the description
 * shrinks first, then the title, then the feed title.
 */
export function formatMessage(
  entry: NormalizedEntry,
  feedTitle: string,
  options: FormatOptions,
): DeliveryMessage {
  const limit = entry.imageUrl ? CAPTION_LIMIT : MESSAGE_LIMIT;
  const description =
    options.includeDescription && entry.description
      ? htmlToText(entry.description)
      : "";

  const budgets = {
    description: Math.min(options.maxDescriptionLength, description.length),
    title: entry.title.length,
    feedTitle: feedTitle.length,
  };

  // A description cut down to the ellipsis or less says nothing; drop it.
  const descriptionWithin = (budget: number): string =>
    budget >= description.length || budget > ELLIPSIS.length
      ? truncateText(description, budget)
      : "";

  const build = (b: typeof budgets): string =>
    render(
      entry.link,
      truncateText(entry.title, b.title),
      truncateText(feedTitle, b.feedTitle),
      descriptionWithin(b.description),
    );

  for (const key of ["description", "title", "feedTitle"] as const) {
    if (build(budgets).length <= limit) break;
    budgets[key] = largestFitting(
      budgets[key],
      (budget) => build({ ...budgets, [key]: budget }).length <= limit,
    );
  }

  return { text: build(budgets), imageUrl: entry.imageUrl };
}
