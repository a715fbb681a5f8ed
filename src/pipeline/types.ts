export type MediaAttachment = {
  readonly url?: string | null;
  readonly type?: string | null;
  readonly medium?: string | null;
};

/**
 * Structural view of one parsed feed entry. Every field is optional because
 * RSS and Atom producers fill in very different subsets.
 */
export type RawFeedEntry = {
  readonly id?: string | null;
  readonly link?: string | null;
  readonly title?: string | null;
  readonly description?: string | null;
  readonly summary?: string | null;
  readonly mediaContent?: ReadonlyArray<MediaAttachment>;
  readonly enclosures?: ReadonlyArray<MediaAttachment>;
  readonly mediaThumbnail?: ReadonlyArray<MediaAttachment>;
  readonly contentBlocks?: ReadonlyArray<string>;
};

export type NormalizedEntry = {
  readonly id: string;
  readonly title: string;
  readonly link: string;
  readonly description: string | null;
  readonly imageUrl: string | null;
};

export type PollResult = {
  readonly feedUrl: string;
  readonly feedTitle: string;
  readonly entries: ReadonlyArray<NormalizedEntry>;
  readonly error: string | null;
};
