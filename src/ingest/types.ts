import type { CollectedPaper, ListingEntry } from '../agents/schemas';

export type { CollectedPaper, ListingEntry } from '../agents/schemas';

export interface PaperDetail {
  authors: string;
  abstract: string;
}

/**
 * Source of conference papers: a listing page of titles and links, and one
 * detail page per paper.
 */
export interface PageFetcher {
  fetchListing(url: string): Promise<ListingEntry[]>;
  fetchDetail(url: string): Promise<PaperDetail>;
}

export function toCollectedPaper(entry: ListingEntry, detail: PaperDetail): CollectedPaper {
  return {
    title: entry.title,
    url: entry.link,
    authors: detail.authors,
    abstract: detail.abstract,
  };
}
