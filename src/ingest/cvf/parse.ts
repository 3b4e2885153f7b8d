import * as cheerio from 'cheerio';
import type { ListingEntry, PaperDetail } from '../types';

export const CVF_LIST_SELECTOR = 'dt.ptitle a';

export const AUTHORS_NOT_FOUND = 'Authors not found';
export const ABSTRACT_NOT_FOUND = 'Abstract not found';

/**
 * Reads title links off a listing page. Relative links are resolved against
 * `pageUrl`; anchors without text or href are skipped.
 */
export function parseListingHtml(
  html: string,
  pageUrl: string,
  selector: string = CVF_LIST_SELECTOR
): ListingEntry[] {
  const $ = cheerio.load(html);
  const entries: ListingEntry[] = [];

  $(selector).each((_, el) => {
    const title = $(el).text().trim().replace(/\n/g, ' ');
    const href = $(el).attr('href');
    if (title && href) {
      entries.push({ title, link: new URL(href, pageUrl).toString() });
    }
  });

  return entries;
}

export function parseCvfDetailHtml(html: string): PaperDetail {
  const $ = cheerio.load(html);

  const authorsEl = $('#authors').first();
  const authors = authorsEl.length
    ? authorsEl.text().trim().replace(/;/g, ',').replace(/\n/g, ' ')
    : AUTHORS_NOT_FOUND;

  const abstractEl = $('#abstract').first();
  const abstract = abstractEl.length ? abstractEl.text().trim() : ABSTRACT_NOT_FOUND;

  return { authors, abstract };
}
