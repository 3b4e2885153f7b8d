import { UnsupportedConferenceError } from '../../agents/errors';
import { getFetchConfig } from '../../config/fetchConfig';
import { defaultFetch, type FetchLike } from '../../utils/http';
import { createConsoleLogger, type Logger } from '../../utils/logger';
import { toError } from '../../utils/validation';
import type { ListingEntry, PageFetcher, PaperDetail } from '../types';
import { CVF_LIST_SELECTOR, parseCvfDetailHtml, parseListingHtml } from './parse';

const defaultLogger = createConsoleLogger('Fetcher');

const CVF_CONFERENCES = ['cvpr', 'iccv'] as const;

export const FETCH_ERROR_DETAIL: PaperDetail = { authors: 'Error', abstract: 'Error' };

export function cvfListingUrl(conference: string, year: string): string {
  const normalized = conference.toLowerCase();
  if (!CVF_CONFERENCES.some((c) => c === normalized)) {
    throw new UnsupportedConferenceError(conference);
  }
  return `https://openaccess.thecvf.com/${normalized.toUpperCase()}${year}?day=all`;
}

export interface CvfPageFetcherOptions {
  userAgent?: string;
  listSelector?: string;
  logger?: Logger;
  fetchImpl?: FetchLike;
}

/**
 * Page fetcher for CVF Open Access (openaccess.thecvf.com). Failures are
 * logged and turned into an empty listing or an `Error` detail, so one bad
 * page does not stop a collection run.
 */
export class CvfPageFetcher implements PageFetcher {
  private readonly userAgent: string;
  private readonly listSelector: string;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;

  constructor(options: CvfPageFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? getFetchConfig().userAgent;
    this.listSelector = options.listSelector ?? CVF_LIST_SELECTOR;
    this.logger = options.logger ?? defaultLogger;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  private async getHtml(url: string): Promise<string> {
    const res = await this.fetchImpl(url, { headers: { 'User-Agent': this.userAgent } });
    if (!res.ok) {
      throw new Error(`GET ${url} failed: ${res.status} ${res.statusText}`);
    }
    return res.text();
  }

  async fetchListing(url: string): Promise<ListingEntry[]> {
    this.logger.info(`Accessing conference papers list page: ${url}`);
    try {
      const html = await this.getHtml(url);
      const entries = parseListingHtml(html, url, this.listSelector);
      this.logger.info(`Fetched ${entries.length} papers in total (unfiltered)`);
      return entries;
    } catch (error) {
      this.logger.error('Failed to fetch conference papers', { url, error: toError(error).message });
      return [];
    }
  }

  async fetchDetail(url: string): Promise<PaperDetail> {
    if (!url.toLowerCase().includes('thecvf')) {
      this.logger.error(`Unsupported paper page: ${url}`);
      return { ...FETCH_ERROR_DETAIL };
    }

    try {
      const html = await this.getHtml(url);
      return parseCvfDetailHtml(html);
    } catch (error) {
      this.logger.error('Failed to fetch paper details', { url, error: toError(error).message });
      return { ...FETCH_ERROR_DETAIL };
    }
  }
}
