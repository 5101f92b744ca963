import fetch from 'node-fetch';
import * as cheerio from 'cheerio';
import { LinkSource } from './base';
import { RawLink } from '../types/job';
import { logger } from '../utils/logger';

export interface HtmlPageSourceOptions {
  timeoutMs: number;
  userAgent: string;
}

/**
 * Static HTML adapter
 * Fetches the served markup once and reads its anchors; scripts are not run
 */
export class HtmlPageSource implements LinkSource {
  readonly name = 'html-page';

  constructor(private readonly options: HtmlPageSourceOptions) {}

  async fetchLinks(pageUrl: string): Promise<RawLink[]> {
    logger.info(`Fetching page ${pageUrl}`);

    const response = await fetch(pageUrl, {
      headers: {
        'User-Agent': this.options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      },
      timeout: this.options.timeoutMs,
    });

    if (!response.ok) {
      throw new Error(`Page ${pageUrl} returned ${response.status}`);
    }

    const html = await response.text();
    const links = extractAnchors(html, pageUrl);

    logger.debug(`Extracted anchors`, { page: pageUrl, anchors: links.length });
    return links;
  }
}

/**
 * Reads every `a[href]` of a document, with its visible text
 */
export function extractAnchors(html: string, pageUrl: string): RawLink[] {
  const $ = cheerio.load(html);
  const links: RawLink[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href === undefined) return;

    links.push({
      href,
      anchorText: $(el).text().replace(/\s+/g, ' ').trim(),
      sourcePageUrl: pageUrl,
    });
  });

  return links;
}
