import { LinkSource } from './base';
import { HtmlPageSource } from './html-page';
import { Config } from '../config';

/**
 * Factory function to create the page link source from configuration
 */
export function createLinkSource(config: Config): LinkSource {
  return new HtmlPageSource({
    timeoutMs: config.pageFetchTimeoutMs,
    userAgent: config.userAgent,
  });
}
