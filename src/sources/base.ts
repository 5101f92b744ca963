import { RawLink } from '../types/job';

/**
 * Supplies the anchors found on a career page
 */
export interface LinkSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Retrieves a page and returns every anchor on it
   * Throws when the page cannot be retrieved
   */
  fetchLinks(pageUrl: string): Promise<RawLink[]>;
}
