import { NormalizedUrl } from '../types/job';
import { stripTrailingSlash } from '../utils/url';

/**
 * Everything a posting rule may look at
 */
export interface PostingContext {
  url: NormalizedUrl;
  sourcePageUrl: string;
  lowerUrl: string;
  lowerSourceUrl: string;
  isWorkdayJob: boolean;
  isTaleoOpportunity: boolean;
}

export type PostingRuleName =
  | 'self-link'
  | 'advisory-page'
  | 'negative-signal'
  | 'vendor-detail'
  | 'posting-identifier'
  | 'fallback';

export interface PostingRule {
  name: PostingRuleName;
  matches(ctx: PostingContext): boolean;
  verdict: 'accept' | 'reject';
}

export interface PostingDecision {
  posting: boolean;
  rule: PostingRuleName;
}

/**
 * Substrings that mark listing, navigation, auth, informational,
 * document and social pages
 */
export const NEGATIVE_SIGNALS: readonly string[] = [
  '/careers',
  '/jobs',
  '/jobboard',
  '/search',
  '/opportunities',
  'candidate/jobboard',
  'login',
  'signin',
  'register',
  'event',
  'about',
  'contact',
  'privacy',
  'terms',
  '.pdf',
  '.jpg',
  '.png',
  'facebook.com',
  'linkedin.com',
  'twitter.com',
  'instagram.com',
  'googleusercontent.com',
];

// Negative signals that vendor detail pages carry in their own paths
const WORKDAY_EXCEPTIONS: readonly string[] = ['/jobs', '/careers'];
const TALEO_EXCEPTIONS: readonly string[] = ['/jobs', '/careers'];

const POSTING_ID_PATTERN = /jobid=|job_id=|requisitionid=|postingid=|\/\d{5,}(?=\/|$)/i;

function isExcused(ctx: PostingContext, signal: string): boolean {
  return (
    (ctx.isWorkdayJob && WORKDAY_EXCEPTIONS.includes(signal)) ||
    (ctx.isTaleoOpportunity && TALEO_EXCEPTIONS.includes(signal))
  );
}

/**
 * Ordered rules, first match decides
 */
export const POSTING_RULES: readonly PostingRule[] = [
  {
    name: 'self-link',
    verdict: 'reject',
    matches: ctx => stripTrailingSlash(ctx.lowerUrl) === stripTrailingSlash(ctx.lowerSourceUrl),
  },
  {
    name: 'advisory-page',
    verdict: 'reject',
    matches: ctx =>
      (ctx.lowerUrl.endsWith('/adv') || ctx.lowerUrl.endsWith('/adv/')) &&
      ctx.url.split('/').length < ctx.sourcePageUrl.split('/').length + 3,
  },
  {
    name: 'negative-signal',
    verdict: 'reject',
    matches: ctx =>
      NEGATIVE_SIGNALS.some(signal => ctx.lowerUrl.includes(signal) && !isExcused(ctx, signal)),
  },
  {
    name: 'vendor-detail',
    verdict: 'accept',
    matches: ctx => ctx.isWorkdayJob || ctx.isTaleoOpportunity,
  },
  {
    name: 'posting-identifier',
    verdict: 'accept',
    matches: ctx => POSTING_ID_PATTERN.test(ctx.lowerUrl),
  },
  {
    name: 'fallback',
    verdict: 'reject',
    matches: () => true,
  },
];

export function buildPostingContext(url: NormalizedUrl, sourcePageUrl: string): PostingContext {
  const lowerUrl = url.toLowerCase();
  return {
    url,
    sourcePageUrl,
    lowerUrl,
    lowerSourceUrl: sourcePageUrl.toLowerCase(),
    isWorkdayJob: lowerUrl.includes('myworkdayjobs.com') && lowerUrl.includes('/job/'),
    isTaleoOpportunity: lowerUrl.includes('.tal.net') && lowerUrl.includes('/opp/'),
  };
}

export function evaluatePosting(
  url: NormalizedUrl,
  sourcePageUrl: string,
  rules: readonly PostingRule[] = POSTING_RULES
): PostingDecision {
  const ctx = buildPostingContext(url, sourcePageUrl);
  for (const rule of rules) {
    if (rule.matches(ctx)) {
      return { posting: rule.verdict === 'accept', rule: rule.name };
    }
  }
  return { posting: false, rule: 'fallback' };
}

/**
 * Checks if a URL structure resembles a single job posting
 */
export function isPosting(url: NormalizedUrl, sourcePageUrl: string): boolean {
  return evaluatePosting(url, sourcePageUrl).posting;
}
