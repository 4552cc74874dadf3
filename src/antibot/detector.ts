import type { ContentPattern, CrawlRules } from '../rules/crawl-rules.js';

/**
 * Page classifier
 *
 * Documentation hosts often answer 200 for pages that are really an anti-automation
 * interstitial or a "not found" placeholder. These checks run on the full rendered
 * markup, independent of the transport status.
 */

/**
 * Verdict for one fetched page. A bot challenge outranks a soft 404.
 */
export type PageVerdict =
  | { kind: 'ok' }
  | { kind: 'bot_challenge'; evidence: string[] }
  | { kind: 'soft_not_found'; evidence: string[] };

/**
 * Test if markup matches a pattern (regex or substring), case-insensitively.
 */
function matchesPattern(lowerHtml: string, pattern: ContentPattern): boolean {
  if (pattern.textRegex) {
    try {
      return new RegExp(pattern.text, 'i').test(lowerHtml);
    } catch {
      return false;
    }
  }
  return lowerHtml.includes(pattern.text.toLowerCase());
}

function collectEvidence(html: string, patterns: ContentPattern[]): string[] {
  const lowerHtml = html.toLowerCase();
  const evidence: string[] = [];

  for (const pattern of patterns) {
    if (matchesPattern(lowerHtml, pattern)) {
      evidence.push(`content: ${pattern.description || pattern.text}`);
    }
  }

  return evidence;
}

/**
 * Detect an automation challenge (script-disabled notice, human verification)
 *
 * @returns Evidence for every matching pattern; empty when the page looks normal
 *
 * @example
 * ```typescript
 * detectBotChallenge('<noscript>JavaScript is disabled</noscript>', rules.botChallengePatterns);
 * // ['content: Script-disabled interstitial']
 * ```
 */
export function detectBotChallenge(html: string, patterns: ContentPattern[]): string[] {
  return collectEvidence(html, patterns);
}

/**
 * Detect a soft 404: any configured "not found" phrase anywhere in the markup.
 */
export function detectSoftNotFound(html: string, patterns: ContentPattern[]): string[] {
  return collectEvidence(html, patterns);
}

export function classifyPage(html: string, rules: CrawlRules): PageVerdict {
  const challenge = detectBotChallenge(html, rules.botChallengePatterns);
  if (challenge.length > 0) {
    return { kind: 'bot_challenge', evidence: challenge };
  }

  const notFound = detectSoftNotFound(html, rules.softNotFoundPhrases);
  if (notFound.length > 0) {
    return { kind: 'soft_not_found', evidence: notFound };
  }

  return { kind: 'ok' };
}

/**
 * Format a verdict for logging
 */
export function formatVerdict(verdict: PageVerdict): string {
  if (verdict.kind === 'ok') {
    return 'No error or challenge content detected';
  }
  const label = verdict.kind === 'bot_challenge' ? 'Bot challenge' : 'Soft 404';
  return `${label} [${verdict.evidence.join(', ')}]`;
}
