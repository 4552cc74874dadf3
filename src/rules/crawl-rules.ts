/**
 * Lookup tables that steer scope filtering and page classification.
 *
 * The bundled tables live in config/crawl-rules.json so a new documentation
 * site can be supported by editing data rather than code.
 */
import { z } from 'zod';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

/** A phrase or regular expression searched for in page markup. */
export interface ContentPattern {
  text: string;
  /** Treat `text` as a regular expression (always case-insensitive) */
  textRegex?: boolean;
  description?: string;
}

export interface CrawlRules {
  /** Path suffixes of static assets and downloads, e.g. `.css` */
  excludedExtensions: string[];
  /** Path fragments of sections that are never documentation, e.g. `/blog/` */
  excludedPathPatterns: string[];
  /** Phrases of pages that report success but say the content is missing */
  softNotFoundPhrases: ContentPattern[];
  /** Phrases of anti-automation interstitials */
  botChallengePatterns: ContentPattern[];
}

// --- Zod validation schema ---

function compiles(pattern: ContentPattern): boolean {
  if (!pattern.textRegex) return true;
  try {
    new RegExp(pattern.text, 'i');
    return true;
  } catch {
    return false;
  }
}

export const ContentPatternSchema = z
  .object({
    text: z.string().min(1),
    textRegex: z.boolean().optional(),
    description: z.string().optional(),
  })
  .refine(compiles, { message: 'textRegex pattern is not a valid regular expression' });

export const CrawlRulesSchema = z.object({
  excludedExtensions: z.array(z.string().min(1)),
  excludedPathPatterns: z.array(z.string().min(1)),
  softNotFoundPhrases: z.array(ContentPatternSchema),
  botChallengePatterns: z.array(ContentPatternSchema),
});

export const DEFAULT_RULES_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'crawl-rules.json'
);

/**
 * Validate raw rules. Extensions and path patterns are lower-cased because
 * path matching is case-insensitive.
 */
export function parseCrawlRules(raw: unknown): CrawlRules {
  const result = CrawlRulesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid crawl rules:\n${issues.join('\n')}`);
  }

  const rules = result.data;
  return {
    ...rules,
    excludedExtensions: rules.excludedExtensions.map((ext) => ext.toLowerCase()),
    excludedPathPatterns: rules.excludedPathPatterns.map((p) => p.toLowerCase()),
  };
}

/** Read and validate a rules file. Throws when it is missing, not JSON, or invalid. */
export function loadCrawlRules(path: string = DEFAULT_RULES_PATH): CrawlRules {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read crawl rules from ${path}: ${reason}`);
  }
  return parseCrawlRules(raw);
}

let defaultRules: CrawlRules | null = null;

/** Bundled rules, read once per process. */
export function getDefaultCrawlRules(): CrawlRules {
  if (!defaultRules) {
    defaultRules = loadCrawlRules();
  }
  return defaultRules;
}
