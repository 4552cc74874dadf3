#!/usr/bin/env node
/**
 * CLI entry point for docsite-to-pdf
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { BrowserPdfConverter } from './convert/pdf-converter.js';
import { PdfMerger } from './convert/pdf-merger.js';
import { BrowserFetcher } from './fetch/browser-fetcher.js';
import { enableVerboseLogging } from './logger.js';
import { runPipeline } from './pipeline.js';
import type { PipelineCollaborators } from './pipeline.js';
import { getDefaultCrawlRules, loadCrawlRules } from './rules/crawl-rules.js';
import type { CrawlRules } from './rules/crawl-rules.js';

const DEFAULT_OUTPUT = 'documentation.pdf';
const DEFAULT_MAX_DEPTH = 10;
const DEFAULT_DELAY_SECONDS = 2;
const DEFAULT_TIMEOUT_SECONDS = 30;

const PackageJsonSchema = z.object({ version: z.string().optional() });

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return (pkg.success && pkg.data.version) || 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions {
  url: string;
  output: string;
  maxDepth: number;
  delaySeconds: number;
  timeoutSeconds: number;
  verbose: boolean;
  maxPages?: number;
  include?: string[];
  exclude?: string[];
  rulesPath?: string;
  browserPath?: string;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

type ValueResult<T> = { value: T } | { error: string };

/** Longest pause or page timeout accepted, in seconds; timers overflow far beyond it */
const MAX_SECONDS = 3600;

const INT_RE = /^\d+$/;
const DECIMAL_RE = /^(\d+(\.\d*)?|\.\d+)$/;

interface NumberRule {
  kind: 'int' | 'float';
  min: number;
  max?: number;
  describe: string;
}

/** Take the value following flag `args[i]`, parsed and range-checked. */
function readNumber(args: string[], i: number, flag: string, rule: NumberRule): ValueResult<number> {
  if (i + 1 >= args.length) return { error: `${flag} requires a value` };
  const raw = args[i + 1].trim();
  const v = Number(raw);
  const max = rule.max ?? Number.MAX_SAFE_INTEGER;
  if (!(rule.kind === 'int' ? INT_RE : DECIMAL_RE).test(raw) || v < rule.min || v > max) {
    return { error: `${flag} must be ${rule.describe}` };
  }
  return { value: v };
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let output = DEFAULT_OUTPUT;
  let maxDepth = DEFAULT_MAX_DEPTH;
  let delaySeconds = DEFAULT_DELAY_SECONDS;
  let timeoutSeconds = DEFAULT_TIMEOUT_SECONDS;
  let verbose = false;
  let maxPages: number | undefined;
  let include: string[] | undefined;
  let exclude: string[] | undefined;
  let rulesPath: string | undefined;
  let browserPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-V':
      case '--version':
        return { kind: 'version' };
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      case '-o':
      case '--output':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        output = args[++i];
        break;
      case '--max-depth': {
        const r = readNumber(args, i++, arg, {
          kind: 'int',
          min: 0,
          describe: 'a non-negative integer',
        });
        if ('error' in r) return { kind: 'error', message: r.error };
        maxDepth = r.value;
        break;
      }
      case '--delay': {
        const r = readNumber(args, i++, arg, {
          kind: 'float',
          min: 0,
          max: MAX_SECONDS,
          describe: `a number of seconds from 0 to ${MAX_SECONDS}`,
        });
        if ('error' in r) return { kind: 'error', message: r.error };
        delaySeconds = r.value;
        break;
      }
      case '--timeout': {
        const r = readNumber(args, i++, arg, {
          kind: 'int',
          min: 1,
          max: MAX_SECONDS,
          describe: `a whole number of seconds from 1 to ${MAX_SECONDS}`,
        });
        if ('error' in r) return { kind: 'error', message: r.error };
        timeoutSeconds = r.value;
        break;
      }
      case '--max-pages': {
        const r = readNumber(args, i++, arg, {
          kind: 'int',
          min: 1,
          describe: 'a positive integer',
        });
        if ('error' in r) return { kind: 'error', message: r.error };
        maxPages = r.value;
        break;
      }
      case '--include':
        if (i + 1 >= args.length) return { kind: 'error', message: '--include requires a value' };
        include = splitList(args[++i]);
        break;
      case '--exclude':
        if (i + 1 >= args.length) return { kind: 'error', message: '--exclude requires a value' };
        exclude = splitList(args[++i]);
        break;
      case '--rules':
        if (i + 1 >= args.length) return { kind: 'error', message: '--rules requires a value' };
        rulesPath = args[++i];
        break;
      case '--browser-path':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--browser-path requires a value' };
        browserPath = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }

  const url = positional[0];
  if (!/^https?:\/\//i.test(url)) {
    return { kind: 'error', message: 'URL must start with http:// or https://' };
  }
  if (positional.length > 1) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(1).join(' ')}`);
  }

  return {
    kind: 'ok',
    opts: {
      url,
      output,
      maxDepth,
      delaySeconds,
      timeoutSeconds,
      verbose,
      maxPages,
      include,
      exclude,
      rulesPath,
      browserPath,
    },
    warnings,
  };
}

function printUsage(): void {
  console.log(`Usage: docsite-to-pdf <url> [options]

Crawls a documentation site (same host, under the URL's path) in a headless
browser and merges every page into one PDF with bookmarks and page numbers.

Options:
  -o, --output <path>     Output PDF file (default: ${DEFAULT_OUTPUT})
  --max-depth <n>         Max link-following depth from the start page (default: ${DEFAULT_MAX_DEPTH})
  --delay <seconds>       Minimum pause between requests; each pause is randomized
                          up to twice this value (default: ${DEFAULT_DELAY_SECONDS})
  --timeout <seconds>     Per-page load timeout (default: ${DEFAULT_TIMEOUT_SECONDS})
  --max-pages <n>         Convert only the first n crawled pages
  --include <globs>       Only follow paths matching these globs (comma-separated)
  --exclude <globs>       Never follow paths matching these globs (comma-separated)
  --rules <path>          Crawl rules JSON replacing the bundled config/crawl-rules.json
  --browser-path <path>   Chromium executable (env: DOCSITE_BROWSER_PATH)
  -v, --verbose           Debug logging
  -V, --version           Show version number
  -h, --help              Show this help message

Disclaimer:
  Users are responsible for complying with website terms of service,
  robots.txt directives, and applicable laws.`);
}

/**
 * Parse arguments and run the pipeline. Returns the process exit code.
 * `createCollaborators` is swapped out in tests.
 */
export async function run(
  argv: string[],
  createCollaborators: (opts: CliOptions) => PipelineCollaborators = defaultCollaborators
): Promise<number> {
  const result = parseArgs(argv);

  switch (result.kind) {
    case 'version':
      console.log(`docsite-to-pdf ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  if (opts.verbose) {
    enableVerboseLogging();
  }

  let rules: CrawlRules;
  try {
    rules = opts.rulesPath ? loadCrawlRules(resolve(opts.rulesPath)) : getDefaultCrawlRules();
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const report = await runPipeline(
    {
      url: opts.url,
      outputPath: resolve(opts.output),
      maxDepth: opts.maxDepth,
      delaySeconds: opts.delaySeconds,
      timeoutMs: opts.timeoutSeconds * 1000,
      maxPages: opts.maxPages,
      include: opts.include,
      exclude: opts.exclude,
      rules,
    },
    createCollaborators(opts)
  );

  return report.exitCode;
}

function defaultCollaborators(opts: CliOptions): PipelineCollaborators {
  return {
    fetcher: new BrowserFetcher({ executablePath: opts.browserPath }),
    converter: new BrowserPdfConverter({ executablePath: opts.browserPath }),
    merger: new PdfMerger(),
  };
}

export async function main(): Promise<void> {
  const exitCode = await run(process.argv.slice(2));
  process.exit(exitCode);
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main().catch((err) => {
    console.error(`Fatal: ${err}`);
    process.exit(1);
  });
}
