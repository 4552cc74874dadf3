import { describe, it, expect } from 'vitest';
import {
  checkScope,
  createCrawlTarget,
  createPathMatcher,
  isDocumentLike,
  isInPath,
  isInternal,
} from '../crawl/scope-filter.js';
import { getDefaultCrawlRules } from '../rules/crawl-rules.js';

const BASE = 'https://docs.example.com/guide/';
const rules = getDefaultCrawlRules();

describe('createCrawlTarget', () => {
  it('normalizes the root and derives host and path prefix', () => {
    const target = createCrawlTarget('https://Docs.Example.com/guide/#top');
    expect(target).toEqual({
      rootUrl: 'https://docs.example.com/guide/',
      host: 'docs.example.com',
      pathPrefix: '/guide',
    });
    expect(Object.isFrozen(target)).toBe(true);
  });

  it('uses an empty prefix for a site root', () => {
    expect(createCrawlTarget('https://docs.example.com/').pathPrefix).toBe('');
  });
});

describe('isInternal', () => {
  it('treats relative references as internal', () => {
    expect(isInternal('/guide/setup', BASE)).toBe(true);
    expect(isInternal('setup', BASE)).toBe(true);
    expect(isInternal('../other', BASE)).toBe(true);
  });

  it('accepts absolute URLs on the same host, case-insensitively', () => {
    expect(isInternal('https://docs.example.com/anything', BASE)).toBe(true);
    expect(isInternal('https://DOCS.example.com/anything', BASE)).toBe(true);
  });

  it('rejects other hosts, subdomains and ports', () => {
    expect(isInternal('https://example.org/guide/', BASE)).toBe(false);
    expect(isInternal('https://api.docs.example.com/guide/', BASE)).toBe(false);
    expect(isInternal('https://docs.example.com:8443/guide/', BASE)).toBe(false);
  });

  it('resolves protocol-relative references before comparing hosts', () => {
    expect(isInternal('//docs.example.com/guide/setup', BASE)).toBe(true);
    expect(isInternal('//cdn.example.net/app.js', BASE)).toBe(false);
  });

  it('rejects non-http schemes', () => {
    expect(isInternal('mailto:team@example.com', BASE)).toBe(false);
  });
});

describe('isInPath', () => {
  it('accepts pages under the root path', () => {
    expect(isInPath('https://docs.example.com/guide/setup', BASE)).toBe(true);
    expect(isInPath('https://docs.example.com/guide/a/b/c', BASE)).toBe(true);
  });

  it('accepts the root path without its trailing slash', () => {
    expect(isInPath('https://docs.example.com/guide', BASE)).toBe(true);
  });

  it('rejects pages outside the root path', () => {
    expect(isInPath('https://docs.example.com/blog/post', BASE)).toBe(false);
    expect(isInPath('https://docs.example.com/', BASE)).toBe(false);
  });

  it('uses a literal prefix test', () => {
    expect(isInPath('https://docs.example.com/guidebook', BASE)).toBe(true);
  });

  it('rejects relative references and other hosts', () => {
    expect(isInPath('/guide/setup', BASE)).toBe(false);
    expect(isInPath('https://example.org/guide/setup', BASE)).toBe(false);
  });

  it('accepts the whole host when the root is the site root', () => {
    expect(isInPath('https://docs.example.com/anything', 'https://docs.example.com/')).toBe(true);
  });
});

describe('isDocumentLike', () => {
  it.each([
    'https://docs.example.com/guide/style.css',
    'https://docs.example.com/guide/app.js',
    'https://docs.example.com/guide/logo.png',
    'https://docs.example.com/guide/manual.pdf',
    'https://docs.example.com/guide/LOGO.PNG',
    '/guide/archive.tar.gz',
  ])('rejects resource %s', (url) => {
    expect(isDocumentLike(url, rules)).toBe(false);
  });

  it.each([
    'https://docs.example.com/guide/overview',
    'https://docs.example.com/guide/overview/',
    'https://docs.example.com/guide/intro.html',
    '/guide/setup',
  ])('accepts document %s', (url) => {
    expect(isDocumentLike(url, rules)).toBe(true);
  });

  it('rejects excluded path sections', () => {
    expect(isDocumentLike('https://docs.example.com/guide/api/client', rules)).toBe(false);
    expect(isDocumentLike('https://docs.example.com/Assets/intro', rules)).toBe(false);
    expect(isDocumentLike('https://docs.example.com/blog/release', rules)).toBe(false);
  });

  it('never inspects the query string', () => {
    expect(isDocumentLike('https://docs.example.com/guide/page?file=x.pdf', rules)).toBe(true);
  });
});

describe('createPathMatcher', () => {
  it('matches everything without patterns', () => {
    const matches = createPathMatcher();
    expect(matches('https://docs.example.com/any/path')).toBe(true);
  });

  it('applies include globs to the pathname', () => {
    const matches = createPathMatcher({ include: ['/guide/**'] });
    expect(matches('https://docs.example.com/guide/setup')).toBe(true);
    expect(matches('https://docs.example.com/reference/setup')).toBe(false);
  });

  it('lets exclude globs win over include globs', () => {
    const matches = createPathMatcher({
      include: ['/guide/**'],
      exclude: ['/guide/internal/**'],
    });
    expect(matches('https://docs.example.com/guide/setup')).toBe(true);
    expect(matches('https://docs.example.com/guide/internal/notes')).toBe(false);
  });
});

describe('checkScope', () => {
  const target = createCrawlTarget(BASE);

  it('returns null for an in-scope document', () => {
    expect(checkScope('https://docs.example.com/guide/setup', target, rules)).toBeNull();
  });

  it('reports the first failing check', () => {
    expect(checkScope('https://example.org/guide/setup', target, rules)).toBe('external');
    expect(checkScope('https://docs.example.com/blog/post', target, rules)).toBe('out_of_path');
    expect(checkScope('https://docs.example.com/guide/style.css', target, rules)).toBe(
      'not_document'
    );
  });

  it('reports glob exclusions', () => {
    const matcher = createPathMatcher({ exclude: ['/guide/internal/**'] });
    expect(
      checkScope('https://docs.example.com/guide/internal/notes', target, rules, matcher)
    ).toBe('excluded_pattern');
  });
});
