/**
 * Print preparation: strips navigation chrome and overlays from rendered pages.
 */
import { parseHTML } from 'linkedom';

const CHROME_TAGS = 'nav, header, footer, aside, script, noscript';

const NAV_CLASS_RE = new RegExp(
  [
    'nav',
    'menu',
    'sidebar',
    'header',
    'footer',
    'breadcrumb',
    'toc',
    'navigation',
    'toolbar',
    'topbar',
    'top-bar',
    'navbar',
    'nav-bar',
    'sidenav',
    'side-nav',
    'side-menu',
    'mobile-menu',
    'hamburger',
    'overlay',
    'modal',
    'popup',
    'cookie',
    'banner',
    'search-box',
    'search-form',
    // MkDocs Material
    'md-header',
    'md-sidebar',
    'md-footer',
    'md-search',
    'md-overlay',
    'md-tabs',
    'md-source',
    'headerlink',
  ].join('|'),
  'i'
);

const NAV_ID_RE = /nav|menu|sidebar|header|footer|toc|navigation|toolbar/i;

const MAIN_CLASS_RE = /content|main|article|documentation|docs/i;
const MAIN_ID_RE = /content|main/i;

const HEAD_KEEP = new Set(['TITLE', 'META', 'STYLE']);

export const PRINT_CSS = `<style>
  [style*="position: fixed"], [style*="position:fixed"],
  [style*="position: absolute"], [style*="position:absolute"] { display: none !important; }
  a[href]:after { content: none !important; }
  @media print { a[href]:after { content: none !important; } }
  a { position: static !important; display: inline !important; }
  body { max-width: 100%; overflow-x: hidden; }
  .md-header, .md-sidebar, .md-footer, .md-tabs, .md-search,
  .md-source, .md-overlay { display: none !important; }
  .headerlink, a.headerlink, .anchor-link { display: none !important; }
  * { position: static !important; }
  .md-content, .md-content__inner, .md-typeset, article, main {
    position: static !important;
    margin: 0 !important;
    padding: 10px !important;
    max-width: 100% !important;
    width: 100% !important;
  }
</style>`;

function removeAll(elements: Iterable<Element>, shouldRemove: (el: Element) => boolean): void {
  // Collect first: removing while iterating a live list skips siblings
  const doomed = Array.from(elements).filter(shouldRemove);
  for (const el of doomed) {
    el.remove();
  }
}

/** Fixed or absolute boxes overlay the text in print, unless they are the content itself. */
function isOverlay(el: Element): boolean {
  const style = (el.getAttribute('style') ?? '').toLowerCase();
  if (!style.replace(/\s/g, '').includes('position:')) return false;
  if (!style.includes('fixed') && !style.includes('absolute')) return false;

  const classes = (el.getAttribute('class') ?? '').toLowerCase();
  return !classes.includes('content') && !classes.includes('main');
}

function isEmptyAnchor(el: Element): boolean {
  return !(el.textContent ?? '').trim() && !el.querySelector('img');
}

function findMainContent(document: Document): Element | null {
  const main = document.querySelector('main');
  if (main) return main;

  for (const el of document.querySelectorAll('[class]')) {
    if (MAIN_CLASS_RE.test(el.getAttribute('class') ?? '')) return el;
  }

  const article = document.querySelector('article');
  if (article) return article;

  for (const el of document.querySelectorAll('[id]')) {
    if (MAIN_ID_RE.test(el.getAttribute('id') ?? '')) return el;
  }

  return null;
}

/**
 * Remove navigation, overlays and scripts, keep the main content region when one
 * exists, and append print CSS. Returns a complete HTML document.
 */
export function sanitizeHtml(html: string): string {
  const { document } = parseHTML(html);

  removeAll(document.querySelectorAll(CHROME_TAGS), () => true);
  removeAll(document.querySelectorAll('[class]'), (el) =>
    NAV_CLASS_RE.test(el.getAttribute('class') ?? '')
  );
  removeAll(document.querySelectorAll('[id]'), (el) => NAV_ID_RE.test(el.getAttribute('id') ?? ''));
  removeAll(document.querySelectorAll('[style]'), isOverlay);
  removeAll(document.querySelectorAll('a'), isEmptyAnchor);

  const main = findMainContent(document);
  if (!main) {
    const serialized = document.toString();
    return /<\/head>/i.test(serialized)
      ? serialized.replace(/<\/head>/i, `${PRINT_CSS}</head>`)
      : PRINT_CSS + serialized;
  }

  const headParts = Array.from(document.head?.children ?? [])
    .filter((el) => HEAD_KEEP.has(el.tagName.toUpperCase()))
    .map((el) => el.outerHTML)
    .join('');

  return `<!DOCTYPE html><html><head>${headParts}${PRINT_CSS}</head><body>${main.outerHTML}</body></html>`;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Sanitize a page and pin relative references to its URL with a `<base>` tag.
 */
export function preparePrintHtml(html: string, url: string): string {
  const sanitized = sanitizeHtml(html);
  const baseTag = `<base href="${escapeAttribute(url)}">`;
  const sourceComment = `<!-- Source: ${url.replace(/--/g, '%2D%2D')} -->\n`;

  const withBase = /<head>/i.test(sanitized)
    ? sanitized.replace(/<head>/i, `<head>${baseTag}`)
    : `${baseTag}\n${sanitized}`;

  return sourceComment + withBase;
}
