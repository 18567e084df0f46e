import * as cheerio from 'cheerio';

const SKIPPED_SCHEMES = /^(?:javascript|mailto|tel|data|sms|ftp):/i;

export function isHtmlContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  return contentType.includes('text/html') || contentType.includes('application/xhtml+xml');
}

/**
 * Absolute targets of every `<a href>` on the page, resolved against the
 * document's `<base href>` when it declares one. Bare fragments and
 * non-navigational schemes are skipped.
 */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const base = resolve($('base[href]').first().attr('href'), pageUrl) ?? pageUrl;
  const links: string[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (!href || href.startsWith('#') || SKIPPED_SCHEMES.test(href)) return;

    const absolute = resolve(href, base);
    if (absolute) {
      links.push(absolute);
    }
  });

  return links;
}

function resolve(href: string | undefined, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, base).href;
  } catch {
    return null;
  }
}
