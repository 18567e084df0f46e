import { gunzipSync } from 'node:zlib';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { SitemapParseResult, UrlEntry } from '../types/sitemap';

const LOC_PATTERN = /<(?:[\w-]+:)?loc\b[^>]*>\s*(?:<!\[CDATA\[\s*)?([\s\S]*?)\s*(?:\]\]>\s*)?<\/(?:[\w-]+:)?loc>/gi;
const SITEMAP_INDEX_PATTERN = /<(?:[\w-]+:)?sitemapindex[\s>]/i;
const URLSET_PATTERN = /<(?:[\w-]+:)?urlset[\s>]/i;

type XmlNode = Record<string, unknown>;

export class SitemapParser {
  private static readonly parser = new XMLParser({
    ignoreAttributes: true,
    removeNSPrefix: true,
    parseTagValue: false,
    trimValues: true,
    isArray: name => name === 'url' || name === 'sitemap'
  });

  /** Raw bytes to text, gunzipping `.xml.gz` payloads. */
  static decodeBody(body: Buffer): string {
    const bytes = body.length > 2 && body[0] === 0x1f && body[1] === 0x8b ? gunzipSync(body) : body;
    return bytes.toString('utf8').replace(/^\uFEFF/, '');
  }

  static parseSitemap(xmlText: string): SitemapParseResult {
    if (!xmlText.trim()) {
      return { kind: 'unknown', urls: [], sitemaps: [], malformed: true, error: 'Empty document' };
    }

    const validation = XMLValidator.validate(xmlText);
    if (validation !== true) {
      const recovered = this.extractLocs(xmlText);
      return {
        ...recovered,
        malformed: true,
        error: `Malformed XML (line ${validation.err.line}): ${validation.err.msg}`
      };
    }

    let document: unknown;
    try {
      document = this.parser.parse(xmlText);
    } catch (error) {
      return {
        ...this.extractLocs(xmlText),
        malformed: true,
        error: `XML parsing error: ${error instanceof Error ? error.message : String(error)}`
      };
    }

    const root = asNode(document);
    const urlset = asNode(root?.urlset);
    if (urlset) {
      return { kind: 'urlset', urls: this.parseUrlEntries(urlset.url), sitemaps: [], malformed: false };
    }

    const sitemapIndex = asNode(root?.sitemapindex);
    if (sitemapIndex) {
      const sitemaps = asArray(sitemapIndex.sitemap)
        .map(entry => textOf(asNode(entry)?.loc))
        .filter((loc): loc is string => Boolean(loc));
      return { kind: 'sitemapindex', urls: [], sitemaps, malformed: false };
    }

    // An empty <urlset/> parses to an empty string rather than an object
    if (root && 'urlset' in root) {
      return { kind: 'urlset', urls: [], sitemaps: [], malformed: false };
    }
    if (root && 'sitemapindex' in root) {
      return { kind: 'sitemapindex', urls: [], sitemaps: [], malformed: false };
    }

    return {
      kind: 'unknown',
      urls: [],
      sitemaps: [],
      malformed: false,
      error: 'No <urlset> or <sitemapindex> root element'
    };
  }

  /**
   * Lenient recovery for documents that fail validation: pulls every <loc>
   * value out with a pattern so a broken sitemap still contributes URLs.
   */
  static extractLocs(text: string): Omit<SitemapParseResult, 'malformed' | 'error'> {
    const locs: string[] = [];
    for (const match of text.matchAll(LOC_PATTERN)) {
      const loc = decodeXmlEntities(match[1].trim());
      if (loc) {
        locs.push(loc);
      }
    }

    if (SITEMAP_INDEX_PATTERN.test(text)) {
      return { kind: 'sitemapindex', urls: [], sitemaps: locs };
    }

    return {
      kind: URLSET_PATTERN.test(text) ? 'urlset' : 'unknown',
      urls: locs.map(loc => ({ loc })),
      sitemaps: []
    };
  }

  static isSitemap(result: SitemapParseResult): boolean {
    return result.kind !== 'unknown' || result.urls.length > 0;
  }

  private static parseUrlEntries(value: unknown): UrlEntry[] {
    const entries: UrlEntry[] = [];

    for (const item of asArray(value)) {
      const node = asNode(item);
      const loc = textOf(node?.loc);
      if (!node || !loc) continue;

      const priority = textOf(node.priority);
      entries.push({
        loc,
        lastmod: textOf(node.lastmod),
        changefreq: textOf(node.changefreq),
        priority: priority ? parseFloat(priority) : undefined
      });
    }

    return entries;
  }
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNode(value: unknown): XmlNode | null {
  return isNode(value) ? value : null;
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  const node = asNode(value);
  if (node && typeof node['#text'] === 'string') {
    return node['#text'].trim() || undefined;
  }
  return undefined;
}

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|amp|lt|gt|quot|apos);/g, (entity, body: string) => {
    switch (body) {
      case 'amp': return '&';
      case 'lt': return '<';
      case 'gt': return '>';
      case 'quot': return '"';
      case 'apos': return "'";
    }
    const code = body.startsWith('#x') ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
    return Number.isFinite(code) ? String.fromCodePoint(code) : entity;
  });
}
