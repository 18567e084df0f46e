import { createHash } from 'node:crypto';
import { minify } from 'html-minifier-terser';
import { Logger, createLogger, errorMessage } from '../logger';

const MONTH = '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';
const WEEKDAY = '(?:monday|tuesday|wednesday|thursday|friday|saturday|sunday)';

/**
 * Produces a hash of a page that survives cosmetic churn: markup is minified
 * and values that change on every request (dates, nonces, CSRF tokens, cache
 * busters) are masked before hashing.
 */
export class ContentNormalizer {
  private static readonly IGNORE_PATTERNS: RegExp[] = [
    /\b\d{4}-\d{2}-\d{2}[tT ]\d{2}:\d{2}(?::\d{2})?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g,
    /\b\d{4}-\d{2}-\d{2}\b/g,
    /\b\d{2}:\d{2}:\d{2}\b/g,
    /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/g,
    /\b\d{4}[/-]\d{1,2}[/-]\d{1,2}\b/g,
    new RegExp(`\\b${WEEKDAY}\\s*${MONTH}\\s*\\d{1,2}(?:st|nd|rd|th)?(?:,\\s*)?\\s*\\d{4}\\b`, 'gi'),
    new RegExp(`\\b${MONTH}\\s*\\d{1,2}(?:st|nd|rd|th)?(?:,\\s*)?\\s*\\d{4}\\b`, 'gi'),
    new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s*${MONTH}\\s*\\d{4}\\b`, 'gi'),
    new RegExp(`\\b${WEEKDAY}\\b\\s*(?=\\[REDACTED\\])`, 'gi'),
    /\b(?:last\s+updated|updated|published|posted|modified|generated)\s*[:\-–—]?\s*(?:today|yesterday|\d+\s+(?:seconds?|minutes?|hours?|days?|weeks?|months?|years?)\s+ago)\b/gi,
    /csrf["\s]*[:=]["\s]*["'][^"']+["']/gi,
    /_requestid["\s]*[:=]["\s]*["'][^"']+["']/gi,
    /nonce="[^"]*"/g,
    /data-testid="[^"]*"/g,
    /data-cy="[^"]*"/g,
    /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi,
    /([?&](?:v|ver|version|cb|_)=)[\w.-]+/g,
    /\b\d{10,13}\b/g
  ];

  static async normalizeContent(html: string, logger: Logger = createLogger()): Promise<string> {
    let normalized = html;

    try {
      normalized = await minify(normalized, {
        collapseWhitespace: true,
        removeComments: true,
        removeRedundantAttributes: true,
        removeScriptTypeAttributes: true,
        removeStyleLinkTypeAttributes: true,
        useShortDoctype: true,
        removeEmptyAttributes: true,
        sortAttributes: true,
        sortClassName: false,
        removeAttributeQuotes: false,
        removeOptionalTags: false,
        removeEmptyElements: false,
        preserveLineBreaks: false,
        continueOnParseError: true
      });
    } catch (error) {
      logger.debug(`HTML minification failed, hashing raw markup: ${errorMessage(error)}`);
    }

    for (const pattern of this.IGNORE_PATTERNS) {
      normalized = normalized.replace(pattern, '[REDACTED]');
    }

    return normalized
      .replace(/\s+/g, ' ')
      .replace(/> </g, '><')
      .trim();
  }

  static async calculateNormalizedHash(html: string, logger?: Logger): Promise<string> {
    return this.calculateHash(await this.normalizeContent(html, logger));
  }

  static calculateHash(content: string | Buffer): string {
    return createHash('sha256').update(content).digest('hex');
  }
}
