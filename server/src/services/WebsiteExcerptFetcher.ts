import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';

export const EXCERPT_SKIPPED = 'No website listed.';
export const EXCERPT_UNREACHABLE = 'Website unreachable.';
export const EXCERPT_NO_CONTENT = 'Website reachable but no usable content.';

/** Fixed: this runs once per candidate inside the verification fan-out. */
export const WEBSITE_TIMEOUT_MS = 5000;
export const EXCERPT_MAX_CHARS = 1000;

const DEFAULT_UA =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36';

function normalizeWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/** Visible text of an HTML document, whitespace collapsed, cut to `maxChars`. */
export function extractExcerpt(html: string, maxChars = EXCERPT_MAX_CHARS): string {
  const $ = cheerio.load(html);
  $('script,noscript,style,svg,iframe').remove();

  // Parsed as a full document, so <body> always exists
  const body = $('body');
  // Separate adjacent blocks so their words are not glued together
  body.find('*').each((_, el) => {
    $(el).append(' ');
  });
  const text = normalizeWhitespace(body.text());

  // Cut by code point, never inside a surrogate pair
  return Array.from(text).slice(0, maxChars).join('');
}

/**
 * Best-effort homepage enrichment. Never throws: every failure becomes one of
 * the sentinel strings above, which the verifier passes to the model as-is.
 */
export class WebsiteExcerptFetcher {
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        timeout: WEBSITE_TIMEOUT_MS,
        maxRedirects: 5,
        maxContentLength: 5 * 1024 * 1024,
      });
  }

  async fetchExcerpt(url?: string): Promise<string> {
    if (!url || !url.trim()) return EXCERPT_SKIPPED;

    let status: number;
    let body: unknown;
    let contentType: string;
    try {
      const res = await this.client.get<unknown>(url.trim(), {
        timeout: WEBSITE_TIMEOUT_MS,
        // axios's timeout only covers idle sockets; this bounds the whole transfer
        signal: AbortSignal.timeout(WEBSITE_TIMEOUT_MS),
        responseType: 'text',
        headers: {
          'user-agent': DEFAULT_UA,
          accept: 'text/html,application/xhtml+xml',
          'accept-language': 'en-US,en;q=0.9',
        },
        validateStatus: () => true,
      });
      status = res.status;
      body = res.data;
      contentType = String(res.headers['content-type'] ?? '');
    } catch (err) {
      console.warn(`[website] ${url}: ${err instanceof Error ? err.message : String(err)}`);
      return EXCERPT_UNREACHABLE;
    }

    if (status < 200 || status >= 300) return EXCERPT_NO_CONTENT;
    if (typeof body !== 'string' || !body.trim()) return EXCERPT_NO_CONTENT;
    if (contentType && !/html|text\/plain/i.test(contentType)) return EXCERPT_NO_CONTENT;

    const excerpt = extractExcerpt(body);
    return excerpt || EXCERPT_NO_CONTENT;
  }
}
