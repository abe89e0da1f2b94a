// Minimal HTML table extraction for scraped vendor pages
// Regex based: it reads the markup MarketWatch serves, not arbitrary HTML

export interface HtmlRow {
  cells: string[];
  links: string[];
}

export interface HtmlTable {
  headers: string[];
  rows: HtmlRow[];
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#39|nbsp);/g, m => ENTITIES[m] ?? m);
}

/** First non-empty text node of a cell; duplicated responsive labels collapse to one */
export function cellText(inner: string): string {
  for (const part of inner.split(/<[^>]*>/)) {
    const text = decodeEntities(part).replace(/\s+/g, ' ').trim();
    if (text) return text;
  }
  return '';
}

function matchAll(source: string, pattern: RegExp): string[] {
  return Array.from(source.matchAll(pattern), m => m[1] ?? '');
}

export function parseHtmlTables(html: string): HtmlTable[] {
  return matchAll(html, /<table\b[^>]*>([\s\S]*?)<\/table>/gi).map(body => {
    const head = /<thead\b[^>]*>([\s\S]*?)<\/thead>/i.exec(body)?.[1] ?? body;
    const headers = matchAll(head, /<th\b[^>]*>([\s\S]*?)<\/th>/gi).map(cellText);
    const rows = matchAll(body, /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi)
      .filter(tr => /<td\b/i.test(tr))
      .map(tr => ({
        cells: matchAll(tr, /<td\b[^>]*>([\s\S]*?)<\/td>/gi).map(cellText),
        links: matchAll(tr, /href="([^"]+)"/gi).map(decodeEntities),
      }));
    return { headers, rows };
  });
}
