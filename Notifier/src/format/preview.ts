/**
 * Text helpers for provider data: mail previews, meeting links, keyword matching.
 */

import { parseHTML } from 'linkedom';

const URL_RE = /https?:\/\/[^\s<>"]+/i;
const TEXT_URL_RE = /\[https?:\/\/[^\]]+\]|https?:\/\/\S+/gi;
const HTML_LINEBREAK_RE = /<br\s*\/?>|<\/(?:p|div|li|tr|h[1-6])\s*>/gi;
const CID_RE = /\[cid:[^\]]+\]|cid:[\w.@-]+/gi;
const NOISE_LINE_RE = /^\[?(cid|image|img):/i;

/** Visible text of an HTML fragment, entities decoded, block ends kept as line breaks */
function htmlToText(html: string): string {
  const { document } = parseHTML(
    `<!DOCTYPE html><html><body>${html.replace(HTML_LINEBREAK_RE, '\n')}</body></html>`,
  );
  document.querySelectorAll('style, script').forEach((element) => element.remove());
  return document.body.textContent ?? '';
}

/** First http(s) URL in the text, used as a meeting join link */
export function extractUrl(text: string | undefined): string | undefined {
  if (!text) return undefined;
  return URL_RE.exec(text)?.[0];
}

function cleanMailText(text: string): string {
  let cleaned = text.includes('<') && text.includes('>') ? htmlToText(text) : text;
  cleaned = cleaned.replace(/\u00a0/g, ' ');
  cleaned = cleaned.replace(TEXT_URL_RE, ' ');
  cleaned = cleaned.replace(CID_RE, ' ');
  return cleaned;
}

/**
 * Short plain-text excerpt of a mail body: the first `maxLines` non-empty
 * lines, cut at `maxChars`.
 */
export function buildPreview(text: string, maxChars = 200, maxLines = 2): string {
  const lines: string[] = [];
  for (const line of cleanMailText(text).split(/\r?\n/)) {
    const stripped = line.replace(/\s+/g, ' ').trim();
    if (!stripped || NOISE_LINE_RE.test(stripped)) continue;
    lines.push(stripped);
    if (lines.length >= maxLines) break;
  }
  const preview = lines.join('\n');
  // Count code points so an emoji at the cut is kept whole
  const chars = Array.from(preview);
  return chars.length > maxChars ? chars.slice(0, maxChars).join('').trimEnd() : preview;
}

/** Case-insensitive substring match against any keyword */
export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return keywords.some((keyword) => keyword !== '' && lowered.includes(keyword.toLowerCase()));
}
