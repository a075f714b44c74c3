/**
 * FILE PURPOSE: Readability-style visible text extraction from HTML
 *
 * HOW: Drops non-content elements, then prefers article/main/[role=main];
 *      otherwise the element holding the most paragraph text; otherwise the
 *      whole body. Block elements are padded with newlines so adjacent
 *      blocks never fuse into one word.
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

export type CheerioRoot = ReturnType<typeof cheerio.load>;

const NON_CONTENT = [
  'script', 'style', 'noscript', 'template', 'svg', 'canvas', 'iframe', 'object',
  'nav', 'header', 'footer', 'aside', 'form', 'button', 'select', 'input', 'textarea',
  '[role=navigation]', '[role=banner]', '[role=contentinfo]', '[aria-hidden=true]', '[hidden]',
].join(', ');

const BLOCKS = 'p, div, br, li, ul, ol, dd, dt, h1, h2, h3, h4, h5, h6, td, th, tr, section, article, main, blockquote, pre, figcaption';

export type ExtractionMethod = 'main' | 'paragraphs' | 'body';

export interface HtmlExtraction {
  title: string;
  text: string;
  method: ExtractionMethod;
}

interface ParagraphGroup {
  el: AnyNode;
  chars: number;
  paragraphs: number;
}

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function loadHtml(html: string): CheerioRoot | null {
  if (!html?.trim()) return null;
  return cheerio.load(html);
}

export function extractMainText(html: string): HtmlExtraction {
  const $ = loadHtml(html);
  if (!$) return { title: '', text: '', method: 'body' };

  const title = normalize($('title').first().text());
  $(NON_CONTENT).remove();
  $(BLOCKS).append('\n');

  let bestMain = '';
  $('article, main, [role=main]').each((_, el) => {
    const text = normalize($(el).text());
    if (text.length > bestMain.length) bestMain = text;
  });
  if (bestMain) return { title, text: bestMain, method: 'main' };

  // Densest paragraph container
  const totals = new Map<AnyNode, ParagraphGroup>();
  $('p').each((_, p) => {
    const parent = $(p).parent().get(0);
    if (!parent) return;
    const chars = normalize($(p).text()).length;
    const entry = totals.get(parent) ?? { el: parent, chars: 0, paragraphs: 0 };
    entry.chars += chars;
    entry.paragraphs += 1;
    totals.set(parent, entry);
  });
  let densest: ParagraphGroup | null = null;
  for (const entry of totals.values()) {
    if (!densest || entry.chars > densest.chars) densest = entry;
  }
  if (densest && densest.paragraphs >= 2) {
    const text = normalize($(densest.el).text());
    if (text) return { title, text, method: 'paragraphs' };
  }

  const body = $('body');
  const text = normalize(body.length > 0 ? body.text() : $.root().text());
  return { title, text, method: 'body' };
}
