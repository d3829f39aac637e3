import { injectable } from 'inversify';
import * as cheerio from 'cheerio';
import { ILinkExtractor } from '../interfaces';
import { DiscoveredLink, LinkSource } from '../types';
import { resolveHref } from './urlNormalizer';
import { containsDocumentToken } from './classificationRules';

const INLINE_DOCUMENT_URL = /https?:\/\/[^\s"'<>()]+?\.(?:pdf|docx?)(?![a-z0-9])[^\s"'<>()]*/gi;
const QUOTED_DOCUMENT_PATH = /["']([^"']*\.(?:pdf|docx?)(?![a-z0-9])[^"']*)["']/i;
const CONTEXT_LIMIT = 300;

const EMBED_ATTRIBUTES: ReadonlyArray<[string, string, LinkSource]> = [
  ['embed', 'src', 'embed'],
  ['object', 'data', 'object'],
  ['iframe', 'src', 'iframe'],
];

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Collects every URL on a page that could point at a document or at another
 * page: anchors with their text and surrounding text, embeds, link elements,
 * onclick handlers, data attributes, and absolute document URLs anywhere in
 * the markup (scripts included).
 */
@injectable()
export class LinkExtractor implements ILinkExtractor {
  extractLinks(html: string, pageUrl: string): DiscoveredLink[] {
    const $ = cheerio.load(html);
    const links: DiscoveredLink[] = [];
    const seen = new Set<string>();

    const add = (href: string | undefined, source: LinkSource, linkText = '', contextText = '') => {
      const url = resolveHref(href, pageUrl);
      if (!url) return;
      const key = `${source} ${url}`;
      if (seen.has(key)) return;
      seen.add(key);
      links.push({ url, source, linkText: squash(linkText), contextText: squash(contextText).slice(0, CONTEXT_LIMIT) });
    };

    $('a[href]').each((_, el) => {
      const anchor = $(el);
      add(anchor.attr('href'), 'anchor', anchor.text() || anchor.attr('title') || '', anchor.parent().text());
    });

    for (const [tag, attribute, source] of EMBED_ATTRIBUTES) {
      $(`${tag}[${attribute}]`).each((_, el) => {
        add($(el).attr(attribute), source, $(el).attr('title') ?? '');
      });
    }

    $('link[href]').each((_, el) => {
      add($(el).attr('href'), 'link', $(el).attr('title') ?? '');
    });

    $('[onclick]').each((_, el) => {
      const handler = $(el).attr('onclick') ?? '';
      const match = QUOTED_DOCUMENT_PATH.exec(handler);
      if (match) add(match[1], 'script', $(el).text());
    });

    $('*').each((_, el) => {
      if (!('attribs' in el)) return;
      for (const [name, value] of Object.entries(el.attribs)) {
        if (!name.startsWith('data-') || !value) continue;
        if (containsDocumentToken(value) || (name.endsWith('-url') && value.toLowerCase().includes('pdf'))) {
          add(value, 'data-attribute', $(el).text());
        }
      }
    });

    for (const match of html.matchAll(INLINE_DOCUMENT_URL)) {
      add(match[0].replace(/&amp;/g, '&'), 'inline');
    }

    return links;
  }
}
