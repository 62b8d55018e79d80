/**
 * Feed Parser
 * RSS, Atom and JSON Feed documents to a flat list of entries
 */

import { z } from 'zod';
import { decodeNumericEntities } from '../utils/entities.js';

export type FeedType = 'rss' | 'atom' | 'json';

export interface FeedItem {
  title: string;
  url: string;
  publishedAt?: Date;
  description?: string;
  author?: string;
  categories?: string[];
}

export interface ParsedFeed {
  type: FeedType;
  title: string;
  items: FeedItem[];
}

const jsonFeedSchema = z.object({
  version: z.string().optional(),
  title: z.string().optional(),
  items: z.array(
    z.object({
      id: z.union([z.string(), z.number()]).optional(),
      url: z.string().optional(),
      external_url: z.string().optional(),
      title: z.string().optional(),
      content_text: z.string().optional(),
      summary: z.string().optional(),
      date_published: z.string().optional(),
      author: z.object({ name: z.string().optional() }).optional(),
      tags: z.array(z.string()).optional(),
    }).passthrough()
  ),
}).passthrough();

/**
 * Detect a feed document from its content type or its first bytes.
 */
export function detectFeedType(body: string, contentType = ''): FeedType | null {
  const type = contentType.toLowerCase();
  if (type.includes('rss')) return 'rss';
  if (type.includes('atom')) return 'atom';

  const head = body.trimStart().slice(0, 1024);
  if (head.startsWith('{')) {
    return /"version"\s*:\s*"https:\/\/jsonfeed\.org\/version\//.test(head) || type.includes('feed+json')
      ? 'json'
      : null;
  }
  if (/<rss[\s>]/i.test(head) || /<rdf:RDF[\s>]/i.test(head)) return 'rss';
  if (/<feed[\s>]/i.test(head)) return 'atom';
  return null;
}

export class FeedParser {
  parse(content: string, type: FeedType): ParsedFeed {
    switch (type) {
      case 'rss':
        return { type, title: this.channelTitle(content, 'channel'), items: this.parseRss(content) };
      case 'atom':
        return { type, title: this.channelTitle(content, 'feed'), items: this.parseAtom(content) };
      case 'json':
        return this.parseJson(content);
    }
  }

  private channelTitle(content: string, container: string): string {
    const head = content.split(/<(?:item|entry)[\s>]/i)[0];
    const scope = head.match(new RegExp(`<${container}[^>]*>([\\s\\S]*)`, 'i'))?.[1] ?? head;
    const title = this.extractTag(scope, 'title');
    return title ? this.decodeHtml(this.stripHtml(title)) : '';
  }

  private parseRss(content: string): FeedItem[] {
    const items: FeedItem[] = [];

    for (const match of content.matchAll(/<item[^>]*>([\s\S]*?)<\/item>/gi)) {
      const itemXml = match[1];

      const title = this.extractTag(itemXml, 'title');
      const link = this.extractTag(itemXml, 'link') || this.extractTag(itemXml, 'guid');
      const pubDate = this.extractTag(itemXml, 'pubDate') || this.extractTag(itemXml, 'dc:date');
      const description = this.extractTag(itemXml, 'description');
      const author = this.extractTag(itemXml, 'author') || this.extractTag(itemXml, 'dc:creator');

      const categories: string[] = [];
      for (const catMatch of itemXml.matchAll(/<category[^>]*>([^<]+)<\/category>/gi)) {
        categories.push(this.decodeHtml(catMatch[1].trim()));
      }

      if (title && link) {
        items.push({
          title: this.decodeHtml(this.stripHtml(title)),
          url: this.decodeHtml(link),
          publishedAt: this.parseDate(pubDate),
          description: description ? this.decodeHtml(this.stripHtml(description)) : undefined,
          author: author ? this.decodeHtml(author) : undefined,
          categories: categories.length > 0 ? categories : undefined,
        });
      }
    }

    return items;
  }

  private parseAtom(content: string): FeedItem[] {
    const items: FeedItem[] = [];

    for (const match of content.matchAll(/<entry[^>]*>([\s\S]*?)<\/entry>/gi)) {
      const entryXml = match[1];

      const title = this.extractTag(entryXml, 'title');
      const link = this.extractAtomLink(entryXml);
      const published = this.extractTag(entryXml, 'published') || this.extractTag(entryXml, 'updated');
      const summary = this.extractTag(entryXml, 'summary') || this.extractTag(entryXml, 'content');
      const author = this.extractTag(entryXml, 'name'); // nested in <author>

      const categories: string[] = [];
      for (const catMatch of entryXml.matchAll(/<category[^>]*term="([^"]+)"/gi)) {
        categories.push(this.decodeHtml(catMatch[1]));
      }

      if (title && link) {
        items.push({
          title: this.decodeHtml(this.stripHtml(title)),
          url: this.decodeHtml(link),
          publishedAt: this.parseDate(published),
          description: summary ? this.decodeHtml(this.stripHtml(summary)) : undefined,
          author: author ? this.decodeHtml(author) : undefined,
          categories: categories.length > 0 ? categories : undefined,
        });
      }
    }

    return items;
  }

  private parseJson(content: string): ParsedFeed {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      return { type: 'json', title: '', items: [] };
    }

    const parsed = jsonFeedSchema.safeParse(data);
    if (!parsed.success) {
      return { type: 'json', title: '', items: [] };
    }

    const items: FeedItem[] = [];
    for (const item of parsed.data.items) {
      const url = item.url ?? item.external_url;
      const title = item.title ?? item.summary;
      if (!url || !title) continue;
      items.push({
        title,
        url,
        publishedAt: this.parseDate(item.date_published),
        description: item.content_text ?? item.summary,
        author: item.author?.name,
        categories: item.tags && item.tags.length > 0 ? item.tags : undefined,
      });
    }

    return { type: 'json', title: parsed.data.title ?? '', items };
  }

  private parseDate(value: string | undefined): Date | undefined {
    if (!value) return undefined;
    const date = new Date(value);
    return isNaN(date.getTime()) ? undefined : date;
  }

  private extractTag(xml: string, tag: string): string | undefined {
    // Try CDATA first
    const cdataMatch = xml.match(new RegExp(`<${tag}[^>]*><!\\[CDATA\\[([\\s\\S]*?)\\]\\]><\\/${tag}>`, 'i'));
    if (cdataMatch) {
      return cdataMatch[1].trim();
    }

    const match = xml.match(new RegExp(`<${tag}[^>]*>([\\s\\S]*?)<\\/${tag}>`, 'i'));
    return match ? match[1].trim() : undefined;
  }

  private extractAtomLink(xml: string): string | undefined {
    // Alternate link first, then any link with href
    const altMatch = xml.match(/<link[^>]*rel="alternate"[^>]*href="([^"]+)"/i) ||
                     xml.match(/<link[^>]*href="([^"]+)"[^>]*rel="alternate"/i);
    if (altMatch) return altMatch[1];

    const hrefMatch = xml.match(/<link[^>]*href="([^"]+)"/i);
    return hrefMatch ? hrefMatch[1] : undefined;
  }

  private decodeHtml(text: string): string {
    return decodeNumericEntities(text)
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>')
      .replace(/&quot;/g, '"')
      .replace(/&apos;/g, "'")
      .replace(/&amp;/g, '&');
  }

  private stripHtml(text: string): string {
    return text
      .replace(/<[^>]+>/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
