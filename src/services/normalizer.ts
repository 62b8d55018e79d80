/**
 * Content Normalizer
 *
 * Turns a fetched payload into one of:
 * - ARTICLE / UNKNOWN: canonical text ready for the ledger and chunker
 * - INDEX: a page enumerating posts; only its post links are kept
 * - FEED: RSS, Atom or JSON Feed; entry links become follow-ups
 *
 * Extraction is regex based and deterministic: the same payload always yields
 * the same text, and canonicalization is idempotent.
 */

import {
  CLASSIFIER_DEFAULTS,
  NON_POST_PATH_PATTERNS,
  type ClassifierConfig,
} from '../config/constants.js';
import type { ContentKind, SourceTypeHint } from '../types/index.js';
import { decodeNumericEntities } from '../utils/entities.js';
import { createLogger } from '../utils/logger.js';
import { canonicalizeUrl, resolveHref } from '../utils/url.js';
import { FeedParser, detectFeedType, type FeedItem, type FeedType } from './feed-parser.js';

const log = createLogger('normalizer');

// ============================================================================
// TYPES
// ============================================================================

export interface NormalizeInput {
  url: string;
  body: string;
  contentType?: string;
  typeHint?: SourceTypeHint;
}

export type ExtractionMode = 'main' | 'body' | 'degraded' | 'plain';

export interface ArticleContent {
  kind: 'ARTICLE' | 'UNKNOWN';
  title: string;
  text: string;
  publishedAt: Date | null;
  metadata: Record<string, unknown>;
}

export interface IndexContent {
  kind: 'INDEX';
  title: string;
  followUps: string[];
}

export interface FeedContent {
  kind: 'FEED';
  title: string;
  followUps: string[];
  entries: FeedItem[];
}

export type NormalizedContent = ArticleContent | IndexContent | FeedContent;

export interface PageAnalysis {
  feedType: FeedType | null;
  hasMainElement: boolean;
  mainText: string;
  linkDensity: number;
  largestLinkGroup: string[];
  candidateLinks: string[];
  articleLinks: string[];
}

// ============================================================================
// TEXT CANONICALIZATION
// ============================================================================

const BOILERPLATE_PATTERNS: RegExp[] = [
  /<!--[\s\S]*?-->/g,
  /<script\b[^>]*>[\s\S]*?<\/script>/gi,
  /<style\b[^>]*>[\s\S]*?<\/style>/gi,
  /<noscript\b[^>]*>[\s\S]*?<\/noscript>/gi,
  /<template\b[^>]*>[\s\S]*?<\/template>/gi,
  /<nav\b[^>]*>[\s\S]*?<\/nav>/gi,
  /<header\b[^>]*>[\s\S]*?<\/header>/gi,
  /<footer\b[^>]*>[\s\S]*?<\/footer>/gi,
  /<aside\b[^>]*>[\s\S]*?<\/aside>/gi,
];

const BLOCK_TAG =
  /<\/?(?:p|div|section|article|main|h[1-6]|li|ul|ol|dl|dt|dd|blockquote|pre|table|thead|tbody|tr|td|th|figure|figcaption|hr|address|details|summary)\b[^>]*>/gi;

const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  hellip: '…',
  mdash: '—',
  ndash: '–',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  copy: '©',
};

export function decodeEntities(text: string): string {
  return decodeNumericEntities(text)
    .replace(/&([a-z]+);/gi, (entity, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? entity)
    .replace(/&amp;/gi, '&');
}

/**
 * Paragraphs separated by one blank line, runs of whitespace inside a
 * paragraph collapsed to a single space.
 */
export function canonicalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n[ \t\f\v ]*\n/)
    .map(paragraph => paragraph.replace(/\s+/g, ' ').trim())
    .filter(paragraph => paragraph.length > 0)
    .join('\n\n');
}

export function htmlToText(html: string): string {
  const withBreaks = html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(BLOCK_TAG, '\n\n')
    .replace(/<[^>]+>/g, '');
  return canonicalizeText(decodeEntities(withBreaks));
}

export function stripBoilerplate(html: string): string {
  return BOILERPLATE_PATTERNS.reduce((current, pattern) => current.replace(pattern, ' '), html);
}

// ============================================================================
// REGION EXTRACTION
// ============================================================================

/**
 * Inner HTML of the first element whose opening tag matches `open`,
 * balanced against nested elements of the same tag.
 */
function extractElement(html: string, open: RegExp, tag: string): string | null {
  const start = open.exec(html);
  if (!start) return null;

  const innerStart = start.index + start[0].length;
  const tokens = new RegExp(`<(/?)${tag}\\b[^>]*>`, 'gi');
  tokens.lastIndex = innerStart;

  let depth = 1;
  let token: RegExpExecArray | null;
  while ((token = tokens.exec(html)) !== null) {
    depth += token[1] === '/' ? -1 : 1;
    if (depth === 0) {
      return html.slice(innerStart, token.index);
    }
  }
  // Unclosed: take the rest of the document
  return html.slice(innerStart);
}

interface MainRegion {
  html: string;
  fromElement: boolean;
}

function findMainRegion(cleaned: string): MainRegion {
  const main = extractElement(cleaned, /<main\b[^>]*>/i, 'main');
  if (main !== null) return { html: main, fromElement: true };

  const articleCount = (cleaned.match(/<article\b/gi) ?? []).length;
  if (articleCount === 1) {
    const article = extractElement(cleaned, /<article\b[^>]*>/i, 'article');
    if (article !== null) return { html: article, fromElement: true };
  }

  const contentDiv = extractElement(
    cleaned,
    /<div\b[^>]*(?:class|id)\s*=\s*["'][^"']*\b(?:content|post|entry|article)\b[^"']*["'][^>]*>/i,
    'div'
  );
  if (contentDiv !== null && articleCount <= 1) return { html: contentDiv, fromElement: true };

  return { html: bodyOf(cleaned), fromElement: false };
}

function bodyOf(html: string): string {
  return extractElement(html, /<body\b[^>]*>/i, 'body') ?? html;
}

// ============================================================================
// LINK ANALYSIS
// ============================================================================

interface Anchor {
  href: string | null;
  text: string;
}

function collectAnchors(html: string, baseUrl: string): Anchor[] {
  const anchors: Anchor[] = [];
  for (const match of html.matchAll(/<a\b[^>]*?\bhref\s*=\s*(["'])(.*?)\1[^>]*>([\s\S]*?)<\/a>/gi)) {
    anchors.push({
      href: resolveHref(decodeEntities(match[2]), baseUrl),
      text: htmlToText(match[3]),
    });
  }
  return anchors;
}

function isPostCandidate(link: string, page: URL): boolean {
  const target = new URL(link);
  if (target.origin !== page.origin) return false;
  if (target.pathname === '/' || link === page.toString()) return false;
  return !NON_POST_PATH_PATTERNS.some(pattern => pattern.test(target.pathname));
}

/** Links "look alike" when they share the parent path and depth */
function linkShape(link: string): string {
  const segments = new URL(link).pathname.split('/').filter(Boolean);
  return `${segments.length}:${segments.slice(0, -1).join('/')}`;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function analyzePage(input: NormalizeInput): PageAnalysis {
  const feedType = detectFeedType(input.body, input.contentType);
  const cleaned = stripBoilerplate(input.body);
  const region = findMainRegion(cleaned);
  const mainText = htmlToText(region.html);

  const page = new URL(canonicalizeUrl(input.url));
  const anchors = collectAnchors(region.html, page.toString());
  const anchorChars = anchors.reduce((sum, anchor) => sum + anchor.text.length, 0);
  const linkDensity = mainText.length > 0 ? Math.min(1, anchorChars / mainText.length) : 0;

  const candidateLinks = unique(
    anchors
      .filter(anchor => anchor.text.length > 0)
      .flatMap(anchor => (anchor.href !== null && isPostCandidate(anchor.href, page) ? [anchor.href] : []))
  );

  const groups = new Map<string, string[]>();
  for (const link of candidateLinks) {
    const shape = linkShape(link);
    groups.set(shape, [...(groups.get(shape) ?? []), link]);
  }
  let largestLinkGroup: string[] = [];
  for (const group of groups.values()) {
    if (group.length > largestLinkGroup.length) largestLinkGroup = group;
  }

  // First post link inside each repeated <article> block
  const articleLinks: string[] = [];
  for (const match of cleaned.matchAll(/<article\b[^>]*>([\s\S]*?)<\/article>/gi)) {
    const first = collectAnchors(match[1], page.toString())
      .find(anchor => anchor.href !== null && isPostCandidate(anchor.href, page));
    if (first?.href) articleLinks.push(first.href);
  }

  return {
    feedType,
    hasMainElement: /<(?:main|article)\b/i.test(cleaned),
    mainText,
    linkDensity,
    largestLinkGroup,
    candidateLinks,
    articleLinks: unique(articleLinks),
  };
}

// ============================================================================
// CLASSIFIER
// ============================================================================

function indexLinks(analysis: PageAnalysis, hint: SourceTypeHint | undefined, config: ClassifierConfig): string[] | null {
  if (analysis.articleLinks.length >= config.minRepeatedArticles) {
    return analysis.articleLinks;
  }
  if (
    analysis.largestLinkGroup.length >= config.minRepeatedLinks &&
    analysis.linkDensity >= config.minLinkDensity
  ) {
    return analysis.largestLinkGroup;
  }
  if (hint === 'blog_index' && analysis.candidateLinks.length > 0) {
    return analysis.largestLinkGroup.length >= config.minRepeatedLinks
      ? analysis.largestLinkGroup
      : analysis.candidateLinks;
  }
  return null;
}

function classifyAnalysis(
  analysis: PageAnalysis,
  input: NormalizeInput,
  config: ClassifierConfig
): ContentKind {
  if (input.typeHint === 'feed' || analysis.feedType !== null) return 'FEED';
  if (indexLinks(analysis, input.typeHint, config) !== null) return 'INDEX';
  if (analysis.hasMainElement || analysis.mainText.length >= config.minArticleChars) return 'ARTICLE';
  return 'UNKNOWN';
}

/**
 * Decide what kind of page a payload is.
 */
export function classifyPage(
  input: NormalizeInput,
  config: ClassifierConfig = CLASSIFIER_DEFAULTS
): ContentKind {
  if (isPlainText(input)) {
    return canonicalizeText(input.body).length >= config.minArticleChars ? 'ARTICLE' : 'UNKNOWN';
  }
  return classifyAnalysis(analyzePage(input), input, config);
}

function isPlainText(input: NormalizeInput): boolean {
  return (input.contentType ?? '').toLowerCase().startsWith('text/plain');
}

// ============================================================================
// METADATA
// ============================================================================

function metaContent(html: string, attribute: 'name' | 'property', key: string): string | undefined {
  const escaped = key.replace(/[.:]/g, m => `\\${m}`);
  const patterns = [
    new RegExp(`<meta[^>]*${attribute}\\s*=\\s*["']${escaped}["'][^>]*content\\s*=\\s*["']([^"']*)["']`, 'i'),
    new RegExp(`<meta[^>]*content\\s*=\\s*["']([^"']*)["'][^>]*${attribute}\\s*=\\s*["']${escaped}["']`, 'i'),
  ];
  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (match && match[1].trim()) return decodeEntities(match[1].trim());
  }
  return undefined;
}

export function extractTitle(html: string, url: string): string {
  const titleTag = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  const h1 = html.match(/<h1\b[^>]*>([\s\S]*?)<\/h1>/i);
  const candidates = [
    titleTag ? htmlToText(titleTag[1]) : undefined,
    metaContent(html, 'property', 'og:title'),
    h1 ? htmlToText(h1[1]) : undefined,
  ];
  const title = candidates.find((candidate): candidate is string => Boolean(candidate));
  return (title ?? titleFromUrl(url)).slice(0, 200);
}

function titleFromUrl(url: string): string {
  try {
    const path = new URL(url).pathname.split('/').filter(Boolean).pop() ?? '';
    return path.replace(/[-_]/g, ' ').replace(/\.\w+$/, '') || new URL(url).hostname;
  } catch {
    return url;
  }
}

export function extractPublishedDate(html: string): Date | null {
  const candidates = [
    metaContent(html, 'property', 'article:published_time'),
    metaContent(html, 'name', 'date'),
    metaContent(html, 'name', 'DC.date'),
    html.match(/<time[^>]*datetime\s*=\s*["']([^"']+)["']/i)?.[1],
  ];

  for (const value of candidates) {
    if (!value) continue;
    const date = new Date(value);
    if (!isNaN(date.getTime())) return date;
  }
  return null;
}

function extractMetadata(html: string, url: string): Record<string, unknown> {
  const parsed = new URL(url);
  const metadata: Record<string, unknown> = {
    domain: parsed.hostname,
    path: parsed.pathname,
  };

  const description = metaContent(html, 'name', 'description') ?? metaContent(html, 'property', 'og:description');
  if (description) metadata.description = description.slice(0, 500);

  const author = metaContent(html, 'name', 'author') ?? metaContent(html, 'property', 'article:author');
  if (author) metadata.author = author;

  const keywords = metaContent(html, 'name', 'keywords');
  if (keywords) {
    metadata.keywords = keywords.split(',').map(k => k.trim()).filter(Boolean);
  }

  return metadata;
}

// ============================================================================
// NORMALIZER
// ============================================================================

export class ContentNormalizer {
  private readonly feedParser = new FeedParser();

  constructor(private readonly config: ClassifierConfig = CLASSIFIER_DEFAULTS) {}

  normalize(input: NormalizeInput): NormalizedContent {
    const url = canonicalizeUrl(input.url);

    if (isPlainText(input)) {
      const text = canonicalizeText(input.body);
      return {
        kind: text.length >= this.config.minArticleChars ? 'ARTICLE' : 'UNKNOWN',
        title: titleFromUrl(url),
        text,
        publishedAt: null,
        metadata: { ...extractMetadata('', url), extraction: 'plain' satisfies ExtractionMode },
      };
    }

    const analysis = analyzePage({ ...input, url });
    const kind = classifyAnalysis(analysis, input, this.config);

    if (kind === 'FEED') {
      return this.normalizeFeed(input.body, url, analysis.feedType ?? 'rss');
    }

    if (kind === 'INDEX') {
      return {
        kind,
        title: extractTitle(input.body, url),
        followUps: indexLinks(analysis, input.typeHint, this.config) ?? [],
      };
    }

    return {
      kind,
      title: extractTitle(input.body, url),
      ...this.extractText(input.body, url),
      publishedAt: extractPublishedDate(input.body),
    };
  }

  private normalizeFeed(body: string, url: string, type: FeedType): FeedContent {
    const feed = this.feedParser.parse(body, type);
    const followUps = unique(
      feed.items.flatMap(item => {
        const resolved = resolveHref(item.url, url);
        return resolved !== null && resolved !== url ? [resolved] : [];
      })
    );
    return {
      kind: 'FEED',
      title: feed.title || titleFromUrl(url),
      followUps,
      entries: feed.items,
    };
  }

  private extractText(html: string, url: string): { text: string; metadata: Record<string, unknown> } {
    const metadata = extractMetadata(html, url);
    const cleaned = stripBoilerplate(html);
    const region = findMainRegion(cleaned);
    const regionText = htmlToText(region.html);

    if (regionText.length >= this.config.degradedBelowChars) {
      return { text: regionText, metadata: { ...metadata, extraction: region.fromElement ? 'main' : 'body' } };
    }

    // Main region too thin: fall back to everything readable on the page
    const text = htmlToText(bodyOf(cleaned));
    log.warn({ url, regionChars: regionText.length, textChars: text.length }, 'ExtractionDegraded');
    return { text, metadata: { ...metadata, extraction: 'degraded' satisfies ExtractionMode } };
  }
}
